import { memo, type JSX } from "react";
import { Box, Text } from "ink";
import type { SearchField } from "../../shared/types.js";
import { SEARCH_BAR_HEIGHT } from "../../shared/layout.js";
import { searchFieldLabel } from "../metadata-utils.js";

interface SearchBarProps {
  field: SearchField;
  text: string;
  active: boolean;
}

function SearchBarComponent({ field, text, active }: SearchBarProps): JSX.Element {
  return (
    <Box borderStyle="round" borderColor={active ? "cyan" : "gray"} height={SEARCH_BAR_HEIGHT} paddingX={1}>
      <Text bold>{`Search (${searchFieldLabel(field)}): `}</Text>
      <Text wrap="truncate-end">{text}</Text>
      {active ? <Text color="cyan">_</Text> : null}
    </Box>
  );
}

export const SearchBar = memo(SearchBarComponent);
