import type { JSX } from "react";
import { Text } from "ink";

interface StatusLineProps {
  statusMessage: string | null;
  backendError: string | null;
  chosenCount: number;
}

export function StatusLine({ statusMessage, backendError, chosenCount }: StatusLineProps): JSX.Element {
  if (statusMessage) {
    return <Text wrap="truncate-end">{statusMessage}</Text>;
  }

  if (backendError) {
    return <Text color="red" wrap="truncate-end">{backendError}</Text>;
  }

  const chosen = chosenCount > 0 ? `${chosenCount} chosen for a new playlist · ` : "";
  return <Text dimColor wrap="truncate-end">{`${chosen}Ctrl+G help · Ctrl+Q quit`}</Text>;
}
