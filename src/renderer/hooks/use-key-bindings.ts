import { useInput } from "ink";
import type { UiCommand } from "../../shared/types.js";
import { decodeKey } from "../key-bindings.js";

interface UseKeyBindingsOptions {
  loaded: boolean;
  playlistInputVisible: boolean;
  dispatch(command: UiCommand): void;
  quit(): void;
}

/** Until the first snapshot arrives only quitting is possible. */
export function useKeyBindings({
  loaded,
  playlistInputVisible,
  dispatch,
  quit
}: UseKeyBindingsOptions): void {
  useInput((input, key) => {
    const command = decodeKey(input, key, { playlistInputVisible });
    if (!command) {
      return;
    }

    if (!loaded) {
      if (command.type === "quit") {
        quit();
      }
      return;
    }

    dispatch(command);
  });
}
