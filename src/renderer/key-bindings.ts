import type { Key } from "ink";
import type { UiCommand } from "../shared/types.js";

/** The flags of ink's `Key` that bindings read. */
export type KeyState = Pick<
  Key,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "ctrl"
  | "meta"
  | "tab"
  | "backspace"
  | "delete"
>;

export interface KeyContext {
  playlistInputVisible: boolean;
}

export interface KeyBindingHelp {
  keys: string;
  action: string;
}

const CTRL_COMMANDS: Record<string, UiCommand> = {
  a: { type: "toggleChosen" },
  b: { type: "advance", direction: "previous" },
  c: { type: "openPlaylistInput" },
  e: { type: "exportPlaylist" },
  g: { type: "toggleHelp" },
  n: { type: "advance", direction: "next" },
  p: { type: "togglePause" },
  r: { type: "toggleRepeat" },
  s: { type: "cycleSearchField" },
  t: { type: "cycleSort" },
  u: { type: "toggleMute" },
  x: { type: "deletePlaylist" }
};

export const KEY_BINDING_HELP: KeyBindingHelp[] = [
  { keys: "Up / Down", action: "Select song" },
  { keys: "PgUp / PgDn", action: "Select playlist" },
  { keys: "Enter", action: "Play selected song / stop it" },
  { keys: "Ctrl+P", action: "Pause / resume" },
  { keys: "Left / Right", action: "Seek backward / forward" },
  { keys: "Ctrl+Left / Ctrl+Right", action: "Volume down / up" },
  { keys: "Ctrl+U", action: "Mute / unmute" },
  { keys: "Ctrl+N / Ctrl+B", action: "Next / previous song" },
  { keys: "Ctrl+R", action: "Repeat current song" },
  { keys: "Ctrl+S", action: "Change search field" },
  { keys: "Ctrl+T", action: "Change sort order" },
  { keys: "Ctrl+A", action: "Add / remove song for a new playlist" },
  { keys: "Ctrl+C", action: "Name and create the playlist" },
  { keys: "Ctrl+X", action: "Delete selected playlist" },
  { keys: "Ctrl+E", action: "Export selected playlist as M3U" },
  { keys: "Ctrl+G", action: "Toggle this help" },
  { keys: "Esc", action: "Close popups" },
  { keys: "Ctrl+Q", action: "Quit" }
];

function printableText(input: string): string {
  return [...input].filter((character) => {
    const code = character.codePointAt(0) ?? 0;
    return code >= 0x20 && code !== 0x7f;
  }).join("");
}

/**
 * Maps one key press to a command. While the playlist-name popup is open only
 * text editing, Enter, Esc and quit reach the controller.
 */
export function decodeKey(input: string, key: KeyState, context: KeyContext): UiCommand | null {
  if (key.ctrl && input === "q") {
    return { type: "quit" };
  }

  if (key.escape) {
    return { type: "closePopups" };
  }

  if (key.backspace || key.delete) {
    return { type: "backspace" };
  }

  if (context.playlistInputVisible) {
    if (key.return) {
      return { type: "submitPlaylistInput" };
    }
    if (key.ctrl || key.meta) {
      return null;
    }
    const text = printableText(input);
    return text.length > 0 ? { type: "typeText", text } : null;
  }

  if (key.return) {
    return { type: "toggleSelect" };
  }

  if (key.upArrow) {
    return { type: "moveSelection", delta: -1 };
  }
  if (key.downArrow) {
    return { type: "moveSelection", delta: 1 };
  }
  if (key.pageUp) {
    return { type: "movePlaylist", delta: -1 };
  }
  if (key.pageDown) {
    return { type: "movePlaylist", delta: 1 };
  }

  if (key.leftArrow) {
    return key.ctrl ? { type: "volumeDown" } : { type: "seek", direction: -1 };
  }
  if (key.rightArrow) {
    return key.ctrl ? { type: "volumeUp" } : { type: "seek", direction: 1 };
  }

  if (key.ctrl) {
    return CTRL_COMMANDS[input.toLowerCase()] ?? null;
  }

  if (key.meta || key.tab) {
    return null;
  }

  const text = printableText(input);
  return text.length > 0 ? { type: "typeText", text } : null;
}
