export interface LayoutMetrics {
  rows: number;
  mainHeight: number;
  playlistPanelHeight: number;
  detailsPanelHeight: number;
  trackCapacity: number;
  playlistCapacity: number;
}

export const SEARCH_BAR_HEIGHT = 3;
export const PLAYER_BAR_HEIGHT = 3;
export const STATUS_LINE_HEIGHT = 1;
export const MIN_ROWS = 14;

// Top and bottom border plus the panel's heading line.
const PANEL_CHROME_ROWS = 3;

/**
 * Splits the terminal height between the fixed bars and the scrollable lists.
 * The controller sizes the list viewports from the same numbers the renderer
 * draws with.
 */
export function computeLayout(terminalRows: number): LayoutMetrics {
  const rows = Math.max(MIN_ROWS, Math.floor(Number.isFinite(terminalRows) ? terminalRows : MIN_ROWS));
  const mainHeight = rows - SEARCH_BAR_HEIGHT - PLAYER_BAR_HEIGHT - STATUS_LINE_HEIGHT;
  const playlistPanelHeight = Math.max(PANEL_CHROME_ROWS + 1, Math.floor(mainHeight * 0.4));

  return {
    rows,
    mainHeight,
    playlistPanelHeight,
    detailsPanelHeight: mainHeight - playlistPanelHeight,
    trackCapacity: Math.max(1, mainHeight - PANEL_CHROME_ROWS),
    playlistCapacity: Math.max(1, playlistPanelHeight - PANEL_CHROME_ROWS)
  };
}
