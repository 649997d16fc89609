/**
 * Window manager types
 */

export const WindowType = {
  TERMINAL: 'terminal',
  BROWSER: 'browser',
  NOTEPAD: 'notepad',
  BUDDY: 'buddy',
} as const;

export type WindowType = typeof WindowType[keyof typeof WindowType];

export interface WindowRecord {
  id: string;
  title: string;
  type: WindowType;
  x: number;
  y: number;
  zIndex: number;
  minimized: boolean;
  maximized: boolean;
}

export interface WindowManagerState {
  windows: WindowRecord[];
  /** Always greater than every zIndex in `windows`. */
  nextZ: number;
  activeId: string | null;
}

export const Z_BASE = 10;
/** Once nextZ passes this, stacking is renumbered from Z_BASE. */
export const Z_CEILING = 10_000;

export const CASCADE_ORIGIN = 50;
export const CASCADE_STEP = 20;

export const WINDOW_WIDTH = 600;
export const WINDOW_HEIGHT = 400;
