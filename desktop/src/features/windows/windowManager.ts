/**
 * Pure window manager reducers. Each takes the current state and returns the
 * next one, or the same object when nothing changes.
 */

import {
  CASCADE_ORIGIN,
  CASCADE_STEP,
  Z_BASE,
  Z_CEILING,
} from './types';
import type { WindowManagerState, WindowRecord, WindowType } from './types';

export function createInitialWindowState(): WindowManagerState {
  return { windows: [], nextZ: Z_BASE, activeId: null };
}

function uniqueId(windows: readonly WindowRecord[], now: number): string {
  const taken = new Set(windows.map((win) => win.id));
  const base = String(now);
  if (!taken.has(base)) {
    return base;
  }
  let suffix = 1;
  while (taken.has(`${base}-${suffix}`)) {
    suffix += 1;
  }
  return `${base}-${suffix}`;
}

/**
 * Renumbers stacking from Z_BASE once nextZ passes the ceiling, keeping order.
 */
export function compactZ(state: WindowManagerState): WindowManagerState {
  if (state.nextZ <= Z_CEILING) {
    return state;
  }
  const order = [...state.windows].sort((a, b) => a.zIndex - b.zIndex).map((win) => win.id);
  const rank = new Map(order.map((id, index) => [id, Z_BASE + index]));
  return {
    ...state,
    windows: state.windows.map((win) => ({ ...win, zIndex: rank.get(win.id) ?? win.zIndex })),
    nextZ: Z_BASE + state.windows.length,
  };
}

export function openWindow(
  state: WindowManagerState,
  type: WindowType,
  title: string,
  now: number = Date.now()
): WindowManagerState {
  const offset = CASCADE_ORIGIN + state.windows.length * CASCADE_STEP;
  const record: WindowRecord = {
    id: uniqueId(state.windows, now),
    title,
    type,
    x: offset,
    y: offset,
    zIndex: state.nextZ,
    minimized: false,
    maximized: false,
  };
  return compactZ({
    windows: [...state.windows, record],
    nextZ: state.nextZ + 1,
    activeId: record.id,
  });
}

export function closeWindow(state: WindowManagerState, id: string): WindowManagerState {
  if (!state.windows.some((win) => win.id === id)) {
    return state;
  }
  return {
    windows: state.windows.filter((win) => win.id !== id),
    nextZ: state.nextZ,
    activeId: state.activeId === id ? null : state.activeId,
  };
}

export function focusWindow(state: WindowManagerState, id: string): WindowManagerState {
  const target = state.windows.find((win) => win.id === id);
  if (!target) {
    return state;
  }
  if (state.activeId === id && target.zIndex === state.nextZ - 1 && !target.minimized) {
    return state;
  }
  return compactZ({
    windows: state.windows.map((win) =>
      win.id === id ? { ...win, zIndex: state.nextZ, minimized: false } : win
    ),
    nextZ: state.nextZ + 1,
    activeId: id,
  });
}

export function moveWindow(state: WindowManagerState, id: string, x: number, y: number): WindowManagerState {
  const target = state.windows.find((win) => win.id === id);
  if (!target || (target.x === x && target.y === y)) {
    return state;
  }
  return {
    windows: state.windows.map((win) => (win.id === id ? { ...win, x, y } : win)),
    nextZ: state.nextZ,
    activeId: state.activeId,
  };
}

export function minimizeWindow(state: WindowManagerState, id: string): WindowManagerState {
  const target = state.windows.find((win) => win.id === id);
  if (!target || target.minimized) {
    return state;
  }
  return {
    windows: state.windows.map((win) => (win.id === id ? { ...win, minimized: true } : win)),
    nextZ: state.nextZ,
    activeId: state.activeId === id ? null : state.activeId,
  };
}

export function toggleMaximize(state: WindowManagerState, id: string): WindowManagerState {
  if (!state.windows.some((win) => win.id === id)) {
    return state;
  }
  return {
    windows: state.windows.map((win) => (win.id === id ? { ...win, maximized: !win.maximized } : win)),
    nextZ: state.nextZ,
    activeId: state.activeId,
  };
}

export function closeAllWindows(): WindowManagerState {
  return createInitialWindowState();
}

export function getTopWindow(state: WindowManagerState): WindowRecord | null {
  return state.windows.reduce<WindowRecord | null>(
    (top, win) => (!win.minimized && (top === null || win.zIndex > top.zIndex) ? win : top),
    null
  );
}
