/**
 * Window store using Zustand
 */

import { create } from 'zustand';
import { devtools, subscribeWithSelector } from 'zustand/middleware';
import {
  closeAllWindows,
  closeWindow,
  createInitialWindowState,
  focusWindow,
  minimizeWindow,
  moveWindow,
  openWindow,
  toggleMaximize,
} from './windowManager';
import type { WindowManagerState, WindowType } from './types';

export interface WindowStoreState extends WindowManagerState {
  /** Returns the id of the new window. */
  openWindow: (type: WindowType, title: string) => string;
  closeWindow: (id: string) => void;
  focusWindow: (id: string) => void;
  moveWindow: (id: string, x: number, y: number) => void;
  minimizeWindow: (id: string) => void;
  toggleMaximize: (id: string) => void;
  closeAll: () => void;
  reset: () => void;
}

type WindowActions = Pick<
  WindowStoreState,
  'openWindow' | 'closeWindow' | 'focusWindow' | 'moveWindow' | 'minimizeWindow' | 'toggleMaximize' | 'closeAll' | 'reset'
>;

const createBaseState = (): WindowManagerState => createInitialWindowState();

export const useWindowStore = create<WindowStoreState>()(
  devtools(
    subscribeWithSelector((set, get) => {
      const actions: WindowActions = {
        openWindow: (type, title) => {
          set((state) => openWindow(state, type, title));
          const { activeId } = get();
          return activeId ?? '';
        },
        closeWindow: (id) => set((state) => closeWindow(state, id)),
        focusWindow: (id) => set((state) => focusWindow(state, id)),
        moveWindow: (id, x, y) => set((state) => moveWindow(state, id, x, y)),
        minimizeWindow: (id) => set((state) => minimizeWindow(state, id)),
        toggleMaximize: (id) => set((state) => toggleMaximize(state, id)),
        closeAll: () => set(closeAllWindows()),
        reset: () => set(createBaseState()),
      };

      return {
        ...createBaseState(),
        ...actions,
      };
    }),
    { name: 'window-store' }
  )
);

export const useWindows = () => useWindowStore((state) => state.windows);
export const useActiveWindowId = () => useWindowStore((state) => state.activeId);
