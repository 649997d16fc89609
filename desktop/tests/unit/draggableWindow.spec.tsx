import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import { DraggableWindow } from '../../src/features/windows/components/DraggableWindow';
import { clampPosition } from '../../src/features/windows/hooks/useWindowDrag';
import type { WindowRecord } from '../../src/features/windows/types';

const baseWindow: WindowRecord = {
  id: 'w1',
  title: 'Notes',
  type: 'notepad',
  x: 50,
  y: 50,
  zIndex: 10,
  minimized: false,
  maximized: false,
};

describe('DraggableWindow', () => {
  const handlers = {
    onFocus: vi.fn(),
    onMove: vi.fn(),
    onClose: vi.fn(),
    onMinimize: vi.fn(),
    onToggleMaximize: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const renderWindow = (overrides: Partial<WindowRecord> = {}) =>
    render(
      <DraggableWindow win={{ ...baseWindow, ...overrides }} isActive {...handlers}>
        <p>body</p>
      </DraggableWindow>
    );

  it('positions the frame and renders its content', () => {
    renderWindow();

    const frame = screen.getByRole('region', { name: 'Notes' });
    expect(frame).toHaveStyle({ left: '50px', top: '50px', width: '600px', height: '400px', zIndex: '10' });
    expect(frame).toHaveClass('window', 'window--active');
    expect(screen.getByText('body')).toBeInTheDocument();
  });

  it('focuses on mousedown anywhere in the frame', () => {
    renderWindow();

    fireEvent.mouseDown(screen.getByText('body'));

    expect(handlers.onFocus).toHaveBeenCalledWith('w1');
  });

  it('drags by the title bar, keeping the pointer offset', () => {
    renderWindow();

    fireEvent.mouseDown(screen.getByTestId('window-titlebar'), { clientX: 100, clientY: 60 });
    fireEvent.mouseMove(window, { clientX: 200, clientY: 150 });

    expect(handlers.onFocus).toHaveBeenCalledWith('w1');
    expect(handlers.onMove).toHaveBeenLastCalledWith('w1', 150, 140);
  });

  it('keeps the title bar below the top edge', () => {
    renderWindow();

    fireEvent.mouseDown(screen.getByTestId('window-titlebar'), { clientX: 100, clientY: 60 });
    fireEvent.mouseMove(window, { clientX: 40, clientY: 5 });

    expect(handlers.onMove).toHaveBeenLastCalledWith('w1', -10, 0);
  });

  it('stops following the pointer after mouseup', () => {
    renderWindow();

    fireEvent.mouseDown(screen.getByTestId('window-titlebar'), { clientX: 100, clientY: 60 });
    fireEvent.mouseUp(window);
    fireEvent.mouseMove(window, { clientX: 300, clientY: 300 });

    expect(handlers.onMove).not.toHaveBeenCalled();
  });

  it('does not listen to the pointer before a drag starts', () => {
    const addListener = vi.spyOn(window, 'addEventListener');
    renderWindow();

    fireEvent.mouseMove(window, { clientX: 300, clientY: 300 });

    expect(handlers.onMove).not.toHaveBeenCalled();
    expect(addListener.mock.calls.map(([type]) => type)).not.toContain('mousemove');
  });

  it('removes its listeners when unmounted mid-drag', () => {
    const removeListener = vi.spyOn(window, 'removeEventListener');
    const { unmount } = renderWindow();
    fireEvent.mouseDown(screen.getByTestId('window-titlebar'), { clientX: 100, clientY: 60 });

    unmount();
    fireEvent.mouseMove(window, { clientX: 300, clientY: 300 });

    expect(removeListener.mock.calls.map(([type]) => type)).toEqual(expect.arrayContaining(['mousemove', 'mouseup']));
    expect(handlers.onMove).not.toHaveBeenCalled();
  });

  it('does not drag a maximized window', () => {
    renderWindow({ maximized: true });

    fireEvent.mouseDown(screen.getByTestId('window-titlebar'), { clientX: 100, clientY: 60 });
    fireEvent.mouseMove(window, { clientX: 200, clientY: 150 });

    expect(handlers.onFocus).toHaveBeenCalledWith('w1');
    expect(handlers.onMove).not.toHaveBeenCalled();
    expect(screen.getByRole('button', { name: 'Restore' })).toBeInTheDocument();
  });

  it('wires the title bar controls', () => {
    renderWindow();

    fireEvent.click(screen.getByRole('button', { name: 'Minimize' }));
    fireEvent.click(screen.getByRole('button', { name: 'Maximize' }));
    fireEvent.click(screen.getByRole('button', { name: 'Close' }));

    expect(handlers.onMinimize).toHaveBeenCalledWith('w1');
    expect(handlers.onToggleMaximize).toHaveBeenCalledWith('w1');
    expect(handlers.onClose).toHaveBeenCalledWith('w1');
  });

  it('does not focus when pressing a title bar control', () => {
    renderWindow();

    fireEvent.mouseDown(screen.getByRole('button', { name: 'Close' }));

    expect(handlers.onFocus).not.toHaveBeenCalled();
  });

  it('renders nothing while minimized', () => {
    renderWindow({ minimized: true });

    expect(screen.queryByRole('region', { name: 'Notes' })).not.toBeInTheDocument();
  });
});

describe('clampPosition', () => {
  it('only clamps the vertical axis', () => {
    expect(clampPosition(-40, -12)).toEqual({ x: -40, y: 0 });
    expect(clampPosition(120, 30)).toEqual({ x: 120, y: 30 });
  });
});
