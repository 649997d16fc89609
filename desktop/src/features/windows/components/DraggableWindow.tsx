/**
 * Draggable window frame. Content is chosen by the window's type tag.
 */

import { Minus, Square, Copy, X } from 'lucide-react'
import type { ReactNode } from 'react'
import { APP_REGISTRY } from '@/features/apps/registry'
import { WINDOW_HEIGHT, WINDOW_WIDTH } from '../types'
import type { WindowRecord } from '../types'
import { useWindowDrag } from '../hooks/useWindowDrag'

export interface DraggableWindowProps {
  win: WindowRecord
  isActive: boolean
  onFocus: (id: string) => void
  onMove: (id: string, x: number, y: number) => void
  onClose: (id: string) => void
  onMinimize: (id: string) => void
  onToggleMaximize: (id: string) => void
  children: ReactNode
}

export function DraggableWindow({
  win,
  isActive,
  onFocus,
  onMove,
  onClose,
  onMinimize,
  onToggleMaximize,
  children,
}: DraggableWindowProps) {
  const { isDragging, onTitleMouseDown } = useWindowDrag(win, { onFocus, onMove })
  const Icon = APP_REGISTRY[win.type].icon

  if (win.minimized) {
    return null
  }

  const classes = [
    'window',
    isActive ? 'window--active' : '',
    win.maximized ? 'window--maximized' : '',
    isDragging ? 'window--dragging' : '',
  ].filter(Boolean).join(' ')

  return (
    <section
      className={classes}
      style={win.maximized ? { zIndex: win.zIndex } : { left: win.x, top: win.y, width: WINDOW_WIDTH, height: WINDOW_HEIGHT, zIndex: win.zIndex }}
      aria-label={win.title}
      data-window-id={win.id}
      onMouseDown={() => onFocus(win.id)}
    >
      <header className="window__titlebar" data-testid="window-titlebar" onMouseDown={onTitleMouseDown}>
        <span className="window__title">
          <Icon size={14} aria-hidden="true" />
          {win.title}
        </span>
        <span className="window__controls" onMouseDown={(event) => event.stopPropagation()}>
          <button type="button" className="window__control" aria-label="Minimize" onClick={() => onMinimize(win.id)}>
            <Minus size={12} aria-hidden="true" />
          </button>
          <button
            type="button"
            className="window__control"
            aria-label={win.maximized ? 'Restore' : 'Maximize'}
            onClick={() => onToggleMaximize(win.id)}
          >
            {win.maximized ? <Copy size={10} aria-hidden="true" /> : <Square size={10} aria-hidden="true" />}
          </button>
          <button type="button" className="window__control window__control--close" aria-label="Close" onClick={() => onClose(win.id)}>
            <X size={12} aria-hidden="true" />
          </button>
        </span>
      </header>
      <div className="window__body">{children}</div>
    </section>
  )
}
