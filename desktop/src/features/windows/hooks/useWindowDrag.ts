import { useCallback, useEffect, useRef, useState } from 'react'
import type { MouseEvent as ReactMouseEvent } from 'react'
import type { WindowRecord } from '../types'

export interface WindowDragHandlers {
  onFocus: (id: string) => void
  onMove: (id: string, x: number, y: number) => void
}

export interface WindowDrag {
  isDragging: boolean
  onTitleMouseDown: (event: ReactMouseEvent<HTMLElement>) => void
}

/** Keeps the title bar reachable: a window can never be dragged above the top edge. */
export function clampPosition(x: number, y: number): { x: number; y: number } {
  return { x, y: Math.max(0, y) }
}

/**
 * Title bar drag gesture. Listeners on `window` exist only while a drag
 * is in progress and are removed on mouseup or unmount.
 */
export function useWindowDrag(win: Pick<WindowRecord, 'id' | 'x' | 'y' | 'maximized'>, handlers: WindowDragHandlers): WindowDrag {
  const [isDragging, setIsDragging] = useState(false)
  const offset = useRef({ x: 0, y: 0 })
  const { onFocus, onMove } = handlers

  const onTitleMouseDown = useCallback(
    (event: ReactMouseEvent<HTMLElement>) => {
      if (event.button !== 0) {
        return
      }
      onFocus(win.id)
      if (win.maximized) {
        return
      }
      offset.current = { x: event.clientX - win.x, y: event.clientY - win.y }
      setIsDragging(true)
    },
    [onFocus, win.id, win.maximized, win.x, win.y]
  )

  useEffect(() => {
    if (!isDragging) {
      return undefined
    }

    const handleMouseMove = (event: MouseEvent) => {
      const next = clampPosition(event.clientX - offset.current.x, event.clientY - offset.current.y)
      onMove(win.id, next.x, next.y)
    }
    const handleMouseUp = () => setIsDragging(false)

    window.addEventListener('mousemove', handleMouseMove)
    window.addEventListener('mouseup', handleMouseUp)
    return () => {
      window.removeEventListener('mousemove', handleMouseMove)
      window.removeEventListener('mouseup', handleMouseUp)
    }
  }, [isDragging, onMove, win.id])

  return { isDragging, onTitleMouseDown }
}
