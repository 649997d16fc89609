import { useActiveWindowId, useWindowStore, useWindows } from '../windowStore'

export function Taskbar() {
  const windows = useWindows()
  const activeId = useActiveWindowId()
  const focusWindow = useWindowStore((state) => state.focusWindow)

  return (
    <nav className="taskbar" aria-label="Open windows">
      {windows.length === 0 && <span className="taskbar__empty">No open windows</span>}
      {windows.map((win) => (
        <button
          key={win.id}
          type="button"
          className={`taskbar__item${win.id === activeId ? ' taskbar__item--active' : ''}${win.minimized ? ' taskbar__item--minimized' : ''}`}
          aria-pressed={win.id === activeId}
          onClick={() => focusWindow(win.id)}
        >
          {win.title}
        </button>
      ))}
    </nav>
  )
}
