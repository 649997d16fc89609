import { APP_REGISTRY } from '@/features/apps/registry'
import type { ScreenName } from '@/features/signon/machine/types'
import { useActiveWindowId, useWindowStore, useWindows } from '../windowStore'
import { DraggableWindow } from './DraggableWindow'

export function WindowLayer({ screenName }: { screenName: ScreenName }) {
  const windows = useWindows()
  const activeId = useActiveWindowId()
  const focusWindow = useWindowStore((state) => state.focusWindow)
  const moveWindow = useWindowStore((state) => state.moveWindow)
  const closeWindow = useWindowStore((state) => state.closeWindow)
  const minimizeWindow = useWindowStore((state) => state.minimizeWindow)
  const toggleMaximize = useWindowStore((state) => state.toggleMaximize)

  return (
    <div className="window-layer">
      {windows.map((win) => {
        const App = APP_REGISTRY[win.type].component
        return (
          <DraggableWindow
            key={win.id}
            win={win}
            isActive={win.id === activeId}
            onFocus={focusWindow}
            onMove={moveWindow}
            onClose={closeWindow}
            onMinimize={minimizeWindow}
            onToggleMaximize={toggleMaximize}
          >
            <App screenName={screenName} />
          </DraggableWindow>
        )
      })}
    </div>
  )
}
