import { useScreenName, useSignOnStore } from '@/features/signon/signOnStore'
import { useWindowStore } from '@/features/windows/windowStore'
import { WindowLayer } from '@/features/windows/components/WindowLayer'
import { Taskbar } from '@/features/windows/components/Taskbar'
import { DesktopIcons } from './DesktopIcons'
import { TopBar } from './TopBar'

export function Desktop() {
  const screenName = useScreenName()
  const signOff = useSignOnStore((state) => state.signOff)
  const openWindow = useWindowStore((state) => state.openWindow)

  return (
    <div className="desktop">
      <TopBar screenName={screenName} onSignOff={signOff} />
      <main className="desktop__surface">
        <DesktopIcons onOpen={openWindow} />
        <WindowLayer screenName={screenName} />
      </main>
      <Taskbar />
    </div>
  )
}
