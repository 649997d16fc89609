import { DESKTOP_ICONS } from '../desktopIcons'
import type { WindowType } from '@/features/windows/types'

export function DesktopIcons({ onOpen }: { onOpen: (type: WindowType, title: string) => void }) {
  return (
    <div className="desktop-icons">
      {DESKTOP_ICONS.map(({ label, type, title, icon: Icon, tone }) => (
        <button key={label} type="button" className="desktop-icon" onClick={() => onOpen(type, title)}>
          <span className={`desktop-icon__tile desktop-icon__tile--${tone}`}>
            <Icon size={24} aria-hidden="true" />
          </span>
          <span className="desktop-icon__label">{label}</span>
        </button>
      ))}
    </div>
  )
}
