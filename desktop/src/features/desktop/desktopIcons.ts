import { FileText, Globe, MessageCircle, Terminal } from 'lucide-react'
import type { LucideIcon } from 'lucide-react'
import type { WindowType } from '@/features/windows/types'

export interface DesktopIcon {
  label: string
  type: WindowType
  /** Title of the window the icon opens. */
  title: string
  icon: LucideIcon
  tone: 'blue' | 'amber' | 'yellow' | 'dark'
}

export const DESKTOP_ICONS: readonly DesktopIcon[] = [
  { label: 'Internet', type: 'browser', title: 'Web Browser', icon: Globe, tone: 'blue' },
  { label: 'Write Mail', type: 'notepad', title: 'Notes', icon: FileText, tone: 'amber' },
  { label: 'Buddy List', type: 'buddy', title: 'Buddy List', icon: MessageCircle, tone: 'yellow' },
  { label: 'DOS Prompt', type: 'terminal', title: 'Terminal', icon: Terminal, tone: 'dark' },
]
