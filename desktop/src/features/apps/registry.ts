/**
 * Window type -> content renderer and title bar icon
 */

import type { ComponentType } from 'react'
import { FileText, Globe, MessageCircle, Terminal } from 'lucide-react'
import type { LucideIcon } from 'lucide-react'
import type { WindowType } from '@/features/windows/types'
import type { AppProps } from './types'
import { TerminalApp } from './terminal/TerminalApp'
import { BrowserApp } from './browser/BrowserApp'
import { NotepadApp } from './notepad/NotepadApp'
import { BuddyListApp } from './buddy/BuddyListApp'

export interface AppDefinition {
  component: ComponentType<AppProps>
  icon: LucideIcon
}

export const APP_REGISTRY: Readonly<Record<WindowType, AppDefinition>> = {
  terminal: { component: TerminalApp, icon: Terminal },
  browser: { component: BrowserApp, icon: Globe },
  notepad: { component: NotepadApp, icon: FileText },
  buddy: { component: BuddyListApp, icon: MessageCircle },
}
