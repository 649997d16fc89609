import type { ScreenName } from '@/features/signon/machine/types'

export interface AppProps {
  screenName: ScreenName
}
