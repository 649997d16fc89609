import { useEffect } from 'react'
import { useIsSignedIn, useSignOnStore } from '@/features/signon/signOnStore'
import { SignOnScreen } from '@/features/signon/components/SignOnScreen'
import { Desktop } from '@/features/desktop/components/Desktop'

export function App() {
  const signedIn = useIsSignedIn()
  const destroy = useSignOnStore((state) => state.destroy)

  // Pending dial-up timers must not outlive the shell
  useEffect(() => destroy, [destroy])

  return signedIn ? <Desktop /> : <SignOnScreen />
}
