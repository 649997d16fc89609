import { useEffect, useState } from 'react'

/** Current time, refreshed every intervalMs; the interval stops on unmount. */
export function useClock(intervalMs = 1000): Date {
  const [now, setNow] = useState(() => new Date())

  useEffect(() => {
    const timer = setInterval(() => setNow(new Date()), intervalMs)
    return () => clearInterval(timer)
  }, [intervalMs])

  return now
}
