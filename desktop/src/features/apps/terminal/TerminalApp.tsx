import { useEffect, useId, useRef, useState } from 'react'
import type { FormEvent } from 'react'
import { APP_VERSION } from '@/app/version'
import type { AppProps } from '../types'
import { bootBanner, promptFor, runCommand } from './commands'

export function TerminalApp({ screenName }: AppProps) {
  const [lines, setLines] = useState<string[]>(() => bootBanner(APP_VERSION))
  const [input, setInput] = useState('')
  const endRef = useRef<HTMLDivElement>(null)
  const inputId = useId()
  const prompt = promptFor(screenName)

  useEffect(() => {
    endRef.current?.scrollIntoView?.({ block: 'end' })
  }, [lines])

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    const result = runCommand(input, { screenName, version: APP_VERSION, now: () => new Date() })
    if (result.kind === 'clear') {
      setLines([])
    } else {
      setLines((previous) => [...previous, `${prompt} ${input}`, ...result.lines])
    }
    setInput('')
  }

  return (
    <div className="terminal" data-testid="terminal">
      <div className="terminal__scrollback" role="log" aria-label="Terminal output">
        {lines.map((line, index) => (
          <div key={index} className="terminal__line">
            {line}
          </div>
        ))}
        <div ref={endRef} />
      </div>
      <form className="terminal__prompt" onSubmit={handleSubmit}>
        <label htmlFor={inputId}>{prompt}</label>
        <input
          id={inputId}
          className="terminal__input"
          value={input}
          onChange={(event) => setInput(event.target.value)}
          autoComplete="off"
          spellCheck={false}
          autoFocus
        />
      </form>
    </div>
  )
}
