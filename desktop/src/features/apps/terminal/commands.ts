/**
 * DOS Prompt command interpreter. Pure: the component owns the scrollback.
 */

export interface TerminalEnvironment {
  screenName: string
  version: string
  now: () => Date
}

export type CommandResult =
  | { kind: 'output'; lines: string[] }
  | { kind: 'clear' }

type CommandHandler = (args: string, env: TerminalEnvironment) => CommandResult

const output = (...lines: string[]): CommandResult => ({ kind: 'output', lines })

export const TERMINAL_COMMANDS: Readonly<Record<string, { summary: string; run: CommandHandler }>> = {
  help: {
    summary: 'List available commands',
    run: () => output('Available commands:', ...Object.entries(TERMINAL_COMMANDS).map(([name, command]) => `  ${name.padEnd(8)}${command.summary}`)),
  },
  clear: {
    summary: 'Clear the screen',
    run: () => ({ kind: 'clear' }),
  },
  echo: {
    summary: 'Print the given text',
    run: (args) => output(args),
  },
  date: {
    summary: 'Show the current date and time',
    run: (_args, env) => output(env.now().toUTCString()),
  },
  whoami: {
    summary: 'Show the signed-in screen name',
    run: (_args, env) => output(env.screenName),
  },
  ver: {
    summary: 'Show the system version',
    run: (_args, env) => output(`Dialtone OS [Version ${env.version}]`),
  },
}

export function bootBanner(version: string): string[] {
  return [`Dialtone Kernel v${version} loaded.`, 'Type "help" for a list of commands.', '']
}

export function promptFor(screenName: string): string {
  return `${screenName.toLowerCase()}@dialtone:~$`
}

/**
 * Command names are case-insensitive; arguments keep their spacing.
 */
export function runCommand(input: string, env: TerminalEnvironment): CommandResult {
  const trimmed = input.trim()
  if (trimmed.length === 0) {
    return output()
  }

  const [name = ''] = trimmed.split(/\s+/, 1)
  const args = trimmed.slice(name.length).trim()
  const command = Object.prototype.hasOwnProperty.call(TERMINAL_COMMANDS, name.toLowerCase())
    ? TERMINAL_COMMANDS[name.toLowerCase()]
    : undefined

  if (!command) {
    return output(`'${name}' is not recognized as a command.`)
  }
  return command.run(args, env)
}
