import { spawn } from "node:child_process";
import type { StdioOptions } from "node:child_process";
import type { InstallerLogger } from "@@/logging/logger.js";
import { CommandFailedError, InstallerError } from "@@/models/errorCodes.js";

export interface RunOptions {
  cwd?: string;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  /** Prefix the command with sudo. */
  privileged?: boolean;
  /** Drop the child's stdout (tee echoes everything it writes). */
  quiet?: boolean;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<void>;
  commandExists(name: string): Promise<boolean>;
}

const COMMAND_NAME = /^[A-Za-z0-9._+-]+$/;

export function resolveInvocation(
  command: string,
  args: readonly string[],
  privileged = false
): { file: string; argv: string[] } {
  return privileged ? { file: "sudo", argv: [command, ...args] } : { file: command, argv: [...args] };
}

export function describeCommand(command: string, args: readonly string[], privileged = false): string {
  const { file, argv } = resolveInvocation(command, args, privileged);
  return [file, ...argv].join(" ");
}

export class ChildProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<void> {
    const { file, argv } = resolveInvocation(command, args, options.privileged);
    const stdio: StdioOptions = [
      options.input !== undefined ? "pipe" : "inherit",
      options.quiet ? "ignore" : "inherit",
      "inherit"
    ];

    return new Promise<void>((resolve, reject) => {
      const child = spawn(file, argv, { cwd: options.cwd, stdio });

      child.once("error", (error) => {
        reject(new CommandFailedError(command, args, null, { cause: error }));
      });

      child.once("close", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new CommandFailedError(command, args, code));
      });

      if (options.input !== undefined && child.stdin) {
        child.stdin.end(options.input);
      }
    });
  }

  commandExists(name: string): Promise<boolean> {
    if (!COMMAND_NAME.test(name)) {
      return Promise.reject(new InstallerError("INVALID_CONFIGURATION", { command: name }));
    }

    return new Promise<boolean>((resolve) => {
      const child = spawn("sh", ["-c", `command -v ${name}`], { stdio: "ignore" });
      child.once("error", () => resolve(false));
      child.once("close", (code) => resolve(code === 0));
    });
  }
}

/**
 * Logs every command instead of executing it. commandExists answers true so
 * conditional installs are reported as skipped.
 */
export class DryRunRunner implements CommandRunner {
  constructor(private readonly logger: InstallerLogger) {}

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<void> {
    this.logger.info(
      {
        command: describeCommand(command, args, options.privileged),
        cwd: options.cwd,
        stdinBytes: options.input !== undefined ? Buffer.byteLength(options.input) : undefined
      },
      "dryrun.command"
    );
  }

  async commandExists(name: string): Promise<boolean> {
    this.logger.info({ command: name }, "dryrun.command_exists");
    return true;
  }
}
