import { config as loadDotenv } from "dotenv";
import { loadConfig, type ConfigOverrides, type InstallerConfig } from "@@/infra/config.js";
import { ChildProcessRunner, DryRunRunner } from "@@/infra/commandRunner.js";
import { DryRunFileSystem, NodeFileSystem } from "@@/infra/hostFileSystem.js";
import { getReleaseVersion } from "@@/infra/version.js";
import { getLogger, type InstallerLogger } from "@@/logging/logger.js";
import { InstallerError, toInstallerError } from "@@/models/errorCodes.js";
import { buildInstallPlan, type InstallContext } from "@@/application/installPlan.js";
import { runInstall } from "@@/application/runInstall.js";

export interface CliOptions extends ConfigOverrides {
  help: boolean;
}

export const USAGE = [
  "Usage: dialtone-install [options]",
  "",
  "Options:",
  "  --dry-run             log every command and file write without touching the host",
  "  --skip-system         skip apt, Node.js and display manager setup",
  "  --project-dir <dir>   kiosk runtime directory (default: $HOME/dialtone-os)",
  "  --user <name>         account LightDM logs in automatically (default: $USER)",
  "  -h, --help            show this message"
].join("\n");

function takeValue(flag: string, inline: string | undefined, rest: string[]): string {
  const value = inline ?? rest.shift();
  if (value === undefined || value.length === 0 || value.startsWith("--")) {
    throw new InstallerError("INVALID_CONFIGURATION", { issues: `${flag}: a value is required` });
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false };
  const rest = [...argv];

  while (rest.length > 0) {
    const segment = rest.shift() ?? "";
    const [flag = "", inline] = segment.split(/=(.*)/s, 2);

    switch (flag) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "--skip-system":
        options.skipSystem = true;
        break;
      case "--project-dir":
        options.projectDir = takeValue(flag, inline, rest);
        break;
      case "--user":
        options.user = takeValue(flag, inline, rest);
        break;
      default:
        throw new InstallerError("INVALID_CONFIGURATION", { issues: `unknown argument ${segment}` });
    }
  }

  return options;
}

export function createInstallContext(config: InstallerConfig, logger: InstallerLogger): InstallContext {
  return {
    config,
    runner: config.dryRun ? new DryRunRunner(logger) : new ChildProcessRunner(),
    fs: config.dryRun ? new DryRunFileSystem(logger) : new NodeFileSystem(),
    logger,
    platform: process.platform,
    uid: process.getuid?.(),
    version: getReleaseVersion()
  };
}

function banner(lines: readonly string[]): void {
  console.log("=======================================");
  for (const line of lines) {
    console.log(line);
  }
  console.log("=======================================");
}

export function failureBanner(failure: InstallerError): string[] {
  const { numericCode, humanMessage, retryable } = failure.toEntry();
  return [
    "DIALTONE INSTALL FAILED",
    `${numericCode} ${humanMessage}`,
    retryable ? "Re-run the installer once the cause is fixed." : "Fix the host or configuration before re-running."
  ];
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  loadDotenv();

  let options: CliOptions;
  let config: InstallerConfig;
  try {
    options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }
    config = loadConfig(process.env, options);
  } catch (error) {
    const failure = toInstallerError(error);
    console.error(`${failure.definition.numericCode} ${failure.message}`, failure.details ?? "");
    console.error(USAGE);
    return 1;
  }

  const logger = getLogger({ level: config.logLevel, pretty: config.logPretty });
  const context = createInstallContext(config, logger);

  banner([`Dialtone Installer v${context.version}`, "Target: Ubuntu 24.04 LTS Server", config.dryRun ? "Mode: dry run" : `Project: ${config.projectDir}`]);

  try {
    await runInstall(buildInstallPlan(config), context);
  } catch (error) {
    const failure = toInstallerError(error);
    logger.fatal({ ...failure.toEntry(), details: failure.details }, "install.failed");
    banner(failureBanner(failure));
    return 1;
  }

  banner(config.dryRun ? ["DRY RUN COMPLETE", "No changes were made"] : ["DIALTONE INSTALLED", "Reboot now: sudo reboot"]);
  return 0;
}

/** Runs the installer and records its exit code on the process. */
export async function runCli(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  try {
    process.exitCode = await main(argv);
  } catch (error) {
    console.error("Installer crashed", error);
    process.exitCode = 1;
  }
}
