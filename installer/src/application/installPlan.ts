import { findProjectDirConflict, type InstallerConfig } from "@@/infra/config.js";
import type { CommandRunner } from "@@/infra/commandRunner.js";
import type { HostFileSystem } from "@@/infra/hostFileSystem.js";
import type { InstallerLogger } from "@@/logging/logger.js";
import { InstallerError } from "@@/models/errorCodes.js";
import { APT_PACKAGES, nodeSourceSetupUrl } from "@@/host/packages.js";
import { LIGHTDM_CONF, LIGHTDM_DIR, XSESSIONS_DIR, resolveHostPaths } from "@@/host/paths.js";
import { renderXSessionEntry } from "@@/templates/xsession.js";
import { renderOpenboxAutostart } from "@@/templates/openboxAutostart.js";
import { renderLightdmConf } from "@@/templates/lightdm.js";
import { loadElectronMainTemplate, renderKioskPackageJson } from "@@/templates/kioskRuntime.js";

export const StepId = {
  PREFLIGHT: "preflight",
  APT_UPDATE: "apt-update",
  APT_INSTALL: "apt-install",
  NODEJS: "nodejs",
  DISPLAY_MANAGER: "display-manager",
  PROJECT_DIR: "project-dir",
  DESKTOP_BUILD: "desktop-build",
  VERIFY_BUILD: "verify-build",
  KIOSK_RUNTIME: "kiosk-runtime",
  XSESSION: "xsession",
  OPENBOX_AUTOSTART: "openbox-autostart",
  AUTOLOGIN: "autologin",
} as const;

export type StepId = typeof StepId[keyof typeof StepId];

/** Everything a step may touch on the host. */
export interface InstallContext {
  config: InstallerConfig;
  runner: CommandRunner;
  fs: HostFileSystem;
  logger: InstallerLogger;
  platform: NodeJS.Platform;
  /** Effective uid; undefined where the platform has none. */
  uid: number | undefined;
  version: string;
}

export interface InstallStep {
  id: StepId;
  title: string;
  privileged: boolean;
  run(context: InstallContext): Promise<void>;
}

const AUTOSTART_MODE = 0o755;

async function writePrivilegedFile(context: InstallContext, directory: string, target: string, contents: string): Promise<void> {
  await context.runner.run("mkdir", ["-p", directory], { privileged: true });
  await context.runner.run("tee", [target], { privileged: true, input: contents, quiet: true });
}

const preflight: InstallStep = {
  id: StepId.PREFLIGHT,
  title: "Checking host",
  privileged: false,
  async run({ platform, uid }) {
    if (uid === 0) {
      throw new InstallerError("ROOT_USER_FORBIDDEN");
    }
    if (platform !== "linux") {
      throw new InstallerError("UNSUPPORTED_PLATFORM", { platform });
    }
  },
};

const aptUpdate: InstallStep = {
  id: StepId.APT_UPDATE,
  title: "Refreshing package index",
  privileged: true,
  async run({ runner }) {
    await runner.run("apt", ["update"], { privileged: true });
  },
};

const aptInstall: InstallStep = {
  id: StepId.APT_INSTALL,
  title: "Installing system dependencies",
  privileged: true,
  async run({ runner }) {
    await runner.run("apt", ["install", "-y", "--no-install-recommends", ...APT_PACKAGES], { privileged: true });
  },
};

const nodejs: InstallStep = {
  id: StepId.NODEJS,
  title: "Installing Node.js",
  privileged: true,
  async run({ runner, config, logger }) {
    if (await runner.commandExists("node")) {
      logger.info("nodejs.present");
      return;
    }
    await runner.run("bash", ["-c", `curl -fsSL ${nodeSourceSetupUrl(config.nodeMajor)} | sudo -E bash -`]);
    await runner.run("apt", ["install", "-y", "nodejs"], { privileged: true });
  },
};

const displayManager: InstallStep = {
  id: StepId.DISPLAY_MANAGER,
  title: "Enabling LightDM",
  privileged: true,
  async run({ runner }) {
    await runner.run("systemctl", ["enable", "lightdm"], { privileged: true });
    await runner.run("systemctl", ["set-default", "graphical.target"], { privileged: true });
  },
};

const projectDir: InstallStep = {
  id: StepId.PROJECT_DIR,
  title: "Preparing project directory",
  privileged: false,
  async run({ fs, config }) {
    const conflict = findProjectDirConflict(config);
    if (conflict) {
      throw new InstallerError("INVALID_CONFIGURATION", { issues: conflict });
    }
    await fs.remove(config.projectDir);
    await fs.ensureDir(config.projectDir);
  },
};

const desktopBuild: InstallStep = {
  id: StepId.DESKTOP_BUILD,
  title: "Building the desktop",
  privileged: false,
  async run({ runner, config }) {
    await runner.run("npm", ["install"], { cwd: config.repoDir });
    await runner.run("npm", ["run", "build", "--workspace", "desktop"], { cwd: config.repoDir });
  },
};

const verifyBuild: InstallStep = {
  id: StepId.VERIFY_BUILD,
  title: "Verifying build output",
  privileged: false,
  async run({ fs, config, logger }) {
    const { desktopIndexHtml } = resolveHostPaths(config);
    if (config.dryRun) {
      logger.info({ target: desktopIndexHtml }, "dryrun.verify");
      return;
    }
    if (!(await fs.exists(desktopIndexHtml))) {
      throw new InstallerError("BUILD_ARTIFACT_MISSING", { target: desktopIndexHtml });
    }
  },
};

const kioskRuntime: InstallStep = {
  id: StepId.KIOSK_RUNTIME,
  title: "Installing kiosk runtime",
  privileged: false,
  async run({ fs, runner, config, version }) {
    const paths = resolveHostPaths(config);
    await fs.copyDir(paths.desktopDist, paths.projectDist);
    await fs.ensureDir(paths.projectElectronDir);
    await fs.writeFile(paths.projectPackageJson, renderKioskPackageJson({ version }));
    await fs.writeFile(paths.projectElectronMain, await loadElectronMainTemplate());
    await runner.run("npm", ["install"], { cwd: config.projectDir });
  },
};

const xsession: InstallStep = {
  id: StepId.XSESSION,
  title: "Creating Openbox session",
  privileged: true,
  async run(context) {
    const { xsessionEntry } = resolveHostPaths(context.config);
    await writePrivilegedFile(context, XSESSIONS_DIR, xsessionEntry, renderXSessionEntry());
  },
};

const openboxAutostart: InstallStep = {
  id: StepId.OPENBOX_AUTOSTART,
  title: "Configuring Openbox autostart",
  privileged: false,
  async run({ fs, config }) {
    const paths = resolveHostPaths(config);
    await fs.ensureDir(paths.openboxConfigDir);
    await fs.writeFile(paths.openboxAutostart, renderOpenboxAutostart({ projectDir: config.projectDir }), AUTOSTART_MODE);
  },
};

const autologin: InstallStep = {
  id: StepId.AUTOLOGIN,
  title: "Configuring auto-login",
  privileged: true,
  async run(context) {
    const { user, sessionName } = context.config;
    await writePrivilegedFile(context, LIGHTDM_DIR, LIGHTDM_CONF, renderLightdmConf({ user, sessionName }));
  },
};

const SYSTEM_STEPS: ReadonlySet<StepId> = new Set([
  StepId.APT_UPDATE,
  StepId.APT_INSTALL,
  StepId.NODEJS,
  StepId.DISPLAY_MANAGER,
]);

const ALL_STEPS: readonly InstallStep[] = [
  preflight,
  aptUpdate,
  aptInstall,
  nodejs,
  displayManager,
  projectDir,
  desktopBuild,
  verifyBuild,
  kioskRuntime,
  xsession,
  openboxAutostart,
  autologin,
];

export function buildInstallPlan(config: Pick<InstallerConfig, "skipSystem">): InstallStep[] {
  return ALL_STEPS.filter((step) => !(config.skipSystem && SYSTEM_STEPS.has(step.id)));
}
