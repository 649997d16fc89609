export { loadConfig, getConfig, clearConfigCache } from "./infra/config.js";
export type { InstallerConfig, ConfigOverrides } from "./infra/config.js";
export { ChildProcessRunner, DryRunRunner } from "./infra/commandRunner.js";
export type { CommandRunner, RunOptions } from "./infra/commandRunner.js";
export { NodeFileSystem, DryRunFileSystem } from "./infra/hostFileSystem.js";
export type { HostFileSystem } from "./infra/hostFileSystem.js";
export { buildInstallPlan, StepId } from "./application/installPlan.js";
export type { InstallContext, InstallStep } from "./application/installPlan.js";
export { runInstall } from "./application/runInstall.js";
export type { InstallSummary } from "./application/runInstall.js";
export { renderXSessionEntry } from "./templates/xsession.js";
export { renderOpenboxAutostart, KIOSK_ELECTRON_FLAGS } from "./templates/openboxAutostart.js";
export { renderLightdmConf } from "./templates/lightdm.js";
export { renderKioskPackageJson } from "./templates/kioskRuntime.js";
export { InstallerError, CommandFailedError, ErrorCodeRegistry } from "./models/errorCodes.js";
export { main, parseCliArgs } from "./cli.js";
