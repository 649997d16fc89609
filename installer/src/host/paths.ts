import path from "node:path";
import type { InstallerConfig } from "@@/infra/config.js";

export const XSESSIONS_DIR = "/usr/share/xsessions";
export const LIGHTDM_DIR = "/etc/lightdm";
export const LIGHTDM_CONF = path.posix.join(LIGHTDM_DIR, "lightdm.conf");
export const OPENBOX_SESSION_BIN = "/usr/bin/openbox-session";
export const GREETER_SESSION = "lightdm-gtk-greeter";

export interface HostPaths {
  xsessionEntry: string;
  openboxConfigDir: string;
  openboxAutostart: string;
  desktopDist: string;
  desktopIndexHtml: string;
  projectDist: string;
  projectElectronDir: string;
  projectElectronMain: string;
  projectPackageJson: string;
}

export function resolveHostPaths(config: InstallerConfig): HostPaths {
  const openboxConfigDir = path.join(config.homeDir, ".config", "openbox");
  const desktopDist = path.join(config.repoDir, "desktop", "dist");
  const projectElectronDir = path.join(config.projectDir, "electron");

  return {
    xsessionEntry: path.posix.join(XSESSIONS_DIR, `${config.sessionName}.desktop`),
    openboxConfigDir,
    openboxAutostart: path.join(openboxConfigDir, "autostart"),
    desktopDist,
    desktopIndexHtml: path.join(desktopDist, "index.html"),
    projectDist: path.join(config.projectDir, "dist"),
    projectElectronDir,
    projectElectronMain: path.join(projectElectronDir, "main.js"),
    projectPackageJson: path.join(config.projectDir, "package.json")
  };
}
