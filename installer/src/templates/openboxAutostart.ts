import { joinLines, shellQuote } from "./shell.js";

/**
 * Chromium switches that keep Electron rendering on hosts without working
 * GPU acceleration (VirtualBox and most bare server images).
 */
export const KIOSK_ELECTRON_FLAGS = Object.freeze([
  "--kiosk",
  "--no-sandbox",
  "--disable-gpu",
  "--disable-software-rasterizer"
] as const);

export interface AutostartOptions {
  projectDir: string;
  restartDelaySeconds?: number;
}

export function kioskLaunchCommand(): string {
  return ["npx", "electron", "electron/main.js", ...KIOSK_ELECTRON_FLAGS].join(" ");
}

export function renderOpenboxAutostart({ projectDir, restartDelaySeconds = 1 }: AutostartOptions): string {
  return joinLines([
    "# Disable screen saver and power management",
    "xset s off -dpms s noblank",
    "unclutter-xfixes -idle 1 &",
    `cd ${shellQuote(projectDir)}`,
    "",
    "# Relaunch the kiosk whenever Electron exits",
    "while true; do",
    `  ${kioskLaunchCommand()}`,
    `  sleep ${restartDelaySeconds}`,
    "done"
  ]);
}
