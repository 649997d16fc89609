import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

const ELECTRON_MAIN_TEMPLATE = path.resolve(fileURLToPath(import.meta.url), "../../../templates/electron/main.js");

export const ELECTRON_VERSION_RANGE = "^33.2.0";

export interface KioskPackageOptions {
  name?: string;
  version: string;
  electronRange?: string;
}

/** package.json for the directory Openbox launches Electron from. */
export function renderKioskPackageJson({
  name = "dialtone-kiosk",
  version,
  electronRange = ELECTRON_VERSION_RANGE
}: KioskPackageOptions): string {
  const manifest = {
    name,
    version,
    private: true,
    main: "electron/main.js",
    type: "module",
    scripts: {
      start: "electron ."
    },
    dependencies: {
      electron: electronRange
    }
  };
  return `${JSON.stringify(manifest, null, 2)}\n`;
}

export async function loadElectronMainTemplate(templatePath: string = ELECTRON_MAIN_TEMPLATE): Promise<string> {
  return readFile(templatePath, "utf8");
}
