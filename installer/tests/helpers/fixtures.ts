import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { InstallerConfig } from "../../src/infra/config";
import { createLogger } from "../../src/logging/logger";
import type { InstallContext } from "../../src/application/installPlan";
import { NodeFileSystem } from "../../src/infra/hostFileSystem";
import { RecordingRunner } from "./recordingRunner";

export interface Sandbox {
  root: string;
  homeDir: string;
  repoDir: string;
  projectDir: string;
  cleanup: () => Promise<void>;
}

export async function createSandbox(options: { withBuild?: boolean } = {}): Promise<Sandbox> {
  const root = await mkdtemp(path.join(tmpdir(), "dialtone-install-"));
  const homeDir = path.join(root, "home", "kiosk");
  const repoDir = path.join(root, "repo");
  const projectDir = path.join(homeDir, "dialtone-os");
  await mkdir(homeDir, { recursive: true });
  await mkdir(repoDir, { recursive: true });

  if (options.withBuild ?? true) {
    const dist = path.join(repoDir, "desktop", "dist");
    await mkdir(path.join(dist, "assets"), { recursive: true });
    await writeFile(path.join(dist, "index.html"), "<!doctype html><div id=\"root\"></div>\n");
    await writeFile(path.join(dist, "assets", "index.js"), "console.log('desktop');\n");
  }

  return {
    root,
    homeDir,
    repoDir,
    projectDir,
    cleanup: () => rm(root, { recursive: true, force: true })
  };
}

export function sandboxConfig(sandbox: Sandbox, overrides: Partial<InstallerConfig> = {}): InstallerConfig {
  return {
    user: "kiosk",
    homeDir: sandbox.homeDir,
    projectDir: sandbox.projectDir,
    repoDir: sandbox.repoDir,
    sessionName: "openbox-dialtone",
    nodeMajor: 20,
    dryRun: false,
    skipSystem: false,
    logLevel: "silent",
    logPretty: false,
    ...overrides
  };
}

export function createTestContext(
  config: InstallerConfig,
  overrides: Partial<InstallContext> = {}
): InstallContext & { runner: RecordingRunner } {
  const runner = overrides.runner instanceof RecordingRunner ? overrides.runner : new RecordingRunner();
  return {
    config,
    fs: new NodeFileSystem(),
    logger: createLogger({ level: "silent" }),
    platform: "linux",
    uid: 1000,
    version: "2.0.0-test",
    ...overrides,
    runner
  };
}
