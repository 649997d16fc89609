import { access, chmod, cp, mkdir, rm, writeFile } from "node:fs/promises";
import { constants } from "node:fs";
import type { InstallerLogger } from "@@/logging/logger.js";
import { InstallerError } from "@@/models/errorCodes.js";

export interface HostFileSystem {
  exists(target: string): Promise<boolean>;
  ensureDir(target: string): Promise<void>;
  remove(target: string): Promise<void>;
  writeFile(target: string, contents: string, mode?: number): Promise<void>;
  copyDir(source: string, destination: string): Promise<void>;
}

async function guardWrite<T>(target: string, operation: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    throw new InstallerError("FILE_WRITE_FAILED", { target, operation }, { cause: error });
  }
}

export class NodeFileSystem implements HostFileSystem {
  async exists(target: string): Promise<boolean> {
    try {
      await access(target, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  ensureDir(target: string): Promise<void> {
    return guardWrite(target, "mkdir", async () => {
      await mkdir(target, { recursive: true });
    });
  }

  remove(target: string): Promise<void> {
    return guardWrite(target, "rm", () => rm(target, { recursive: true, force: true }));
  }

  writeFile(target: string, contents: string, mode?: number): Promise<void> {
    return guardWrite(target, "write", async () => {
      await writeFile(target, contents, { encoding: "utf8", mode });
      if (mode !== undefined) {
        // the umask can strip bits from the mode passed to writeFile
        await chmod(target, mode);
      }
    });
  }

  copyDir(source: string, destination: string): Promise<void> {
    return guardWrite(destination, "copy", () => cp(source, destination, { recursive: true }));
  }
}

/** Reads pass through to the real disk; writes are only logged. */
export class DryRunFileSystem implements HostFileSystem {
  private readonly reader = new NodeFileSystem();

  constructor(private readonly logger: InstallerLogger) {}

  exists(target: string): Promise<boolean> {
    return this.reader.exists(target);
  }

  async ensureDir(target: string): Promise<void> {
    this.logger.info({ target }, "dryrun.mkdir");
  }

  async remove(target: string): Promise<void> {
    this.logger.info({ target }, "dryrun.rm");
  }

  async writeFile(target: string, contents: string, mode?: number): Promise<void> {
    this.logger.info({ target, bytes: Buffer.byteLength(contents), mode: mode?.toString(8) }, "dryrun.write");
  }

  async copyDir(source: string, destination: string): Promise<void> {
    this.logger.info({ source, destination }, "dryrun.copy");
  }
}
