import path from "node:path";
import { fileURLToPath } from "node:url";
import { z, ZodError } from "zod";
import { InstallerError } from "@@/models/errorCodes.js";

type RawEnv = Record<string, string | undefined>;

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const userNameSchema = z
  .string()
  .regex(/^[a-z_][a-z0-9_-]{0,31}$/, "must be a valid Linux user name");

const DEFAULT_REPO_DIR = path.resolve(fileURLToPath(import.meta.url), "../../../..");

const envSchema = z
  .object({
    HOME: z.string().min(1, "HOME is required"),
    USER: z.string().optional(),
    DIALTONE_HOME: z.string().optional(),
    DIALTONE_USER: z.string().optional(),
    DIALTONE_PROJECT_DIR: z.string().optional(),
    DIALTONE_REPO_DIR: z.string().optional(),
    DIALTONE_SESSION_NAME: z
      .string()
      .regex(/^[a-z0-9][a-z0-9-]*$/, "DIALTONE_SESSION_NAME must be lowercase letters, digits and dashes")
      .default("openbox-dialtone"),
    DIALTONE_NODE_MAJOR: z.coerce
      .number({ invalid_type_error: "DIALTONE_NODE_MAJOR must be a number" })
      .int("DIALTONE_NODE_MAJOR must be an integer")
      .min(18, "DIALTONE_NODE_MAJOR must be 18 or newer")
      .default(20),
    DIALTONE_DRY_RUN: booleanFlag,
    DIALTONE_SKIP_SYSTEM: booleanFlag,
    LOG_LEVEL: logLevelSchema.optional().default("info"),
    LOG_PRETTY: booleanFlag
  })
  .transform((env) => ({
    ...env,
    DIALTONE_HOME: env.DIALTONE_HOME ?? env.HOME,
    DIALTONE_USER: env.DIALTONE_USER ?? env.USER
  }));

export interface ConfigOverrides {
  projectDir?: string;
  user?: string;
  dryRun?: boolean;
  skipSystem?: boolean;
}

export type InstallerConfig = {
  user: string;
  homeDir: string;
  projectDir: string;
  repoDir: string;
  sessionName: string;
  nodeMajor: number;
  dryRun: boolean;
  skipSystem: boolean;
  logLevel: z.infer<typeof logLevelSchema>;
  logPretty: boolean;
};

let cachedConfig: InstallerConfig | null = null;

function isSameOrInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative));
}

/**
 * The project-dir step deletes this directory before the build, so it may not
 * be the filesystem root nor hold the home directory or the repository.
 */
export function findProjectDirConflict(config: Pick<InstallerConfig, "projectDir" | "homeDir" | "repoDir">): string | undefined {
  const projectDir = path.resolve(config.projectDir);
  const homeDir = path.resolve(config.homeDir);
  const repoDir = path.resolve(config.repoDir);

  if (path.parse(projectDir).root === projectDir) {
    return `DIALTONE_PROJECT_DIR: ${projectDir} is the filesystem root`;
  }
  if (isSameOrInside(projectDir, homeDir)) {
    return `DIALTONE_PROJECT_DIR: ${projectDir} would remove the home directory ${homeDir}`;
  }
  if (isSameOrInside(projectDir, repoDir)) {
    return `DIALTONE_PROJECT_DIR: ${projectDir} would remove the repository ${repoDir}`;
  }
  return undefined;
}

function formatIssues(error: ZodError): string {
  return error.errors
    .map((issue) => {
      const [pathSegment] = issue.path;
      const identifier = typeof pathSegment === "string" ? pathSegment : "unknown";
      return `${identifier}: ${issue.message}`;
    })
    .join("; ");
}

export function loadConfig(env: RawEnv = process.env, overrides: ConfigOverrides = {}): InstallerConfig {
  try {
    const parsed = envSchema.parse(env);
    const homeDir = parsed.DIALTONE_HOME;
    const user = overrides.user ?? parsed.DIALTONE_USER;
    if (!user) {
      throw new InstallerError("INVALID_CONFIGURATION", { issues: "DIALTONE_USER: DIALTONE_USER or USER is required" });
    }
    const userCheck = userNameSchema.safeParse(user);
    if (!userCheck.success) {
      throw new InstallerError("INVALID_CONFIGURATION", { issues: `DIALTONE_USER: ${user} ${userCheck.error.errors[0]?.message ?? "is invalid"}` });
    }

    const config: InstallerConfig = {
      user,
      homeDir,
      projectDir: path.resolve(overrides.projectDir ?? parsed.DIALTONE_PROJECT_DIR ?? path.join(homeDir, "dialtone-os")),
      repoDir: path.resolve(parsed.DIALTONE_REPO_DIR ?? DEFAULT_REPO_DIR),
      sessionName: parsed.DIALTONE_SESSION_NAME,
      nodeMajor: parsed.DIALTONE_NODE_MAJOR,
      dryRun: overrides.dryRun ?? parsed.DIALTONE_DRY_RUN,
      skipSystem: overrides.skipSystem ?? parsed.DIALTONE_SKIP_SYSTEM,
      logLevel: parsed.LOG_LEVEL,
      logPretty: parsed.LOG_PRETTY
    };

    const conflict = findProjectDirConflict(config);
    if (conflict) {
      throw new InstallerError("INVALID_CONFIGURATION", { issues: conflict });
    }

    cachedConfig = config;
    return config;
  } catch (error) {
    if (error instanceof ZodError) {
      throw new InstallerError("INVALID_CONFIGURATION", { issues: formatIssues(error) });
    }
    throw error;
  }
}

export function getConfig(): InstallerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  return loadConfig();
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
