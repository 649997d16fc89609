// Error code catalog for host provisioning failures

export type ErrorCategory =
  | "preflight"
  | "configuration"
  | "command"
  | "artifact"
  | "filesystem"
  | "internal";

type ErrorCatalogDefinitionShape = {
  /** Uppercase key used internally (e.g. COMMAND_FAILED) */
  key: string;
  /** Stable numeric code string (e.g. E2004) */
  numericCode: string;
  /** Snake_case symbolic reason */
  reason: string;
  /** Grouping category */
  category: ErrorCategory;
  /** Whether re-running the installer unchanged may succeed */
  retryable: boolean;
  /** Human-facing message */
  humanMessage: string;
};

const ERROR_DEFINITIONS = [
  {
    key: "ROOT_USER_FORBIDDEN",
    numericCode: "E2001",
    reason: "root_user_forbidden",
    category: "preflight",
    retryable: false,
    humanMessage: "Please run as a normal user (not root). The installer asks for sudo when needed.",
  },
  {
    key: "UNSUPPORTED_PLATFORM",
    numericCode: "E2002",
    reason: "unsupported_platform",
    category: "preflight",
    retryable: false,
    humanMessage: "The kiosk installer only provisions Linux hosts",
  },
  {
    key: "INVALID_CONFIGURATION",
    numericCode: "E2003",
    reason: "invalid_configuration",
    category: "configuration",
    retryable: false,
    humanMessage: "Installer configuration is invalid",
  },
  {
    key: "COMMAND_FAILED",
    numericCode: "E2004",
    reason: "command_failed",
    category: "command",
    retryable: true,
    humanMessage: "A host command exited unsuccessfully",
  },
  {
    key: "BUILD_ARTIFACT_MISSING",
    numericCode: "E2005",
    reason: "build_artifact_missing",
    category: "artifact",
    retryable: false,
    humanMessage: "Build failed. dist/index.html not found.",
  },
  {
    key: "FILE_WRITE_FAILED",
    numericCode: "E2006",
    reason: "file_write_failed",
    category: "filesystem",
    retryable: true,
    humanMessage: "Could not write a generated file to the host",
  },
  {
    key: "INTERNAL_ERROR",
    numericCode: "E2007",
    reason: "internal_error",
    category: "internal",
    retryable: true,
    humanMessage: "Unexpected installer failure",
  },
] as const satisfies readonly ErrorCatalogDefinitionShape[];

export type ErrorDefinition = typeof ERROR_DEFINITIONS[number];
export type ErrorCodeKey = ErrorDefinition["key"];
export type ErrorReason = ErrorDefinition["reason"];

const DEFINITIONS_BY_KEY = new Map<string, ErrorDefinition>(
  ERROR_DEFINITIONS.map((definition): [string, ErrorDefinition] => [definition.key, definition])
);

export interface ErrorCatalogEntry {
  numericCode: string;
  reason: ErrorReason;
  category: ErrorCategory;
  retryable: boolean;
  humanMessage: string;
}

export class ErrorCodeRegistry {
  static getDefinitionByKey(key: ErrorCodeKey): ErrorDefinition {
    const definition = DEFINITIONS_BY_KEY.get(key);
    if (!definition) {
      throw new Error(`Unknown error code key: ${key}`);
    }
    return { ...definition };
  }
}

export function mapDefinitionToEntry(definition: ErrorDefinition): ErrorCatalogEntry {
  const { numericCode, reason, category, retryable, humanMessage } = definition;
  return { numericCode, reason, category, retryable, humanMessage };
}

export class InstallerError extends Error {
  public readonly definition: ErrorDefinition;

  constructor(
    public readonly code: ErrorCodeKey,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    const definition = ErrorCodeRegistry.getDefinitionByKey(code);
    super(definition.humanMessage, options);
    this.definition = definition;
    this.name = "InstallerError";
  }

  toEntry(): ErrorCatalogEntry {
    return mapDefinitionToEntry(this.definition);
  }
}

export class CommandFailedError extends InstallerError {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly exitCode: number | null,
    options?: { cause?: unknown }
  ) {
    super("COMMAND_FAILED", { command, args: [...args], exitCode }, options);
    this.name = "CommandFailedError";
  }
}

export function toInstallerError(error: unknown, details: Record<string, unknown> = {}): InstallerError {
  if (error instanceof InstallerError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new InstallerError("INTERNAL_ERROR", { ...details, reason }, { cause: error });
}
