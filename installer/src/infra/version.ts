const DEFAULT_RELEASE_VERSION = "2.0.0";

/**
 * Release stamped into the kiosk runtime manifest. DIALTONE_RELEASE_VERSION
 * overrides it for pre-release images.
 */
export function getReleaseVersion(env: Record<string, string | undefined> = process.env): string {
  const trimmed = env.DIALTONE_RELEASE_VERSION?.trim();

  if (trimmed && trimmed.length > 0) {
    return trimmed;
  }

  return DEFAULT_RELEASE_VERSION;
}
