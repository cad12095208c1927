/**
 * Writes a warning outside production. Library code has no logger of its
 * own; hooks carry everything else.
 */
export function warnInDevelopment(
  message: string,
  details?: Readonly<Record<string, unknown>>,
): void {
  if (!isDevelopmentEnvironment()) {
    return;
  }
  if (details !== undefined) {
    console.warn(message, details);
    return;
  }
  console.warn(message);
}

function isDevelopmentEnvironment(): boolean {
  return getNodeEnv() !== "production";
}

function getNodeEnv(): string | undefined {
  if (typeof process === "undefined") {
    return undefined;
  }
  return process.env.NODE_ENV;
}
