/**
 * Environment variable utilities
 */

/**
 * Gets an environment variable as a string with a default value
 */
export const envStr = (k: string, d: string, env: NodeJS.ProcessEnv = process.env): string =>
  env[k] || d;

/**
 * Gets an environment variable as a boolean with a default value
 * @returns true for "1", "true", "yes", "on"
 */
export const envBool = (k: string, d: boolean, env: NodeJS.ProcessEnv = process.env): boolean =>
  /^(1|true|yes|on)$/i.test(env[k] ?? String(d));

/** Comma-separated list, blanks dropped */
export const envList = (k: string, env: NodeJS.ProcessEnv = process.env): string[] =>
  (env[k] ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
