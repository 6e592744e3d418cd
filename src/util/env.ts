/**
 * Environment utilities for runtime/stage detection and safe env var access.
 */

export function getNodeEnv(): string {
  return process.env.NODE_ENV || "development";
}

export function getStage(): string {
  // Prefer an explicit STAGE; derive from NODE_ENV otherwise
  const stage = process.env.STAGE;
  if (stage && stage.length > 0) return stage;
  return getNodeEnv() === "production" ? "prod" : "dev";
}

export function isProduction(): boolean {
  const stage = getStage();
  return stage === "prod" || getNodeEnv() === "production";
}

export function isTest(): boolean {
  return getNodeEnv() === "test";
}

export function isLocal(): boolean {
  // Absence of a Lambda execution env implies local
  const isLambda = Boolean(
    process.env.AWS_LAMBDA_FUNCTION_NAME || process.env.AWS_EXECUTION_ENV
  );
  return process.env.IS_LOCAL === "true" || !isLambda;
}

export interface GetEnvVarOptions {
  required?: boolean;
  stageAware?: boolean; // if true, prefer NAME__<stage> before NAME
}

/**
 * Reads a raw environment variable.
 * - If `stageAware` is true (default), checks NAME__<stage> first (e.g., DISCORD_WEBHOOK__prod), then NAME.
 * - Empty strings count as missing. Throws when `required` is set and nothing is found.
 */
export function getEnvVar(
  name: string,
  options: GetEnvVarOptions = {}
): string | undefined {
  const stageKey = `${name}__${getStage()}`;
  const stageAware = options.stageAware !== false;

  const candidate = stageAware
    ? process.env[stageKey] ?? process.env[name]
    : process.env[name];

  if (candidate != null && candidate !== "") return candidate;

  if (options.required) {
    const tried = stageAware ? `${stageKey} or ${name}` : name;
    throw new Error(`Missing required env var: ${tried}`);
  }
  return undefined;
}

export function getString(name: string): string | undefined;
export function getString(name: string, defaultValue: string): string;
export function getString(
  name: string,
  defaultValue?: string
): string | undefined {
  return getEnvVar(name) ?? defaultValue;
}

export function getNumber(name: string): number | undefined;
export function getNumber(name: string, defaultValue: number): number;
export function getNumber(
  name: string,
  defaultValue?: number
): number | undefined {
  const raw = getEnvVar(name);
  if (raw == null) return defaultValue;
  const n = Number(raw);
  if (Number.isNaN(n))
    throw new Error(`Env var ${name} is not a number: ${raw}`);
  return n;
}

/**
 * Comma-separated list; blank entries dropped.
 */
export function getList(name: string): string[] | undefined {
  const raw = getEnvVar(name);
  if (raw == null) return undefined;
  return raw
    .split(",")
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/**
 * JSON-encoded value, returned unvalidated; callers run it through a schema.
 */
export function getJson(name: string): unknown {
  const raw = getEnvVar(name);
  if (raw == null) return undefined;
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Env var ${name} is not valid JSON: ${reason}`);
  }
}
