export const APP_VAR_PREFIX = "WIREGRAPH_APP_";

export type EnvSource = Record<string, string | undefined>;

export class WiregraphConfig {
  static getAppVar(name: string, env: EnvSource = process.env): string | undefined {
    return env[`${APP_VAR_PREFIX}${name}`];
  }

  /** Set variables under `prefix`, keyed by the rest of their name, in `env` order. */
  static getAllAppVars(prefix = APP_VAR_PREFIX, env: EnvSource = process.env): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
      if (key.startsWith(prefix) && value !== undefined) {
        result[key.slice(prefix.length)] = value;
      }
    }
    return result;
  }
}

/**
 * Maps an environment variable suffix to the parameter name scalar
 * bindings are looked up by.
 *
 * @example
 * toParameterName("DATABASE_URL") => "databaseUrl"
 * toParameterName("PORT") => "port"
 */
export function toParameterName(envKey: string): string {
  const words = envKey
    .toLowerCase()
    .split("_")
    .filter((word) => word.length > 0);
  return words
    .map((word, index) => (index === 0 ? word : `${word[0].toUpperCase()}${word.slice(1)}`))
    .join("");
}
