import createDebug from "debug";
import type { ObjectContainer } from "@wiregraph/types";
import type { EnvSource } from "./env";
import { WiregraphConfig, toParameterName } from "./env";

const debug = createDebug("wiregraph:config:env");

export type Coercion = "none" | "auto";

export type EnvBindingOptions = {
  /** Defaults to `WIREGRAPH_APP_`. */
  prefix?: string;
  /** Defaults to `process.env`. */
  env?: EnvSource;
  /** `auto` turns "true"/"false" into booleans and numeric strings into numbers. */
  coerce?: Coercion;
  /** Parameter names to bind; everything else under the prefix is skipped. */
  only?: string[];
};

const NUMERIC = /^-?\d+(\.\d+)?$/;

export function coerceValue(raw: string, coerce: Coercion): string | number | boolean {
  if (coerce === "none") return raw;
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (NUMERIC.test(raw)) return Number(raw);
  return raw;
}

/**
 * Binds every prefixed environment variable as a literal under its parameter
 * name, so that scalar constructor parameters such as `port` or `databaseUrl`
 * resolve by convention. Returns the bound names in the order they were bound.
 *
 * @example
 * // WIREGRAPH_APP_PORT=8080
 * bindEnvironment(container, { coerce: "auto" }); // ["port"]
 * container.get("port"); // 8080
 */
export function bindEnvironment(
  container: Pick<ObjectContainer, "set">,
  options: EnvBindingOptions = {},
): string[] {
  const coerce = options.coerce ?? "none";
  const only = options.only ? new Set(options.only) : null;
  const vars = WiregraphConfig.getAllAppVars(options.prefix, options.env);
  const bound: string[] = [];

  for (const [suffix, raw] of Object.entries(vars)) {
    const name = toParameterName(suffix);
    if (name === "" || (only && !only.has(name))) continue;

    debug("bind %s from %s", name, suffix);
    container.set(name, coerceValue(raw, coerce));
    bound.push(name);
  }

  return bound;
}
