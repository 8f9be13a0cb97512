import { ContainerError } from "../errors/container-errors";

/**
 * Runs a type introspector call. Container errors pass through; anything
 * else the introspector throws is rewrapped with the original as `cause`.
 */
export function guardIntrospection<T>(id: string, call: () => T, chain: readonly string[] = []): T {
  try {
    return call();
  } catch (error) {
    if (error instanceof ContainerError) throw error;
    throw new ContainerError(`Type introspection failed for '${id}'`, { cause: error, chain });
  }
}
