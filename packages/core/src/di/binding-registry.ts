import type { AbstractType, BindingInfo, BindingSource, Factory, Lifetime, Type } from "@wiregraph/types";
import { BindingError } from "../errors/container-errors";

export type Binding =
  | { kind: "factory"; lifetime: Lifetime; factory: Factory }
  | { kind: "value"; lifetime: Lifetime; value: unknown }
  | { kind: "autowire"; lifetime: Lifetime; type: string };

/** The type lookups a binding needs from the container's introspector. */
export interface BindingTypes {
  knows(id: string): boolean;
  register(target: Type | AbstractType): string;
}

const CLASS_SOURCE = /^class[\s{]/;

/** Class constructors cannot be called without `new`, so they are never factories. */
export function isClassConstructor(source: unknown): source is Type | AbstractType {
  return typeof source === "function" && CLASS_SOURCE.test(Function.prototype.toString.call(source));
}

function isFactory(source: unknown): source is Factory {
  return typeof source === "function";
}

/**
 * Decides once, at registration time, how a binding produces its value.
 * A class constructor binds `id` to autowiring of that class.
 */
export function createBinding<T>(
  id: string,
  source: BindingSource<T>,
  lifetime: Lifetime,
  types: BindingTypes,
): Binding {
  if (isClassConstructor(source)) {
    return { kind: "autowire", lifetime, type: types.register(source) };
  }

  if (isFactory(source)) {
    return { kind: "factory", lifetime, factory: source };
  }

  if (source === undefined || source === null) {
    if (!types.knows(id)) {
      throw new BindingError(
        id,
        `Cannot autowire '${id}': it does not name a known type. ` +
          "Register the class first, or pass a factory or value.",
      );
    }
    return { kind: "autowire", lifetime, type: id };
  }

  if (typeof source === "symbol") {
    throw new BindingError(id, `Invalid value provided for binding '${id}': symbol.`);
  }

  return { kind: "value", lifetime, value: source };
}

/** Bindings keyed by canonical id, plus the singleton instance cache. */
export class BindingRegistry {
  private bindings = new Map<string, Binding>();
  private instances = new Map<string, unknown>();

  register(id: string, binding: Binding): void {
    this.bindings.set(id, binding);
    this.instances.delete(id);
  }

  get(id: string): Binding | undefined {
    return this.bindings.get(id);
  }

  has(id: string): boolean {
    return this.bindings.has(id);
  }

  delete(id: string): void {
    this.bindings.delete(id);
    this.instances.delete(id);
  }

  hasInstance(id: string): boolean {
    return this.instances.has(id);
  }

  instance(id: string): unknown {
    return this.instances.get(id);
  }

  /**
   * Caches `value` unless an instance was stored while it was being built,
   * in which case the stored instance is kept and returned.
   */
  storeOnce(id: string, value: unknown): unknown {
    if (this.instances.has(id)) return this.instances.get(id);
    this.instances.set(id, value);
    return value;
  }

  evict(id: string): boolean {
    return this.instances.delete(id);
  }

  clear(): void {
    this.bindings.clear();
    this.instances.clear();
  }

  describe(): BindingInfo[] {
    return [...this.bindings].map(([id, binding]) => ({
      id,
      kind: binding.kind,
      lifetime: binding.lifetime,
      resolved: this.instances.has(id),
    }));
  }
}
