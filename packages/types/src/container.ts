import type { AnyFunction, Token, Type } from "./common";

/** Named values that take precedence over resolution when invoking a callable. */
export type NamedOverrides = Record<string, unknown>;

/** Resolution surface handed to factories and exposed by the container. */
export interface Resolver {
  get<T = unknown>(token: Token<T>): T;
  has(token: Token): boolean;
  hasBinding(token: Token): boolean;
  invokeMethod(target: object | Token, method: string, overrides?: NamedOverrides): unknown;
  invokeFunction(fn: AnyFunction, overrides?: NamedOverrides): unknown;
}

export type Factory<T = unknown> = (resolver: Resolver) => T;

/**
 * What `set` and `singleton` accept: a factory, a class to autowire in place
 * of the id, a literal value, or nothing (autowire the id itself).
 */
export type BindingSource<T = unknown> = Factory<T> | Type<T> | T | null | undefined;

export type BindingKind = "factory" | "value" | "autowire";

export type Lifetime = "transient" | "singleton";

export interface BindingInfo {
  id: string;
  kind: BindingKind;
  lifetime: Lifetime;
  resolved: boolean;
}

/** Full in-process container contract. */
export interface ObjectContainer extends Resolver {
  set<T>(token: Token<T>, source?: BindingSource<T>): void;
  singleton<T>(token: Token<T>, source?: BindingSource<T>): void;
  instance<T>(token: Token<T>, value: T): void;
  setAlias(alias: string, target: Token): void;
  forget(token: Token): void;
  forgetInstance(token: Token): void;
  clear(): void;
  isResolved(token: Token): boolean;
  bindings(): { bindings: BindingInfo[]; aliases: Record<string, string> };
}
