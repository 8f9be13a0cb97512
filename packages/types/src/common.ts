// Constructor type for DI: uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// DI resolves the actual arguments at runtime from registered descriptors.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Abstract classes can be described and aliased but never constructed.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

// Binding key: a type name or an arbitrary string such as "port" or "config"
export type Identifier = string;

// Anything the container accepts where an identifier is expected
export type Token<T = unknown> = Identifier | Type<T> | AbstractType<T>;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyFunction = (...args: any[]) => unknown;
