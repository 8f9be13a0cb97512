import type { AbstractType, Type } from "./common";

/** Scalar types that carry no identity of their own. */
export type BuiltinTypeName =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "object"
  | "array"
  | "function"
  | "unknown";

/**
 * Declared type of a constructor, method or function parameter.
 * `none` stands for an untyped parameter.
 */
export type ParameterType =
  | { kind: "none" }
  | { kind: "builtin"; name: BuiltinTypeName }
  | { kind: "class"; name: string }
  | { kind: "union"; members: string[] }
  | { kind: "intersection"; members: string[] };

export interface ParameterDescriptor {
  name: string;
  type: ParameterType;
  hasDefault: boolean;
  defaultValue?: unknown;
  nullable: boolean;
}

export type TypeKind = "class" | "abstract" | "interface";

export interface TypeDescriptor {
  name: string;
  kind: TypeKind;
  /** Absent when the type declares no constructor. */
  params?: ParameterDescriptor[];
}

/**
 * Registration-time replacement for runtime reflection.
 * Answers questions about types by name and builds instances from
 * ordered argument lists. Implementations may throw for any type;
 * the container rewraps such failures into its own errors.
 */
export interface TypeIntrospector {
  register(target: Type | AbstractType): string;
  declareInterface(name: string): void;
  knows(type: string): boolean;
  isInstantiable(type: string): boolean;
  describe(type: string): TypeDescriptor;
  constructorParameters(type: string): ParameterDescriptor[] | undefined;
  construct(type: string, args: unknown[]): unknown;
  lookup(type: string): Type | AbstractType | undefined;
}
