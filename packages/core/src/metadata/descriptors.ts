import "reflect-metadata";
import type {
  AbstractType,
  AnyFunction,
  BuiltinTypeName,
  ParameterDescriptor,
  ParameterType,
  Token,
  Type,
  TypeKind,
} from "@wiregraph/types";
import {
  FUNCTION_PARAMS_METADATA,
  INJECT_METADATA,
  METHOD_PARAMS_METADATA,
  TYPE_METADATA,
} from "./constants";

export type TypeReference = Type | AbstractType;

/**
 * A parameter descriptor plus the constructors it mentions, so that
 * registering a type also makes its dependencies known by name.
 */
export type ParamSpec = ParameterDescriptor & {
  references?: TypeReference[];
};

export type ParamOptions = {
  default?: unknown;
  nullable?: boolean;
};

export type TypeOptions = {
  name?: string;
  kind?: Exclude<TypeKind, "interface">;
  params?: ParamSpec[];
};

export type TypeMetadata = {
  name?: string;
  kind: TypeKind;
  params?: ParamSpec[];
};

export function getTypeMetadata(target: TypeReference): TypeMetadata | undefined {
  return Reflect.getOwnMetadata(TYPE_METADATA, target);
}

export function typeNameOf(target: TypeReference): string {
  return getTypeMetadata(target)?.name ?? target.name;
}

export function tokenToString(token: Token): string {
  if (typeof token === "string") return token;
  return typeNameOf(token);
}

function paramSpec(
  name: string,
  type: ParameterType,
  options: ParamOptions = {},
  references: TypeReference[] = [],
): ParamSpec {
  const hasDefault = "default" in options;
  const spec: ParamSpec = {
    name,
    type,
    hasDefault,
    nullable: options.nullable ?? (hasDefault && options.default === null),
  };
  if (hasDefault) spec.defaultValue = options.default;
  if (references.length > 0) spec.references = references;
  return spec;
}

function referencesOf(tokens: Token[]): TypeReference[] {
  return tokens.filter((t): t is TypeReference => typeof t === "function");
}

/**
 * Builders for parameter descriptors.
 *
 * @example
 * defineType(HttpServer, {
 *   params: [param.ref("router", Router), param.number("port", { default: 8080 })],
 * });
 */
export const param = {
  untyped(name: string, options?: ParamOptions): ParamSpec {
    return paramSpec(name, { kind: "none" }, options);
  },

  scalar(name: string, type: BuiltinTypeName, options?: ParamOptions): ParamSpec {
    return paramSpec(name, { kind: "builtin", name: type }, options);
  },

  string(name: string, options?: ParamOptions): ParamSpec {
    return param.scalar(name, "string", options);
  },

  number(name: string, options?: ParamOptions): ParamSpec {
    return param.scalar(name, "number", options);
  },

  boolean(name: string, options?: ParamOptions): ParamSpec {
    return param.scalar(name, "boolean", options);
  },

  ref(name: string, target: Token, options?: ParamOptions): ParamSpec {
    return paramSpec(
      name,
      { kind: "class", name: tokenToString(target) },
      options,
      referencesOf([target]),
    );
  },

  union(name: string, members: Token[], options?: ParamOptions): ParamSpec {
    return paramSpec(
      name,
      { kind: "union", members: members.map(tokenToString) },
      options,
      referencesOf(members),
    );
  },

  intersection(name: string, members: Token[], options?: ParamOptions): ParamSpec {
    return paramSpec(
      name,
      { kind: "intersection", members: members.map(tokenToString) },
      options,
      referencesOf(members),
    );
  },
};

/**
 * Builder registration of a type descriptor. Equivalent to `@Injectable(options)`
 * for classes that cannot be decorated, or whose dependencies are declared
 * after the class itself.
 */
export function defineType<T extends TypeReference>(target: T, options: TypeOptions = {}): T {
  const metadata: TypeMetadata = { kind: options.kind ?? "class" };
  if (options.name !== undefined) metadata.name = options.name;
  if (options.params !== undefined) metadata.params = options.params;
  Reflect.defineMetadata(TYPE_METADATA, metadata, target);
  return target;
}

export function defineMethod<T extends TypeReference>(
  target: T,
  method: string,
  params: ParamSpec[],
): T {
  Reflect.defineMetadata(METHOD_PARAMS_METADATA, params, target.prototype, method);
  return target;
}

export function defineFunction<F extends AnyFunction>(fn: F, params: ParamSpec[]): F {
  Reflect.defineMetadata(FUNCTION_PARAMS_METADATA, params, fn);
  return fn;
}

export function getInjectOverrides(target: TypeReference): Map<number, Token> {
  return Reflect.getOwnMetadata(INJECT_METADATA, target) ?? new Map();
}

export function getMethodParameters(receiver: object, method: string): ParamSpec[] | undefined {
  return Reflect.getMetadata(METHOD_PARAMS_METADATA, receiver, method);
}

export function getFunctionParameters(fn: AnyFunction): ParamSpec[] | undefined {
  return Reflect.getOwnMetadata(FUNCTION_PARAMS_METADATA, fn);
}
