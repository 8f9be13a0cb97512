import "reflect-metadata";
import type { Token } from "@wiregraph/types";
import { INJECT_METADATA, METHOD_PARAMS_METADATA } from "../metadata/constants";
import type { ParamSpec, TypeOptions, TypeReference } from "../metadata/descriptors";
import { defineType } from "../metadata/descriptors";

/**
 * Marks a class as constructible by the container. Without `params` the
 * constructor signature is read from `design:paramtypes`.
 */
export function Injectable(options: TypeOptions = {}): (target: TypeReference) => void {
  return (target) => {
    defineType(target, options);
  };
}

/**
 * Names the binding a constructor parameter resolves from. A string names a
 * scalar binding (or a type); a class replaces the emitted parameter type.
 */
export function Inject(token: Token): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: Map<number, Token> = Reflect.getOwnMetadata(INJECT_METADATA, target) ?? new Map();
    existing.set(parameterIndex, token);
    Reflect.defineMetadata(INJECT_METADATA, existing, target);
  };
}

/** Declares the parameters of a method so it can be called through `invokeMethod`. */
export function Method(...params: ParamSpec[]): MethodDecorator {
  return (target, propertyKey) => {
    Reflect.defineMetadata(METHOD_PARAMS_METADATA, params, target, String(propertyKey));
  };
}
