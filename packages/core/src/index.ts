import "reflect-metadata";

// Container
export { Container } from "./di/container";
export { ResolutionContext } from "./di/resolution-context";

// Type introspection
export { MetadataTypeIntrospector } from "./introspection/metadata-introspector";

// Descriptors
export {
  param,
  defineType,
  defineMethod,
  defineFunction,
  tokenToString,
  typeNameOf,
} from "./metadata/descriptors";
export {
  TYPE_METADATA,
  INJECT_METADATA,
  METHOD_PARAMS_METADATA,
  FUNCTION_PARAMS_METADATA,
} from "./metadata/constants";

// Decorators
export { Injectable, Inject, Method } from "./decorators/injectable";

// Errors
export {
  ContainerError,
  NotFoundError,
  BindingError,
  AliasError,
  AliasCycleError,
  CircularDependencyError,
  NotInstantiableError,
  ParameterResolutionError,
  FactoryError,
  ConstructionError,
} from "./errors/container-errors";
export { explain } from "./errors/explain";

// Re-export key types from @wiregraph/types
export type {
  Type,
  AbstractType,
  Identifier,
  Token,
  Factory,
  BindingSource,
  BindingInfo,
  Lifetime,
  NamedOverrides,
  Resolver,
  ObjectContainer,
  ParameterDescriptor,
  ParameterType,
  TypeDescriptor,
  TypeIntrospector,
} from "@wiregraph/types";

// Re-export types defined in core
export type { ContainerOptions } from "./di/container";
export type { ContainerErrorKind, NotInstantiableReason } from "./errors/container-errors";
export type { ExplainedError } from "./errors/explain";
export type { ParamSpec, ParamOptions, TypeOptions, TypeReference } from "./metadata/descriptors";
