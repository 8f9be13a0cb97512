export type { Type, AbstractType, Identifier, Token, AnyFunction } from "./common";

export type {
  BuiltinTypeName,
  ParameterType,
  ParameterDescriptor,
  TypeKind,
  TypeDescriptor,
  TypeIntrospector,
} from "./introspection";

export type {
  NamedOverrides,
  Resolver,
  Factory,
  BindingSource,
  BindingKind,
  Lifetime,
  BindingInfo,
  ObjectContainer,
} from "./container";
