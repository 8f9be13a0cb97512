import createDebug from "debug";
import type { ParameterDescriptor, TypeIntrospector } from "@wiregraph/types";
import {
  ConstructionError,
  NotInstantiableError,
  ParameterResolutionError,
} from "../errors/container-errors";
import { guardIntrospection } from "../introspection/guard";
import type { ResolutionContext } from "./resolution-context";

const debug = createDebug("wiregraph:core:autowire");

/** The parts of the container the autowiring resolver calls back into. */
export interface ResolutionHost {
  canonicalize(id: string): string;
  hasBinding(id: string): boolean;
  /** Resolves an already canonical id inside the given context. */
  resolveCanonical(id: string, context: ResolutionContext): unknown;
}

/**
 * Builds instances of known types by resolving each constructor parameter
 * in declaration order and recursing into class-typed dependencies.
 */
export class AutowireResolver {
  constructor(
    private readonly introspector: TypeIntrospector,
    private readonly host: ResolutionHost,
  ) {}

  resolve(id: string, context: ResolutionContext): unknown {
    return context.within(id, () => {
      const descriptor = this.introspect(id, context, () => this.introspector.describe(id));
      if (descriptor.kind !== "class") {
        throw new NotInstantiableError(id, descriptor.kind, context.chain);
      }

      const params = descriptor.params ?? [];
      debug("construct %s deps=[%s] via %s", id, params.map((p) => p.name).join(", "), context.breadcrumb());
      const owner = `constructor of '${id}'`;
      const args = params.map((param) => this.resolveParameter(param, owner, context));

      try {
        return this.introspector.construct(id, args);
      } catch (error) {
        throw new ConstructionError(id, error, context.chain);
      }
    });
  }

  /**
   * Resolves one constructor, method or function parameter.
   * Scalars resolve from a binding named after the parameter;
   * class types from a binding under the type name, then by autowiring.
   */
  resolveParameter(param: ParameterDescriptor, owner: string, context: ResolutionContext): unknown {
    const { type } = param;

    switch (type.kind) {
      case "union":
      case "intersection": {
        const separator = type.kind === "union" ? " | " : " & ";
        throw new ParameterResolutionError(
          owner,
          param.name,
          `${type.kind} types are not supported (${type.members.join(separator)})`,
          context.chain,
        );
      }

      case "none":
        if (param.hasDefault) return param.defaultValue;
        throw new ParameterResolutionError(
          owner,
          param.name,
          "it has no declared type and no default value",
          context.chain,
        );

      case "builtin": {
        const id = this.host.canonicalize(param.name);
        if (this.host.hasBinding(id)) return this.host.resolveCanonical(id, context);
        if (param.hasDefault) return param.defaultValue;
        throw new ParameterResolutionError(
          owner,
          param.name,
          `no binding named '${param.name}' for this ${type.name} parameter and no default value`,
          context.chain,
        );
      }

      case "class": {
        const id = this.host.canonicalize(type.name);
        if (this.host.hasBinding(id)) return this.host.resolveCanonical(id, context);

        const nullDefault = param.nullable && param.hasDefault && param.defaultValue === null;
        if (this.introspect(id, context, () => this.introspector.knows(id))) {
          const instantiable = this.introspect(id, context, () => this.introspector.isInstantiable(id));
          if (instantiable || !nullDefault) return this.resolve(id, context);
        }
        if (nullDefault) return null;
        throw new ParameterResolutionError(
          owner,
          param.name,
          `'${type.name}' is not bound and is not a known type`,
          context.chain,
        );
      }
    }
  }

  /** Runs an introspector call with the current chain attached to any rewrapped failure. */
  introspect<T>(id: string, context: ResolutionContext, call: () => T): T {
    return guardIntrospection(id, call, context.chain);
  }
}
