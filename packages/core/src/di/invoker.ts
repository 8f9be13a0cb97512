import createDebug from "debug";
import type { AnyFunction, NamedOverrides, ParameterDescriptor, Token, TypeIntrospector } from "@wiregraph/types";
import { ConstructionError, ContainerError, NotInstantiableError } from "../errors/container-errors";
import type { TypeReference } from "../metadata/descriptors";
import { getFunctionParameters, getMethodParameters } from "../metadata/descriptors";
import type { AutowireResolver, ResolutionHost } from "./autowire";
import type { ResolutionContext } from "./resolution-context";

const debug = createDebug("wiregraph:core:invoker");

function isTypeReference(value: unknown): value is TypeReference {
  return typeof value === "function";
}

/**
 * Calls methods and free functions with their parameters supplied from
 * named overrides first and container resolution second.
 */
export class Invoker {
  constructor(
    private readonly introspector: TypeIntrospector,
    private readonly autowire: AutowireResolver,
    private readonly host: ResolutionHost,
  ) {}

  invokeMethod(
    target: object | Token,
    method: string,
    overrides: NamedOverrides,
    context: ResolutionContext,
  ): unknown {
    const { receiver, name } = this.receiverOf(target, context);
    const fn: unknown = Reflect.get(receiver, method);
    if (typeof fn !== "function") {
      throw new ContainerError(`Method ${method} does not exist in class ${name}.`);
    }

    const owner = `${name}.${method}()`;
    debug("invoke %s", owner);
    const args = this.argumentsFor(getMethodParameters(receiver, method), fn.length, owner, overrides, context);
    return Reflect.apply(fn, receiver, args);
  }

  invokeFunction(fn: AnyFunction, overrides: NamedOverrides, context: ResolutionContext): unknown {
    const owner = `function ${fn.name || "(anonymous)"}()`;
    debug("invoke %s", owner);
    const args = this.argumentsFor(getFunctionParameters(fn), fn.length, owner, overrides, context);
    return fn(...args);
  }

  /**
   * An instance is used as is. For a class or type name the receiver is the
   * explicit binding when there is one; otherwise the type is constructed with
   * no arguments and its own constructor dependencies are not resolved.
   */
  private receiverOf(target: object | Token, context: ResolutionContext): { receiver: object; name: string } {
    let typeId: string;
    if (typeof target === "string") {
      typeId = target;
    } else if (isTypeReference(target)) {
      typeId = this.autowire.introspect(target.name, context, () => this.introspector.register(target));
    } else {
      return { receiver: target, name: target.constructor.name };
    }

    const id = this.host.canonicalize(typeId);

    if (this.host.hasBinding(id)) {
      const bound = this.host.resolveCanonical(id, context);
      if (typeof bound !== "object" || bound === null) {
        throw new ContainerError(`Binding '${id}' did not produce an object to invoke methods on.`);
      }
      return { receiver: bound, name: id };
    }

    if (!this.autowire.introspect(id, context, () => this.introspector.knows(id))) {
      throw new ContainerError(`Class ${id} does not exist.`);
    }

    const descriptor = this.autowire.introspect(id, context, () => this.introspector.describe(id));
    if (descriptor.kind !== "class") {
      throw new NotInstantiableError(id, descriptor.kind, context.chain);
    }

    let receiver: unknown;
    try {
      receiver = this.introspector.construct(id, []);
    } catch (error) {
      throw new ConstructionError(id, error, [...context.chain, id]);
    }
    if (typeof receiver !== "object" || receiver === null) {
      throw new ContainerError(`Constructing '${id}' did not produce an object.`);
    }
    return { receiver, name: id };
  }

  private argumentsFor(
    params: ParameterDescriptor[] | undefined,
    arity: number,
    owner: string,
    overrides: NamedOverrides,
    context: ResolutionContext,
  ): unknown[] {
    if (!params) {
      if (arity === 0) return [];
      throw new ContainerError(
        `${owner} takes ${arity} parameter(s) but has no parameter descriptor. ` +
          "Declare them with @Method(), defineMethod() or defineFunction().",
      );
    }

    return params.map((param) =>
      Object.hasOwn(overrides, param.name)
        ? overrides[param.name]
        : this.autowire.resolveParameter(param, owner, context),
    );
  }
}
