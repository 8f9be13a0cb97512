import "reflect-metadata";
import createDebug from "debug";
import type {
  AnyFunction,
  BindingInfo,
  BindingSource,
  Lifetime,
  NamedOverrides,
  ObjectContainer,
  Resolver,
  Token,
  TypeIntrospector,
} from "@wiregraph/types";
import { AliasCycleError, FactoryError, NotFoundError } from "../errors/container-errors";
import { guardIntrospection } from "../introspection/guard";
import { MetadataTypeIntrospector } from "../introspection/metadata-introspector";
import type { TypeReference } from "../metadata/descriptors";
import { AliasResolver } from "./alias-resolver";
import type { ResolutionHost } from "./autowire";
import { AutowireResolver } from "./autowire";
import type { Binding, BindingTypes } from "./binding-registry";
import { BindingRegistry, createBinding } from "./binding-registry";
import { Invoker } from "./invoker";
import { ResolutionContext } from "./resolution-context";

const debug = createDebug("wiregraph:core:container");

export type ContainerOptions = {
  /** Defaults to a fresh reflect-metadata backed introspector. */
  introspector?: TypeIntrospector;
  /** Shown in debug output to tell several containers apart. */
  name?: string;
};

/**
 * In-process object-graph resolver.
 *
 * Ids are canonicalized through the alias table, then produced from an
 * explicit binding or, for known types, by autowiring constructor parameters.
 * Every top-level call gets its own resolution context for cycle detection.
 *
 * @example
 * const container = new Container();
 * container.set("port", 8080);
 * container.singleton(HttpServer);
 * container.setAlias("server", HttpServer);
 * container.get("server") === container.get(HttpServer); // true
 */
export class Container implements ObjectContainer {
  readonly name: string;
  private readonly introspector: TypeIntrospector;
  private readonly aliases = new AliasResolver();
  private readonly registry = new BindingRegistry();
  private readonly autowire: AutowireResolver;
  private readonly invoker: Invoker;
  private readonly bindingTypes: BindingTypes = {
    knows: (type) => guardIntrospection(type, () => this.introspector.knows(type)),
    register: (target) => this.registerType(target),
  };

  constructor(options: ContainerOptions = {}) {
    this.name = options.name ?? "container";
    this.introspector = options.introspector ?? new MetadataTypeIntrospector();

    const host: ResolutionHost = {
      canonicalize: (id) => this.aliases.canonicalize(id),
      hasBinding: (id) => this.registry.has(id),
      resolveCanonical: (id, context) => this.resolveCanonical(id, context),
    };
    this.autowire = new AutowireResolver(this.introspector, host);
    this.invoker = new Invoker(this.introspector, this.autowire, host);
  }

  /** Makes a class known by name without binding it. Returns the type name. */
  registerType(target: TypeReference): string {
    return guardIntrospection(target.name, () => this.introspector.register(target));
  }

  /** Declares a name as an interface: known, never instantiable. */
  declareInterface(name: string): void {
    guardIntrospection(name, () => this.introspector.declareInterface(name));
  }

  get<T = unknown>(token: Token<T>): T {
    return this.resolveToken(token, new ResolutionContext()) as T;
  }

  /** An alias cycle makes an id unresolvable, so it reports `false` here rather than throwing. */
  has(token: Token): boolean {
    const id = this.resolvableId(token);
    if (id === undefined) return false;
    if (this.registry.has(id)) return true;
    const context = new ResolutionContext();
    return (
      this.autowire.introspect(id, context, () => this.introspector.knows(id)) &&
      this.autowire.introspect(id, context, () => this.introspector.isInstantiable(id))
    );
  }

  hasBinding(token: Token): boolean {
    const id = this.resolvableId(token);
    return id !== undefined && this.registry.has(id);
  }

  set<T>(token: Token<T>, source?: BindingSource<T>): void {
    this.bind(token, source, "transient");
  }

  singleton<T>(token: Token<T>, source?: BindingSource<T>): void {
    this.bind(token, source, "singleton");
  }

  /** Registers an already built object as a singleton. */
  instance<T>(token: Token<T>, value: T): void {
    const id = this.idOf(token);
    debug("%s: instance %s", this.name, id);
    this.aliases.delete(id);
    this.registry.register(id, { kind: "value", lifetime: "singleton", value });
    this.registry.storeOnce(id, value);
  }

  setAlias(alias: string, target: Token): void {
    const targetId = this.idOf(target);
    this.aliases.set(alias, targetId);
    this.registry.delete(alias);
    debug("%s: alias %s → %s", this.name, alias, targetId);
  }

  /** Removes the binding, cached instance and alias registered under this exact id. */
  forget(token: Token): void {
    const id = this.idOf(token);
    debug("%s: forget %s", this.name, id);
    this.registry.delete(id);
    this.aliases.delete(id);
  }

  /** Evicts a cached singleton; the binding stays and builds a new one on next `get`. */
  forgetInstance(token: Token): void {
    this.registry.evict(this.canonicalId(token));
  }

  clear(): void {
    debug("%s: clear", this.name);
    this.registry.clear();
    this.aliases.clear();
  }

  isResolved(token: Token): boolean {
    return this.registry.hasInstance(this.canonicalId(token));
  }

  bindings(): { bindings: BindingInfo[]; aliases: Record<string, string> } {
    return { bindings: this.registry.describe(), aliases: this.aliases.entries() };
  }

  invokeMethod(target: object | Token, method: string, overrides: NamedOverrides = {}): unknown {
    return this.invoker.invokeMethod(target, method, overrides, new ResolutionContext());
  }

  invokeFunction(fn: AnyFunction, overrides: NamedOverrides = {}): unknown {
    return this.invoker.invokeFunction(fn, overrides, new ResolutionContext());
  }

  private bind<T>(token: Token<T>, source: BindingSource<T>, lifetime: Lifetime): void {
    const id = this.idOf(token);
    const binding = createBinding(id, source, lifetime, this.bindingTypes);
    debug("%s: %s %s (%s)", this.name, lifetime, id, binding.kind);
    this.aliases.delete(id);
    this.registry.register(id, binding);
  }

  private idOf(token: Token): string {
    return typeof token === "string" ? token : this.registerType(token);
  }

  private canonicalId(token: Token): string {
    return this.aliases.canonicalize(this.idOf(token));
  }

  private resolvableId(token: Token): string | undefined {
    try {
      return this.canonicalId(token);
    } catch (error) {
      if (error instanceof AliasCycleError) return undefined;
      throw error;
    }
  }

  private resolveToken(token: Token, context: ResolutionContext): unknown {
    return this.resolveCanonical(this.canonicalId(token), context);
  }

  private resolveCanonical(id: string, context: ResolutionContext): unknown {
    const binding = this.registry.get(id);
    if (binding) return this.produce(id, binding, context);

    if (this.autowire.introspect(id, context, () => this.introspector.knows(id))) {
      debug("%s: resolve %s → autowire", this.name, id);
      return this.autowire.resolve(id, context);
    }

    throw new NotFoundError(id);
  }

  private produce(id: string, binding: Binding, context: ResolutionContext): unknown {
    if (binding.lifetime === "singleton" && this.registry.hasInstance(id)) {
      debug("%s: resolve %s → cached", this.name, id);
      return this.registry.instance(id);
    }

    debug("%s: resolve %s → %s", this.name, id, binding.kind);
    const value = this.build(id, binding, context);
    return binding.lifetime === "singleton" ? this.registry.storeOnce(id, value) : value;
  }

  private build(id: string, binding: Binding, context: ResolutionContext): unknown {
    switch (binding.kind) {
      case "value":
        return binding.value;
      case "autowire":
        return this.autowire.resolve(binding.type, context);
      case "factory":
        return context.within(id, () => {
          try {
            return binding.factory(this.resolverFor(context));
          } catch (error) {
            throw new FactoryError(id, error);
          }
        });
    }
  }

  /** The view factories receive: resolutions share the caller's context. */
  private resolverFor(context: ResolutionContext): Resolver {
    return {
      get: <T>(token: Token<T>): T => this.resolveToken(token, context) as T,
      has: (token) => this.has(token),
      hasBinding: (token) => this.hasBinding(token),
      invokeMethod: (target, method, overrides = {}) =>
        this.invoker.invokeMethod(target, method, overrides, context),
      invokeFunction: (fn, overrides = {}) => this.invoker.invokeFunction(fn, overrides, context),
    };
  }
}
