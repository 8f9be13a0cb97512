import "reflect-metadata";
import createDebug from "debug";
import type {
  BuiltinTypeName,
  ParameterDescriptor,
  ParameterType,
  Token,
  TypeDescriptor,
  TypeIntrospector,
} from "@wiregraph/types";
import { ContainerError } from "../errors/container-errors";
import { DESIGN_PARAMTYPES } from "../metadata/constants";
import type { TypeMetadata, TypeReference } from "../metadata/descriptors";
import { getInjectOverrides, getTypeMetadata, tokenToString, typeNameOf } from "../metadata/descriptors";

const debug = createDebug("wiregraph:core:introspector");

const BUILTIN_CONSTRUCTORS = new Map<unknown, BuiltinTypeName>([
  [String, "string"],
  [Number, "number"],
  [Boolean, "boolean"],
  [BigInt, "bigint"],
  [Symbol, "symbol"],
  [Array, "array"],
  [Function, "function"],
]);

type Entry = { kind: "type"; target: TypeReference } | { kind: "interface" };

/**
 * Type Introspector backed by reflect-metadata. Classes become known by name
 * when registered, directly or because a registered type references them.
 *
 * Constructor parameters come from, in order of precedence:
 * 1. `params` given to `@Injectable()` / `defineType()`
 * 2. `design:paramtypes` emitted for decorated classes, with `@Inject()` overrides
 * 3. nothing, for classes whose constructor takes no arguments
 */
export class MetadataTypeIntrospector implements TypeIntrospector {
  private types = new Map<string, Entry>();

  register(target: TypeReference): string {
    const name = typeNameOf(target);
    const existing = this.types.get(name);
    if (existing?.kind === "type" && existing.target === target) return name;

    debug("register %s", name);
    this.types.set(name, { kind: "type", target });
    for (const ref of this.referencesOf(target)) {
      this.register(ref);
    }
    return name;
  }

  declareInterface(name: string): void {
    debug("declare interface %s", name);
    this.types.set(name, { kind: "interface" });
  }

  knows(type: string): boolean {
    return this.types.has(type);
  }

  isInstantiable(type: string): boolean {
    const entry = this.types.get(type);
    if (!entry || entry.kind === "interface") return false;
    return (getTypeMetadata(entry.target)?.kind ?? "class") === "class";
  }

  describe(type: string): TypeDescriptor {
    const entry = this.entry(type);
    if (entry.kind === "interface") return { name: type, kind: "interface" };

    const metadata = getTypeMetadata(entry.target);
    const kind = metadata?.kind ?? "class";
    if (kind !== "class") return { name: type, kind };

    const params = this.parametersOf(type, entry.target, metadata);
    return params === undefined ? { name: type, kind } : { name: type, kind, params };
  }

  constructorParameters(type: string): ParameterDescriptor[] | undefined {
    return this.describe(type).params;
  }

  construct(type: string, args: unknown[]): unknown {
    const entry = this.entry(type);
    if (entry.kind === "interface") {
      throw new ContainerError(`Cannot construct interface '${type}'.`);
    }
    return Reflect.construct(entry.target, args);
  }

  lookup(type: string): TypeReference | undefined {
    const entry = this.types.get(type);
    return entry?.kind === "type" ? entry.target : undefined;
  }

  private entry(type: string): Entry {
    const entry = this.types.get(type);
    if (!entry) {
      throw new ContainerError(`Unknown type '${type}'. Register the class before resolving it by name.`);
    }
    return entry;
  }

  private parametersOf(
    type: string,
    target: TypeReference,
    metadata: TypeMetadata | undefined,
  ): ParameterDescriptor[] | undefined {
    const own = metadata?.params ?? designParameters(target);
    if (own) return own;
    if (target.length > 0) throw undescribed(type);

    // A class without a constructor of its own inherits its parent's.
    for (const ancestor of ancestorsOf(target)) {
      const inherited = getTypeMetadata(ancestor)?.params ?? designParameters(ancestor);
      if (inherited) return inherited;
      if (ancestor.length > 0) throw undescribed(type);
    }
    return undefined;
  }

  private referencesOf(target: TypeReference): TypeReference[] {
    const refs: TypeReference[] = [];
    for (const type of [target, ...ancestorsOf(target)]) {
      for (const spec of getTypeMetadata(type)?.params ?? []) {
        refs.push(...(spec.references ?? []));
      }

      const designTypes: unknown[] = Reflect.getOwnMetadata(DESIGN_PARAMTYPES, type) ?? [];
      for (const designType of designTypes) {
        if (isClassReference(designType)) refs.push(designType);
      }
      for (const token of getInjectOverrides(type).values()) {
        if (typeof token === "function") refs.push(token);
      }
    }
    return refs;
  }
}

function isClassReference(value: unknown): value is TypeReference {
  return typeof value === "function" && value !== Object && !BUILTIN_CONSTRUCTORS.has(value);
}

function ancestorsOf(target: TypeReference): TypeReference[] {
  const ancestors: TypeReference[] = [];
  let parent: unknown = Object.getPrototypeOf(target);
  while (isClassReference(parent) && parent !== Function.prototype) {
    ancestors.push(parent);
    parent = Object.getPrototypeOf(parent);
  }
  return ancestors;
}

function designParameters(target: TypeReference): ParameterDescriptor[] | undefined {
  const designTypes: unknown[] | undefined = Reflect.getOwnMetadata(DESIGN_PARAMTYPES, target);
  if (!designTypes) return undefined;
  const overrides = getInjectOverrides(target);
  return designTypes.map((designType, index) => fromDesignType(designType, index, overrides.get(index)));
}

function undescribed(type: string): ContainerError {
  return new ContainerError(
    `Class ${type} has constructor parameters but no descriptor. ` +
      "Decorate it with @Injectable() or register its parameters with defineType().",
  );
}

function fromDesignType(designType: unknown, index: number, override: Token | undefined): ParameterDescriptor {
  const builtin = BUILTIN_CONSTRUCTORS.get(designType);
  const name = typeof override === "string" && builtin ? override : `arg${index}`;

  let type: ParameterType;
  if (override !== undefined && !(typeof override === "string" && builtin)) {
    type = { kind: "class", name: tokenToString(override) };
  } else if (builtin) {
    type = { kind: "builtin", name: builtin };
  } else if (isClassReference(designType)) {
    type = { kind: "class", name: typeNameOf(designType) };
  } else {
    // Interfaces, unions and unresolved forward references all erase to Object/undefined.
    type = { kind: "none" };
  }

  return { name, type, hasDefault: false, nullable: false };
}
