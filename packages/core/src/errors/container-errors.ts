export type ContainerErrorKind =
  | "ContainerError"
  | "NotFound"
  | "BindingError"
  | "AliasError"
  | "AliasCycle"
  | "CircularDependency"
  | "NotInstantiable"
  | "ParameterResolutionError"
  | "FactoryError"
  | "ConstructionError";

export type ContainerErrorOptions = {
  cause?: unknown;
  chain?: readonly string[];
};

export function formatChain(chain: readonly string[]): string {
  return chain.length > 0 ? chain.join(" -> ") : "(root)";
}

/**
 * Base class for every failure the container raises.
 * `chain` is the resolution stack at the point of failure, outermost first.
 */
export class ContainerError extends Error {
  readonly kind: ContainerErrorKind = "ContainerError";
  readonly chain: readonly string[];

  constructor(message: string, options: ContainerErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ContainerError";
    this.chain = options.chain ?? [];
  }
}

export class NotFoundError extends ContainerError {
  override readonly kind = "NotFound";

  constructor(public readonly id: string) {
    super(`No binding found for '${id}' and it does not name a resolvable type.`);
    this.name = "NotFoundError";
  }
}

export class BindingError extends ContainerError {
  override readonly kind: ContainerErrorKind = "BindingError";

  constructor(
    public readonly id: string,
    message: string,
  ) {
    super(message);
    this.name = "BindingError";
  }
}

export class AliasError extends BindingError {
  override readonly kind: ContainerErrorKind = "AliasError";

  constructor(alias: string, message = `Alias '${alias}' cannot point to itself.`) {
    super(alias, message);
    this.name = "AliasError";
  }
}

export class AliasCycleError extends AliasError {
  override readonly kind = "AliasCycle";

  constructor(public readonly aliases: readonly string[]) {
    super(aliases[0] ?? "", `Alias cycle detected: ${aliases.join(" -> ")}`);
    this.name = "AliasCycleError";
  }
}

export class CircularDependencyError extends ContainerError {
  override readonly kind = "CircularDependency";

  constructor(
    public readonly id: string,
    stack: readonly string[],
  ) {
    const chain = [...stack, id];
    super(`Circular dependency detected: ${formatChain(chain)}`, { chain });
    this.name = "CircularDependencyError";
  }
}

export type NotInstantiableReason = "interface" | "abstract";

export class NotInstantiableError extends ContainerError {
  override readonly kind = "NotInstantiable";

  constructor(
    public readonly id: string,
    public readonly reason: NotInstantiableReason,
    chain: readonly string[],
  ) {
    const what = reason === "interface" ? "an interface" : "an abstract class";
    super(`Cannot instantiate '${id}': it is ${what}. Resolution chain: ${formatChain(chain)}`, {
      chain,
    });
    this.name = "NotInstantiableError";
  }
}

export class ParameterResolutionError extends ContainerError {
  override readonly kind = "ParameterResolutionError";

  constructor(
    public readonly target: string,
    public readonly parameter: string,
    reason: string,
    chain: readonly string[] = [],
  ) {
    super(`Cannot resolve parameter '${parameter}' of ${target}: ${reason}`, { chain });
    this.name = "ParameterResolutionError";
  }
}

export class FactoryError extends ContainerError {
  override readonly kind = "FactoryError";

  constructor(
    public readonly id: string,
    cause: unknown,
  ) {
    super(`Factory for '${id}' threw: ${describeCause(cause)}`, { cause });
    this.name = "FactoryError";
  }
}

export class ConstructionError extends ContainerError {
  override readonly kind = "ConstructionError";

  constructor(
    public readonly id: string,
    cause: unknown,
    chain: readonly string[],
  ) {
    super(
      `Failed to create an instance of '${id}': ${describeCause(cause)}. Resolution chain: ${formatChain(chain)}`,
      { cause, chain },
    );
    this.name = "ConstructionError";
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
