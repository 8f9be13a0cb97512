import { CircularDependencyError, formatChain } from "../errors/container-errors";

/**
 * Stack of canonical ids under construction for one top-level call.
 * Created per `get`/`invoke*` call and never stored on the container,
 * so independent resolutions cannot see each other's frames.
 */
export class ResolutionContext {
  private readonly stack: string[] = [];

  push(id: string): void {
    if (this.stack.includes(id)) {
      throw new CircularDependencyError(id, this.stack);
    }
    this.stack.push(id);
  }

  pop(): void {
    this.stack.pop();
  }

  /** Runs `fn` inside a frame for `id`; the frame is popped however `fn` exits. */
  within<T>(id: string, fn: () => T): T {
    this.push(id);
    try {
      return fn();
    } finally {
      this.pop();
    }
  }

  get chain(): readonly string[] {
    return [...this.stack];
  }

  breadcrumb(): string {
    return formatChain(this.stack);
  }
}
