import { AliasCycleError, AliasError } from "../errors/container-errors";

/**
 * Alias table. Targets may themselves be aliases or not yet bound;
 * chains are followed (and checked for cycles) only when canonicalizing.
 */
export class AliasResolver {
  private aliases = new Map<string, string>();

  set(alias: string, target: string): void {
    if (alias === target) {
      throw new AliasError(alias);
    }
    this.aliases.set(alias, target);
  }

  canonicalize(id: string): string {
    const seen = new Set<string>();
    const path: string[] = [];
    let current = id;

    let target = this.aliases.get(current);
    while (target !== undefined) {
      if (seen.has(current)) {
        throw new AliasCycleError([...path, current]);
      }
      seen.add(current);
      path.push(current);
      current = target;
      target = this.aliases.get(current);
    }

    return current;
  }

  delete(alias: string): boolean {
    return this.aliases.delete(alias);
  }

  clear(): void {
    this.aliases.clear();
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.aliases);
  }
}
