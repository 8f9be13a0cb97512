import { ContainerError } from "./container-errors";

export type ExplainedError = {
  kind: string;
  message: string;
};

/**
 * Flattens an error and its `cause` links into an ordered list,
 * outermost failure first and root cause last.
 *
 * @example
 * explain(err)
 * // [
 * //   { kind: "FactoryError", message: "Factory for 'mailer' threw: ..." },
 * //   { kind: "FactoryError", message: "Factory for 'smtp' threw: refused" },
 * //   { kind: "Error", message: "refused" },
 * // ]
 */
export function explain(error: unknown): ExplainedError[] {
  const entries: ExplainedError[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    if (current instanceof ContainerError) {
      entries.push({ kind: current.kind, message: current.message });
    } else if (current instanceof Error) {
      entries.push({ kind: current.name, message: current.message });
    } else {
      entries.push({ kind: typeof current, message: String(current) });
      break;
    }
    current = current.cause;
  }

  return entries;
}
