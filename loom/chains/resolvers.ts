import { LoomError, ERR } from "../core/errors.js";
import type { PromptCell } from "../matrix/prompt-matrix.js";
import type { Awaitable } from "./step.js";

/**
 * Orders the agents of one column. Receives the column vector (one cell per agent)
 * and returns agent indices in execution order.
 */
export type DependencyResolver = (
  column: readonly PromptCell[],
  columnIndex: number,
) => Awaitable<readonly number[]>;

/** Ascending agent index. */
export const identityResolver: DependencyResolver = (column) => column.map((_, agentIndex) => agentIndex);

/** Throws unless `order` is a permutation of `0..size-1`. */
export function assertPermutation(order: readonly number[], size: number): void {
  const seen = new Set<number>();
  for (const i of order) {
    if (!Number.isInteger(i) || i < 0 || i >= size || seen.has(i)) {
      throw new LoomError(ERR.INVALID_ORDER, "resolver order is not a permutation of agent indices", { order, size });
    }
    seen.add(i);
  }
  if (seen.size !== size) {
    throw new LoomError(ERR.INVALID_ORDER, "resolver order is missing agents", { order, size });
  }
}
