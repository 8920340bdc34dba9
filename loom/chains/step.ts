import type { ChainContext } from "../context/context.js";
import type { StepAddress } from "./refs.js";

export type Awaitable<T> = T | Promise<T>;

// Method-signature form keeps parameter checking bivariant, so `(x: number) => number`
// is accepted where a step method is expected.
export type StepMethod = { invoke(...args: unknown[]): Awaitable<unknown> }["invoke"];

export type Step = {
  readonly key: string;
  readonly method: StepMethod;
  readonly args: readonly unknown[];
  readonly kwargs: Readonly<Record<string, unknown>>;
  /** Context key for the result; a leading `$` is stripped by `resolveRef`. */
  readonly ref?: string;
  readonly address?: StepAddress;
  /** Symbolic name used when the step is persisted. */
  readonly methodName?: string;
};

export type StepInit = {
  key: string;
  method: StepMethod;
  args?: readonly unknown[];
  kwargs?: Record<string, unknown>;
  ref?: string;
  address?: StepAddress;
  methodName?: string;
};

export function createStep(init: StepInit): Step {
  return Object.freeze({
    key: init.key,
    method: init.method,
    args: Object.freeze([...(init.args ?? [])]),
    kwargs: Object.freeze({ ...(init.kwargs ?? {}) }),
    ref: init.ref,
    address: init.address,
    methodName: init.methodName,
  });
}

/** Keyword arguments travel as a trailing options object, and only when there are any. */
export function callMethod(
  method: StepMethod,
  args: readonly unknown[],
  kwargs: Readonly<Record<string, unknown>>,
): Awaitable<unknown> {
  return Object.keys(kwargs).length > 0 ? method(...args, kwargs) : method(...args);
}

/** Store a result under the step's ref, if it has one. Returns the context key used. */
export function storeResult(context: ChainContext, ref: string | undefined, result: unknown): string | null {
  if (ref === undefined) return null;
  const key = context.resolveRef(ref);
  context.update({ [key]: result });
  return key;
}
