import type { Awaitable, StepMethod } from "./step.js";
import { callMethod } from "./step.js";

export type CallableLink = {
  readonly fn: StepMethod;
  readonly args: readonly unknown[];
  readonly kwargs: Readonly<Record<string, unknown>>;
};

/**
 * Context-free pipeline: each callable's result becomes the first argument of
 * the next one, ahead of that callable's own args. A null or undefined result
 * is not forwarded.
 */
export class CallableChain {
  private readonly links: CallableLink[];

  constructor(links: readonly CallableLink[] = []) {
    this.links = [...links];
  }

  static compose(...chains: CallableChain[]): CallableChain {
    return chains.reduce((acc, chain) => acc.concat(chain), new CallableChain());
  }

  get length(): number {
    return this.links.length;
  }

  addCallable<A extends unknown[]>(
    fn: (...args: A) => Awaitable<unknown>,
    args: readonly unknown[] = [],
    kwargs: Record<string, unknown> = {},
  ): this {
    this.links.push({ fn, args: [...args], kwargs: { ...kwargs } });
    return this;
  }

  /** New chain running this chain's callables, then `other`'s. */
  concat(other: CallableChain): CallableChain {
    return new CallableChain([...this.links, ...other.links]);
  }

  /** `initialArgs` go in front of the first callable's own args. */
  async invoke(...initialArgs: unknown[]): Promise<unknown> {
    let result: unknown = undefined;

    for (const [i, link] of this.links.entries()) {
      const lead = i === 0 ? initialArgs : result == null ? [] : [result];
      result = await callMethod(link.fn, [...lead, ...link.args], link.kwargs);
    }

    return result;
  }

  async batch(requests: ReadonlyArray<readonly unknown[]>): Promise<unknown[]> {
    const results: unknown[] = [];
    for (const args of requests) {
      results.push(await this.invoke(...args));
    }
    return results;
  }
}
