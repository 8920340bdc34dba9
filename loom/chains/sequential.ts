import { ChainContext } from "../context/context.js";
import type { ContextValues } from "../context/context.js";
import type { LoomLogger } from "../core/logger.js";
import { errorMessage } from "../core/errors.js";
import type { ChainTracer } from "../engine/tracer.js";
import { callMethod, storeResult } from "./step.js";
import type { Step } from "./step.js";

export type SequentialChainOptions = {
  context?: ChainContext | ContextValues;
  logger?: LoomLogger;
  tracer?: ChainTracer;
};

/**
 * Steps run front to back. Each step's args and kwargs have their placeholders
 * resolved just before the call, so a step sees every result stored before it.
 */
export class SequentialChain {
  readonly context: ChainContext;
  private readonly steps: Step[];
  private readonly logger: LoomLogger;
  private readonly tracer?: ChainTracer;

  constructor(steps: Step[] = [], opts: SequentialChainOptions = {}) {
    this.logger = opts.logger ?? {};
    this.tracer = opts.tracer;
    this.context =
      opts.context instanceof ChainContext ? opts.context : new ChainContext(opts.context, { logger: this.logger });
    this.steps = [...steps];
  }

  addStep(step: Step): this {
    this.steps.push(step);
    return this;
  }

  getSteps(): readonly Step[] {
    return this.steps;
  }

  async execute(initial: ContextValues = {}): Promise<ChainContext> {
    this.context.update(initial);

    for (const step of this.steps) {
      const args = this.context.resolvePlaceholders(step.args);
      const kwargs = this.context.resolvePlaceholders(step.kwargs);

      await this.tracer?.record("step.started", { key: step.key });
      let result: unknown;
      try {
        result = await callMethod(step.method, args, kwargs);
      } catch (e) {
        this.logger.error?.(`step ${step.key} failed`, { error: errorMessage(e) });
        await this.tracer?.record("step.failed", { key: step.key, error: errorMessage(e) });
        throw e;
      }

      const storedAs = storeResult(this.context, step.ref, result);
      await this.tracer?.record("step.completed", { key: step.key, ref: storedAs });
    }

    return this.context;
  }
}
