import { ChainContext } from "../context/context.js";
import type { ContextValues } from "../context/context.js";
import { formatValue } from "../context/expression.js";
import { LoomError, ERR, errorMessage } from "../core/errors.js";
import type { LoomLogger } from "../core/logger.js";
import type { Agent } from "../agents/types.js";
import { withSystemContext } from "../agents/scoped.js";
import type { ChainTracer } from "../engine/tracer.js";
import { isEmptyCell } from "../matrix/prompt-matrix.js";
import type { MatrixShape, PromptMatrix } from "../matrix/prompt-matrix.js";
import { ResponseMatrix } from "../matrix/response-matrix.js";
import { formatRef, parseRef, stepKey } from "./refs.js";
import type { StepAddress } from "./refs.js";
import { MethodRegistry } from "./registry.js";
import { assertPermutation, identityResolver } from "./resolvers.js";
import type { DependencyResolver } from "./resolvers.js";
import { hydrateStep, parseSnapshot, serializeStep } from "./snapshot.js";
import type { MatrixSnapshot } from "./snapshot.js";
import { callMethod, createStep, storeResult } from "./step.js";
import type { Step } from "./step.js";

export const INVOKE_AGENT = "matrix.invokeAgent";

export type ChainStatus = "unbuilt" | "built" | "running" | "complete";

export type MatrixChainOptions = {
  context?: ChainContext | ContextValues;
  resolver?: DependencyResolver;
  logger?: LoomLogger;
  tracer?: ChainTracer;
};

export type StepCompletion = {
  index: number;
  key: string;
  /** Context key the result was stored under. */
  ref: string | null;
  /** Response-matrix cell written, if any. */
  address: StepAddress | null;
  result: unknown;
};

export type NextStepResult =
  | { done: true }
  | { done: false; completion: StepCompletion; remaining: number };

export type ChainDescription = {
  shape: MatrixShape;
  status: ChainStatus;
  cursor: number;
  steps: Array<{ key: string; ref: string | null; address: StepAddress | null }>;
};

/**
 * Runs a prompt matrix against its agents, column by column.
 *
 * `buildDependencies()` turns every non-empty cell into a step, ordering each
 * column's agents with the resolver. Execution is cursor driven: `execute()` runs
 * to the end, `executeNextStep()` runs one step. A step that throws leaves the
 * cursor where it was, so calling again retries that same step; agent calls must
 * tolerate being repeated.
 */
export class MatrixChain {
  readonly context: ChainContext;
  readonly prompts: PromptMatrix;
  readonly agents: readonly Agent[];
  readonly methods = new MethodRegistry();

  private _responses: ResponseMatrix;
  private steps: Step[] = [];
  private cursor = 0;
  private built = false;

  private readonly resolver: DependencyResolver;
  private readonly logger: LoomLogger;
  private readonly tracer?: ChainTracer;

  constructor(prompts: PromptMatrix, agents: readonly Agent[], opts: MatrixChainOptions = {}) {
    this.prompts = prompts;
    this.agents = agents;
    this.assertShape(prompts.shape);

    this.resolver = opts.resolver ?? identityResolver;
    this.logger = opts.logger ?? {};
    this.tracer = opts.tracer;
    this.context =
      opts.context instanceof ChainContext ? opts.context : new ChainContext(opts.context, { logger: this.logger });
    this._responses = new ResponseMatrix(prompts.shape);

    this.methods.register(INVOKE_AGENT, (agentIndex: number, prompt: string, ref: string) =>
      this.invokeAgent(agentIndex, prompt, ref),
    );
  }

  get responses(): ResponseMatrix {
    return this._responses;
  }

  get currentStepIndex(): number {
    return this.cursor;
  }

  get status(): ChainStatus {
    if (!this.built) return "unbuilt";
    if (this.cursor >= this.steps.length) return "complete";
    return this.cursor === 0 ? "built" : "running";
  }

  getSteps(): readonly Step[] {
    return this.steps;
  }

  async buildDependencies(): Promise<readonly Step[]> {
    // the prompt matrix is the caller's and may have gained or lost rows since construction
    this.assertShape(this._responses.shape);

    const steps: Step[] = [];
    const invoke = this.methods.require(INVOKE_AGENT);

    for (let stepIndex = 0; stepIndex < this.prompts.columnCount; stepIndex++) {
      const column = this.prompts.getColumn(stepIndex);

      let order: readonly number[];
      try {
        order = await this.resolver(column, stepIndex);
        assertPermutation(order, column.length);
      } catch (e) {
        // one bad column must not sink the build
        this.logger.warn?.(`dependency resolution failed for column ${stepIndex}`, { error: errorMessage(e) });
        await this.tracer?.record("column.skipped", { stepIndex, error: errorMessage(e) });
        continue;
      }

      for (const agentIndex of order) {
        const prompt = column[agentIndex];
        if (isEmptyCell(prompt)) continue;

        const address = { agentIndex, stepIndex };
        const ref = formatRef(address);
        steps.push(
          createStep({
            key: stepKey(address),
            method: invoke,
            methodName: INVOKE_AGENT,
            args: [agentIndex, prompt, ref],
            ref,
            address,
          }),
        );
      }
    }

    this.steps = steps;
    this.cursor = 0;
    this.built = true;
    this.logger.debug?.(`built ${steps.length} steps`, { shape: this.prompts.shape });
    await this.tracer?.record("chain.built", { steps: steps.length, shape: [...this.prompts.shape] });
    return this.steps;
  }

  /**
   * Run the remaining steps. With `buildDependencies` (the default) the step list
   * is rebuilt first and execution starts over from the first step.
   */
  async execute(opts: { buildDependencies?: boolean } = {}): Promise<ResponseMatrix> {
    if (opts.buildDependencies ?? true) await this.buildDependencies();
    let next = await this.executeNextStep();
    while (!next.done) next = await this.executeNextStep();
    return this._responses;
  }

  async executeNextStep(): Promise<NextStepResult> {
    if (!this.built) await this.buildDependencies();

    const step = this.steps[this.cursor];
    if (!step) return { done: true };

    const completion = await this.runStep(step, this.cursor);
    this.cursor++;

    const { index, key, ref, address } = completion;
    await this.tracer?.record("step.completed", { index, key, ref, address });
    if (this.cursor === this.steps.length) {
      await this.tracer?.record("chain.completed", { steps: this.steps.length });
    }
    return { done: false, completion, remaining: this.steps.length - this.cursor };
  }

  /** One completion per executed step; stops when the chain is complete. */
  async *stream(opts: { buildDependencies?: boolean } = {}): AsyncGenerator<StepCompletion, void, undefined> {
    if (opts.buildDependencies ?? true) await this.buildDependencies();
    for (let next = await this.executeNextStep(); !next.done; next = await this.executeNextStep()) {
      yield next.completion;
    }
  }

  /**
   * Per-step routine bound into every built step: resolve the prompt, swap in the
   * agent's resolved system context for the duration of the call, return the text.
   */
  async invokeAgent(agentIndex: number, prompt: string, ref: string): Promise<string> {
    const agent = this.agents[agentIndex];
    if (!agent) {
      throw new LoomError(ERR.UNKNOWN_AGENT, `no agent at index ${agentIndex}`, { agentIndex, ref });
    }

    const resolvedPrompt = this.context.resolvePlaceholders(prompt);
    const resolvedSystem = this.context.resolvePlaceholders(agent.systemContext);

    this.logger.debug?.(`dispatching ${ref}`, { agentIndex, agent: agent.name });
    return withSystemContext(agent, resolvedSystem, () => agent.exec(resolvedPrompt));
  }

  snapshot(): MatrixSnapshot {
    return {
      version: 1,
      built: this.built,
      cursor: this.cursor,
      steps: this.steps.map((step) => serializeStep(step, this.methods)),
      context: this.context.toJSON(),
      responses: this._responses.rows(),
    };
  }

  /** Load state saved by `snapshot()`; context values are merged into the current context. */
  restore(value: unknown): void {
    const snapshot = parseSnapshot(value);

    let responses: ResponseMatrix;
    try {
      responses = ResponseMatrix.fromRows(this._responses.shape, snapshot.responses);
    } catch (e) {
      throw new LoomError(ERR.INVALID_CHECKPOINT, "snapshot responses do not fit this chain", {
        shape: this._responses.shape,
        error: errorMessage(e),
      });
    }

    const steps = snapshot.steps.map((data) => hydrateStep(data, this.methods));

    this.steps = steps;
    this.cursor = snapshot.cursor;
    this.built = snapshot.built;
    this._responses = responses;
    this.context.update(snapshot.context);
  }

  describe(): ChainDescription {
    return {
      shape: this.prompts.shape,
      status: this.status,
      cursor: this.cursor,
      steps: this.steps.map((step) => ({
        key: step.key,
        ref: step.ref ?? null,
        address: step.address ?? null,
      })),
    };
  }

  private assertShape(expected: MatrixShape): void {
    const [rows, columns] = this.prompts.shape;
    if (rows !== this.agents.length || rows !== expected[0] || columns !== expected[1]) {
      throw new LoomError(ERR.MATRIX_SHAPE, `prompt matrix is ${rows}x${columns} for ${this.agents.length} agents`, {
        shape: this.prompts.shape,
        expected,
        agents: this.agents.length,
      });
    }
  }

  private async runStep(step: Step, index: number): Promise<StepCompletion> {
    await this.tracer?.record("step.started", { index, key: step.key });

    let result: unknown;
    try {
      result = await callMethod(step.method, step.args, step.kwargs);
    } catch (e) {
      this.logger.error?.(`step ${step.key} failed`, { index, error: errorMessage(e) });
      await this.tracer?.record("step.failed", { index, key: step.key, error: errorMessage(e) });
      throw e;
    }

    const storedAs = storeResult(this.context, step.ref, result);

    // typed address first; refs are only parsed for steps that carry none
    const address = step.address ?? (step.ref === undefined ? null : parseRef(step.ref));
    if (address) this._responses.set(address, formatValue(result));

    return { index, key: step.key, ref: storedAs, address, result };
  }
}
