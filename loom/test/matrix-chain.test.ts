import { describe, it, expect, vi } from "vitest";
import { INVOKE_AGENT, MatrixChain } from "../chains/matrix.js";
import type { MatrixSnapshot } from "../chains/snapshot.js";
import { ERR } from "../core/errors.js";
import { MemoryTracer } from "../engine/tracer.js";
import type { ChainTracer } from "../engine/tracer.js";
import { PromptMatrix } from "../matrix/prompt-matrix.js";
import { FailingTracer, ScriptedAgent, agents, flakyReply, thrownCode } from "./harness.js";

function grid(rows: number, columns: number): PromptMatrix {
  return new PromptMatrix(
    Array.from({ length: rows }, (_, a) => Array.from({ length: columns }, (_, s) => `p${a}${s}`)),
  );
}

function greetingChain(): { chain: MatrixChain; team: ScriptedAgent[] } {
  const team = agents("a0", "a1");
  const prompts = new PromptMatrix([
    ["Hello {name}", "Follow {Agent_1_Step_0_response}"],
    ["Hi {name}", null],
  ]);
  return { chain: new MatrixChain(prompts, team, { context: { name: "Ada" } }), team };
}

function serialize(snapshot: MatrixSnapshot): unknown {
  return JSON.parse(JSON.stringify(snapshot));
}

describe("MatrixChain.buildDependencies", () => {
  it("orders steps column by column, agents ascending", async () => {
    const chain = new MatrixChain(grid(2, 3), agents("a", "b"));
    const steps = await chain.buildDependencies();

    expect(steps.map((s) => s.key)).toEqual([
      "Agent_0_Step_0",
      "Agent_1_Step_0",
      "Agent_0_Step_1",
      "Agent_1_Step_1",
      "Agent_0_Step_2",
      "Agent_1_Step_2",
    ]);
    expect(steps[1]?.args).toEqual([1, "p10", "Agent_1_Step_0_response"]);
    expect(steps[1]?.address).toEqual({ agentIndex: 1, stepIndex: 0 });
    expect(chain.status).toBe("built");
  });

  it("gives every cell its own ref", async () => {
    const steps = await new MatrixChain(grid(3, 4), agents("a", "b", "c")).buildDependencies();
    expect(steps).toHaveLength(12);
    expect(new Set(steps.map((s) => s.ref)).size).toBe(12);
  });

  it("skips empty cells", async () => {
    const { chain } = greetingChain();
    const steps = await chain.buildDependencies();
    expect(steps.map((s) => s.key)).toEqual(["Agent_0_Step_0", "Agent_1_Step_0", "Agent_0_Step_1"]);
  });

  it("follows the resolver's order within each column", async () => {
    const resolver = vi.fn(async (column: readonly unknown[]) => column.map((_, i) => i).reverse());
    const chain = new MatrixChain(grid(2, 2), agents("a", "b"), { resolver });

    const steps = await chain.buildDependencies();

    expect(steps.map((s) => s.key)).toEqual(["Agent_1_Step_0", "Agent_0_Step_0", "Agent_1_Step_1", "Agent_0_Step_1"]);
    expect(resolver).toHaveBeenCalledWith(["p00", "p10"], 0);
    expect(resolver).toHaveBeenCalledWith(["p01", "p11"], 1);
  });

  it("drops a column whose resolver throws or misorders", async () => {
    const warn = vi.fn();
    const tracer = new MemoryTracer(() => 0);
    tracer.start();
    const chain = new MatrixChain(grid(2, 3), agents("a", "b"), {
      logger: { warn },
      tracer,
      resolver: (column, columnIndex) => {
        if (columnIndex === 1) throw new Error("no order");
        if (columnIndex === 2) return [0, 0];
        return column.map((_, i) => i);
      },
    });

    const steps = await chain.buildDependencies();

    expect(steps.map((s) => s.key)).toEqual(["Agent_0_Step_0", "Agent_1_Step_0"]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(tracer.ofType("column.skipped").map((e) => e.payload.stepIndex)).toEqual([1, 2]);
    expect(tracer.ofType("column.skipped")[0]?.payload.error).toBe("no order");
  });

  it("builds a chain with nothing to do as already complete", async () => {
    const chain = new MatrixChain(new PromptMatrix([[null, ""]]), agents("a"));
    await chain.buildDependencies();
    expect(chain.status).toBe("complete");
    expect(await chain.executeNextStep()).toEqual({ done: true });
  });

  it("needs one prompt row per agent", () => {
    expect(thrownCode(() => new MatrixChain(grid(2, 1), agents("a")))).toBe(ERR.MATRIX_SHAPE);
  });

  it("refuses to build after the prompt matrix gains a row", async () => {
    const prompts = new PromptMatrix([["x"]]);
    const team = agents("a");
    const chain = new MatrixChain(prompts, team);
    prompts.addRow(["y"]);

    await expect(chain.buildDependencies()).rejects.toMatchObject({ code: ERR.MATRIX_SHAPE });
    await expect(chain.executeNextStep()).rejects.toMatchObject({ code: ERR.MATRIX_SHAPE });
    expect(chain.getSteps()).toEqual([]);
    expect(team[0]?.calls).toEqual([]);
  });

  it("refuses to build after the prompt matrix loses a row", async () => {
    const prompts = grid(2, 2);
    const chain = new MatrixChain(prompts, agents("a", "b"));
    prompts.removeRow(0);

    await expect(chain.execute()).rejects.toMatchObject({ code: ERR.MATRIX_SHAPE });
  });
});

describe("MatrixChain.execute", () => {
  it("dispatches resolved prompts and fills the response matrix", async () => {
    const { chain, team } = greetingChain();

    const responses = await chain.execute();

    expect(team[0]?.calls.map((c) => c.prompt)).toEqual(["Hello Ada", "Follow a1: Hi Ada"]);
    expect(team[1]?.calls.map((c) => c.prompt)).toEqual(["Hi Ada"]);
    expect(chain.context.getValue("Agent_0_Step_0_response")).toBe("a0: Hello Ada");
    expect(responses.rows()).toEqual([
      ["a0: Hello Ada", "a0: Follow a1: Hi Ada"],
      ["a1: Hi Ada", null],
    ]);
    expect(chain.status).toBe("complete");
  });

  it("greets each agent's prompt by name", async () => {
    const team = agents("a0", "a1");
    const chain = new MatrixChain(new PromptMatrix([["Hello {name}"], ["Hi {name}"]]), team, { context: { name: "Ada" } });

    await chain.execute();

    expect(team[0]?.calls.map((c) => c.prompt)).toEqual(["Hello Ada"]);
    expect(team[1]?.calls.map((c) => c.prompt)).toEqual(["Hi Ada"]);
  });

  it("leaves unresolvable placeholders in the prompt", async () => {
    const team = agents("a");
    const warn = vi.fn();
    const chain = new MatrixChain(new PromptMatrix([["Use {missing}"]]), team, { logger: { warn } });

    await chain.execute();

    expect(team[0]?.calls[0]?.prompt).toBe("Use {missing}");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("resolves the system context for the call and restores it afterwards", async () => {
    const agent = new ScriptedAgent("a", { systemContext: "You help {name}" });
    const chain = new MatrixChain(new PromptMatrix([["q"]]), [agent], { context: { name: "Ada" } });

    await chain.execute();

    expect(agent.calls[0]?.systemContext).toBe("You help Ada");
    expect(agent.systemContext).toBe("You help {name}");
  });

  it("rebuilds and reruns from the start by default", async () => {
    const { chain, team } = greetingChain();
    await chain.execute();
    await chain.execute();
    expect(team[0]?.calls).toHaveLength(4);
  });

  it("continues from the cursor when asked not to rebuild", async () => {
    const { chain, team } = greetingChain();
    await chain.executeNextStep();
    await chain.execute({ buildDependencies: false });
    expect(team[0]?.calls).toHaveLength(2);
    expect(team[1]?.calls).toHaveLength(1);
  });
});

describe("MatrixChain.executeNextStep", () => {
  it("builds lazily and runs one step per call", async () => {
    const { chain } = greetingChain();
    expect(chain.status).toBe("unbuilt");

    const first = await chain.executeNextStep();

    expect(first).toEqual({
      done: false,
      remaining: 2,
      completion: {
        index: 0,
        key: "Agent_0_Step_0",
        ref: "Agent_0_Step_0_response",
        address: { agentIndex: 0, stepIndex: 0 },
        result: "a0: Hello Ada",
      },
    });
    expect(chain.currentStepIndex).toBe(1);
    expect(chain.status).toBe("running");
  });

  it("keeps the cursor on a failed step and retries it", async () => {
    const flaky = new ScriptedAgent("a0", { systemContext: "sys {name}", reply: flakyReply("a0", 1) });
    const chain = new MatrixChain(new PromptMatrix([["Hello {name}"]]), [flaky], { context: { name: "Ada" } });

    await expect(chain.executeNextStep()).rejects.toThrow("boom");
    expect(chain.currentStepIndex).toBe(0);
    expect(flaky.systemContext).toBe("sys {name}");

    const retry = await chain.executeNextStep();

    expect(retry.done).toBe(false);
    expect(flaky.calls.map((c) => c.prompt)).toEqual(["Hello Ada", "Hello Ada"]);
    expect(chain.responses.get({ agentIndex: 0, stepIndex: 0 })).toBe("a0: Hello Ada");
    expect(chain.status).toBe("complete");
  });

  it("reports done once past the last step", async () => {
    const chain = new MatrixChain(new PromptMatrix([["q"]]), agents("a"));
    await chain.executeNextStep();
    expect(await chain.executeNextStep()).toEqual({ done: true });
  });
});

describe("stepwise execution", () => {
  it("ends in the same state as a single execute", async () => {
    const whole = greetingChain();
    await whole.chain.execute();

    const stepped = greetingChain();
    await stepped.chain.buildDependencies();
    for (let i = 0; i < stepped.chain.getSteps().length; i++) await stepped.chain.executeNextStep();

    expect(stepped.chain.context.toJSON()).toEqual(whole.chain.context.toJSON());
    expect(stepped.chain.responses.rows()).toEqual(whole.chain.responses.rows());
  });
});

describe("MatrixChain.stream", () => {
  it("yields each completion in order", async () => {
    const { chain } = greetingChain();
    const keys: string[] = [];
    for await (const completion of chain.stream()) keys.push(completion.key);
    expect(keys).toEqual(["Agent_0_Step_0", "Agent_1_Step_0", "Agent_0_Step_1"]);
  });
});

describe("MatrixChain tracing", () => {
  it("records the life of a chain", async () => {
    const tracer = new MemoryTracer(() => 0);
    tracer.start();
    const chain = new MatrixChain(new PromptMatrix([["q"]]), agents("a"), { tracer });

    await chain.execute();

    expect(tracer.events.map((e) => e.type)).toEqual(["chain.built", "step.started", "step.completed", "chain.completed"]);
    expect(tracer.ofType("chain.built")[0]?.payload).toEqual({ steps: 1, shape: [1, 1] });
  });

  it("keeps going when a trace write fails", async () => {
    const warn = vi.fn();
    const tracer = new FailingTracer("step.completed", { warn });
    tracer.start();
    const team = agents("a");
    const chain = new MatrixChain(new PromptMatrix([["q"]]), team, { tracer });

    const next = await chain.executeNextStep();

    expect(next.done).toBe(false);
    expect(chain.currentStepIndex).toBe(1);
    expect(warn).toHaveBeenCalledWith("trace write failed: step.completed", { error: "disk full" });
    expect(tracer.written).toEqual(["chain.built", "step.started", "chain.completed"]);

    expect(await chain.executeNextStep()).toEqual({ done: true });
    expect(team[0]?.calls).toHaveLength(1);
  });

  it("does not rerun a step whose completion event throws", async () => {
    const tracer: ChainTracer = {
      start() {},
      stop() {},
      async record(type) {
        if (type === "step.completed") throw new Error("disk full");
      },
    };
    const team = agents("a");
    const chain = new MatrixChain(new PromptMatrix([["q"]]), team, { tracer });

    await expect(chain.executeNextStep()).rejects.toThrow("disk full");

    expect(chain.currentStepIndex).toBe(1);
    expect(chain.context.getValue("Agent_0_Step_0_response")).toBe("a: q");
    expect(await chain.executeNextStep()).toEqual({ done: true });
    expect(team[0]?.calls).toHaveLength(1);
  });

  it("records nothing while stopped", async () => {
    const tracer = new MemoryTracer(() => 0);
    const chain = new MatrixChain(new PromptMatrix([["q"]]), agents("a"), { tracer });
    await chain.execute();
    expect(tracer.events).toEqual([]);
  });
});

describe("MatrixChain snapshots", () => {
  it("resumes to the same result as an uninterrupted run", async () => {
    const full = greetingChain();
    await full.chain.execute();

    const partial = greetingChain();
    await partial.chain.executeNextStep();
    await partial.chain.executeNextStep();
    const saved = serialize(partial.chain.snapshot());

    const team = agents("a0", "a1");
    const resumed = new MatrixChain(
      new PromptMatrix([
        ["Hello {name}", "Follow {Agent_1_Step_0_response}"],
        ["Hi {name}", null],
      ]),
      team,
    );
    resumed.restore(saved);
    expect(resumed.status).toBe("running");
    expect(resumed.currentStepIndex).toBe(2);

    await resumed.execute({ buildDependencies: false });

    expect(resumed.responses.rows()).toEqual(full.chain.responses.rows());
    expect(team[0]?.calls.map((c) => c.prompt)).toEqual(["Follow a1: Hi Ada"]);
    expect(team[1]?.calls).toEqual([]);
  });

  it("describes its steps", async () => {
    const { chain } = greetingChain();
    await chain.buildDependencies();
    const description = chain.describe();
    expect(description.status).toBe("built");
    expect(description.cursor).toBe(0);
    expect(description.steps[2]).toEqual({
      key: "Agent_0_Step_1",
      ref: "Agent_0_Step_1_response",
      address: { agentIndex: 0, stepIndex: 1 },
    });
  });

  it("rejects malformed snapshots", async () => {
    const { chain } = greetingChain();
    await chain.buildDependencies();
    const good = chain.snapshot();

    expect(thrownCode(() => chain.restore({}))).toBe(ERR.INVALID_CHECKPOINT);
    expect(thrownCode(() => chain.restore({ ...good, cursor: 4 }))).toBe(ERR.INVALID_CHECKPOINT);
    expect(thrownCode(() => chain.restore({ ...good, responses: [[null]] }))).toBe(ERR.INVALID_CHECKPOINT);
    expect(thrownCode(() => chain.restore({ ...good, steps: [{ ...good.steps[0], method: "nope" }] }))).toBe(
      ERR.UNKNOWN_METHOD,
    );
  });

  it("fails a restored step that names a missing agent", async () => {
    const chain = new MatrixChain(new PromptMatrix([["q"]]), agents("a"));
    chain.restore({
      version: 1,
      built: true,
      cursor: 0,
      steps: [{ key: "ghost", method: INVOKE_AGENT, args: [5, "q", "Agent_5_Step_0_response"], kwargs: {}, ref: null, address: null }],
      context: {},
      responses: [[null]],
    });

    await expect(chain.executeNextStep()).rejects.toMatchObject({ code: ERR.UNKNOWN_AGENT });
  });

  it("stores results of steps outside the grid in context only", async () => {
    const team = agents("a");
    const chain = new MatrixChain(new PromptMatrix([["q"]]), team);
    chain.restore({
      version: 1,
      built: true,
      cursor: 0,
      steps: [{ key: "note", method: INVOKE_AGENT, args: [0, "Note {name}", "custom"], kwargs: {}, ref: "custom", address: null }],
      context: { name: "Ada" },
      responses: [[null]],
    });

    const next = await chain.executeNextStep();

    expect(next).toMatchObject({ done: false, completion: { ref: "custom", address: null } });
    expect(chain.context.getValue("custom")).toBe("a: Note Ada");
    expect(chain.responses.rows()).toEqual([[null]]);
  });
});

describe("MatrixChain.invokeAgent", () => {
  it("rejects an agent index outside the team", async () => {
    const chain = new MatrixChain(new PromptMatrix([["q"]]), agents("a"));
    await expect(chain.invokeAgent(3, "q", "r")).rejects.toMatchObject({ code: ERR.UNKNOWN_AGENT });
  });
});
