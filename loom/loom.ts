import { readFile } from "node:fs/promises";
import type { SqlClient } from "./db/db.js";
import { applySchema } from "./db/db.js";
import type { Agent } from "./agents/types.js";
import { MatrixChain } from "./chains/matrix.js";
import type { ChainStatus, NextStepResult, StepCompletion } from "./chains/matrix.js";
import type { DependencyResolver } from "./chains/resolvers.js";
import type { ContextValues } from "./context/context.js";
import { LoomError, ERR, errorMessage } from "./core/errors.js";
import { randomId } from "./core/ids.js";
import type { LoomLogger } from "./core/logger.js";
import { nowMs } from "./core/time.js";
import { deleteCheckpoint, loadCheckpoint, saveCheckpoint } from "./engine/checkpoints.js";
import type { CheckpointRow } from "./engine/checkpoints.js";
import { EventLogTracer } from "./engine/event-tracer.js";
import { gcEventsByTtl, readEvents } from "./engine/events.js";
import type { EventRow } from "./engine/events.js";
import type { PromptMatrix } from "./matrix/prompt-matrix.js";

export type LoomOptions = {
  db: SqlClient;
  logger?: LoomLogger;

  // event log retention
  eventsTtlMs?: number;
  eventsGcMinIntervalMs?: number;
};

export type AdvanceResult =
  | { chainId: string; outcome: "step"; completion: StepCompletion; remaining: number }
  | { chainId: string; outcome: "done" }
  | { chainId: string; outcome: "retry"; error: string; attempt: number };

export type ChainInfo = {
  chainId: string;
  status: string;
  cursor: number;
  stepCount: number;
  attempt: number;
  lastError: string | null;
  createdTs: number;
  updatedTs: number;
};

export type CreateChainArgs = {
  chainId?: string;
  prompts: PromptMatrix;
  agents: readonly Agent[];
  context?: ContextValues;
  resolver?: DependencyResolver;
};

export type ResumeChainArgs = {
  chainId: string;
  prompts: PromptMatrix;
  agents: readonly Agent[];
  resolver?: DependencyResolver;
};

export type Loom = {
  migrate: () => Promise<void>;

  createChain: (args: CreateChainArgs) => Promise<{ chainId: string; chain: MatrixChain }>;
  resumeChain: (args: ResumeChainArgs) => Promise<MatrixChain | null>;
  liveChain: (chainId: string) => MatrixChain | undefined;
  forgetChain: (chainId: string) => Promise<void>;

  advance: (chainId: string) => Promise<AdvanceResult>;
  drain: (chainId: string, opts?: { maxSteps?: number }) => Promise<AdvanceResult[]>;

  getChain: (chainId: string) => Promise<ChainInfo | null>;
  readEvents: (args?: { chainId?: string; afterSeq?: number; limit?: number }) => Promise<EventRow[]>;
  gcEventsIfDue: () => Promise<void>;
};

function checkpointToInfo(row: CheckpointRow): ChainInfo {
  return {
    chainId: row.chain_id,
    status: row.status,
    cursor: row.cursor,
    stepCount: row.step_count,
    attempt: row.attempt,
    lastError: row.last_error,
    createdTs: row.created_ts,
    updatedTs: row.updated_ts,
  };
}

type LiveChain = {
  chain: MatrixChain;
  tracer: EventLogTracer;
  attempt: number;
};

/**
 * Durable driver for matrix chains: one step per `advance()`, a checkpoint after
 * every step, and trace events in the database. A process that dies mid-chain
 * picks up from the last checkpoint with `resumeChain()`; the interrupted step
 * runs again.
 */
export function createLoom(opts: LoomOptions): Loom {
  const live = new Map<string, LiveChain>();
  const logger = opts.logger ?? {};
  let lastGcTs = 0;

  function requireLive(chainId: string): LiveChain {
    const entry = live.get(chainId);
    if (!entry) {
      throw new LoomError(ERR.UNKNOWN_CHAIN, `chain not loaded: ${chainId}`, { chainId });
    }
    return entry;
  }

  async function checkpoint(chainId: string, entry: LiveChain, lastError: string | null = null): Promise<void> {
    const status: ChainStatus = entry.chain.status;
    await saveCheckpoint(opts.db, chainId, {
      status,
      snapshot: entry.chain.snapshot(),
      lastError,
      attempt: entry.attempt,
    });
  }

  function attach(chainId: string, chain: MatrixChain, tracer: EventLogTracer, attempt: number): LiveChain {
    live.get(chainId)?.tracer.stop();
    tracer.start();
    const entry: LiveChain = { chain, tracer, attempt };
    live.set(chainId, entry);
    return entry;
  }

  async function advance(chainId: string): Promise<AdvanceResult> {
    const entry = requireLive(chainId);

    let next: NextStepResult;
    try {
      next = await entry.chain.executeNextStep();
    } catch (e) {
      // cursor stays on the failed step; the next advance retries it
      entry.attempt += 1;
      const error = errorMessage(e);
      logger.warn?.(`chain ${chainId} step failed`, { attempt: entry.attempt, error });
      await checkpoint(chainId, entry, error);
      return { chainId, outcome: "retry", error, attempt: entry.attempt };
    }

    if (next.done) return { chainId, outcome: "done" };

    entry.attempt = 0;
    await checkpoint(chainId, entry);
    return { chainId, outcome: "step", completion: next.completion, remaining: next.remaining };
  }

  return {
    async migrate() {
      const script = await readFile(new URL("./db/schema.sql", import.meta.url), "utf-8");
      await applySchema(opts.db, script);
    },

    async createChain({ chainId, prompts, agents, context, resolver }) {
      const id = chainId ?? randomId("chain");
      // checkpoints are only overwritten by the chain that owns them
      if (live.has(id) || (await loadCheckpoint(opts.db, id))) {
        throw new LoomError(ERR.CHAIN_EXISTS, `chain already exists: ${id}`, { chainId: id });
      }

      const tracer = new EventLogTracer(opts.db, id, logger);
      const chain = new MatrixChain(prompts, agents, { context, resolver, logger, tracer });
      const entry = attach(id, chain, tracer, 0);

      await chain.buildDependencies();
      await checkpoint(id, entry);
      logger.info?.(`chain ${id} created`, { steps: chain.getSteps().length });
      return { chainId: id, chain };
    },

    async resumeChain({ chainId, prompts, agents, resolver }) {
      const row = await loadCheckpoint(opts.db, chainId);
      if (!row) return null;

      const tracer = new EventLogTracer(opts.db, chainId, logger);
      const chain = new MatrixChain(prompts, agents, { resolver, logger, tracer });
      chain.restore(row.snapshot);
      attach(chainId, chain, tracer, row.attempt);
      logger.info?.(`chain ${chainId} resumed`, { cursor: chain.currentStepIndex });
      return chain;
    },

    liveChain(chainId) {
      return live.get(chainId)?.chain;
    },

    async forgetChain(chainId) {
      live.get(chainId)?.tracer.stop();
      live.delete(chainId);
      await deleteCheckpoint(opts.db, chainId);
    },

    advance,

    async drain(chainId, drainOpts) {
      const maxSteps = drainOpts?.maxSteps ?? Number.POSITIVE_INFINITY;
      const results: AdvanceResult[] = [];
      for (let i = 0; i < maxSteps; i++) {
        const result = await advance(chainId);
        results.push(result);
        if (result.outcome !== "step") break;
      }
      return results;
    },

    async getChain(chainId) {
      const row = await loadCheckpoint(opts.db, chainId);
      if (!row) return null;
      return checkpointToInfo(row);
    },

    async readEvents(args) {
      return readEvents(opts.db, {
        chainId: args?.chainId,
        afterSeq: args?.afterSeq ?? 0,
        limit: args?.limit ?? 100,
      });
    },

    async gcEventsIfDue() {
      const ttl = opts.eventsTtlMs;
      if (!ttl) return;

      const minInterval = opts.eventsGcMinIntervalMs ?? 60_000;
      const n = nowMs();
      if (n - lastGcTs < minInterval) return;

      lastGcTs = n;
      const removed = await gcEventsByTtl(opts.db, ttl);
      logger.debug?.(`gc removed ${removed} events`);
    },
  };
}
