import type { Agent } from "./types.js";

/**
 * Run `fn` with `agent.systemContext` temporarily replaced. The previous value is
 * put back however `fn` settles.
 */
export async function withSystemContext<T>(agent: Agent, systemContext: string, fn: () => Promise<T>): Promise<T> {
  const previous = agent.systemContext;
  agent.systemContext = systemContext;
  try {
    return await fn();
  } finally {
    agent.systemContext = previous;
  }
}
