/**
 * What the matrix chain needs from an agent: a generation entry point and a
 * system-context template the chain may swap out for the duration of one step.
 */
export interface Agent {
  readonly name?: string;
  systemContext: string;
  exec(prompt: string): Promise<string>;
}
