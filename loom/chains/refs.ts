import { LoomError, ERR } from "../core/errors.js";

export type StepAddress = { agentIndex: number; stepIndex: number };

const REF_PATTERN = /^Agent_(0|[1-9][0-9]*)_Step_(0|[1-9][0-9]*)_response$/;

function assertIndex(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LoomError(ERR.MATRIX_INDEX, `${name} must be a non-negative integer`, { [name]: value });
  }
}

export function stepKey({ agentIndex, stepIndex }: StepAddress): string {
  assertIndex("agentIndex", agentIndex);
  assertIndex("stepIndex", stepIndex);
  return `Agent_${agentIndex}_Step_${stepIndex}`;
}

/** Context key a step's result is stored under. Inverse of `parseRef`. */
export function formatRef(address: StepAddress): string {
  return `${stepKey(address)}_response`;
}

/**
 * Recover the address encoded by `formatRef`. Anything else, including
 * zero-padded indices, yields null and must not be written to the response matrix.
 */
export function parseRef(ref: string): StepAddress | null {
  const m = REF_PATTERN.exec(ref);
  if (!m) return null;
  const agentIndex = Number(m[1]);
  const stepIndex = Number(m[2]);
  if (!Number.isSafeInteger(agentIndex) || !Number.isSafeInteger(stepIndex)) return null;
  return { agentIndex, stepIndex };
}
