import { z } from "zod";
import { LoomError, ERR } from "../core/errors.js";
import type { MethodRegistry } from "./registry.js";
import { createStep } from "./step.js";
import type { Step } from "./step.js";

export const StepAddressSchema = z.object({
  agentIndex: z.number().int().nonnegative(),
  stepIndex: z.number().int().nonnegative(),
});

export const SerializedStepSchema = z.object({
  key: z.string().min(1),
  method: z.string().min(1),
  args: z.array(z.unknown()),
  kwargs: z.record(z.string(), z.unknown()),
  ref: z.string().nullable(),
  address: StepAddressSchema.nullable(),
});

export type SerializedStep = z.infer<typeof SerializedStepSchema>;

export const MatrixSnapshotSchema = z.object({
  version: z.literal(1),
  built: z.boolean(),
  cursor: z.number().int().nonnegative(),
  steps: z.array(SerializedStepSchema),
  context: z.record(z.string(), z.unknown()),
  responses: z.array(z.array(z.string().nullable())),
});

export type MatrixSnapshot = z.infer<typeof MatrixSnapshotSchema>;

export function serializeStep(step: Step, registry: MethodRegistry): SerializedStep {
  const method = step.methodName ?? registry.nameOf(step.method);
  if (!method) {
    throw new LoomError(ERR.UNKNOWN_METHOD, `step ${step.key} has no registered method name`, { key: step.key });
  }
  return {
    key: step.key,
    method,
    args: [...step.args],
    kwargs: { ...step.kwargs },
    ref: step.ref ?? null,
    address: step.address ?? null,
  };
}

export function hydrateStep(data: SerializedStep, registry: MethodRegistry): Step {
  return createStep({
    key: data.key,
    method: registry.require(data.method),
    methodName: data.method,
    args: data.args,
    kwargs: data.kwargs,
    ref: data.ref ?? undefined,
    address: data.address ?? undefined,
  });
}

export function parseSnapshot(value: unknown): MatrixSnapshot {
  const parsed = MatrixSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    throw new LoomError(ERR.INVALID_CHECKPOINT, "malformed chain snapshot", { issues: parsed.error.issues });
  }
  if (parsed.data.cursor > parsed.data.steps.length) {
    throw new LoomError(ERR.INVALID_CHECKPOINT, "snapshot cursor is past the last step", {
      cursor: parsed.data.cursor,
      steps: parsed.data.steps.length,
    });
  }
  return parsed.data;
}
