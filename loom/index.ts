export { createLoom } from "./loom.js";
export type { Loom, LoomOptions, AdvanceResult, ChainInfo, CreateChainArgs, ResumeChainArgs } from "./loom.js";

export { ChainContext, REF_SIGIL } from "./context/context.js";
export type { ContextValues } from "./context/context.js";
export { evaluateExpression, parseExpression, formatValue } from "./context/expression.js";
export type { Expr, ExpressionScope } from "./context/expression.js";

export { createStep } from "./chains/step.js";
export type { Step, StepInit, StepMethod, Awaitable } from "./chains/step.js";
export { SequentialChain } from "./chains/sequential.js";
export type { SequentialChainOptions } from "./chains/sequential.js";
export { CallableChain } from "./chains/callable.js";
export type { CallableLink } from "./chains/callable.js";
export { MatrixChain, INVOKE_AGENT } from "./chains/matrix.js";
export type {
  ChainStatus,
  MatrixChainOptions,
  StepCompletion,
  NextStepResult,
  ChainDescription,
} from "./chains/matrix.js";
export { formatRef, parseRef, stepKey } from "./chains/refs.js";
export type { StepAddress } from "./chains/refs.js";
export { identityResolver } from "./chains/resolvers.js";
export type { DependencyResolver } from "./chains/resolvers.js";
export { MethodRegistry } from "./chains/registry.js";
export { MatrixSnapshotSchema } from "./chains/snapshot.js";
export type { MatrixSnapshot, SerializedStep } from "./chains/snapshot.js";

export { PromptMatrix, isEmptyCell } from "./matrix/prompt-matrix.js";
export type { PromptCell, PromptRow, MatrixShape } from "./matrix/prompt-matrix.js";
export { ResponseMatrix } from "./matrix/response-matrix.js";
export type { ResponseCell } from "./matrix/response-matrix.js";

export type { Agent } from "./agents/types.js";
export { withSystemContext } from "./agents/scoped.js";
export { GenerativeAgent } from "./agents/generative.js";
export type { GenerativeAgentOptions } from "./agents/generative.js";

export { MemoryTracer, TracerBase } from "./engine/tracer.js";
export type { ChainTracer, TraceEvent, TraceEventType } from "./engine/tracer.js";
export { EventLogTracer } from "./engine/event-tracer.js";
export type { EventRow } from "./engine/events.js";

export { LoomError, ERR } from "./core/errors.js";
export type { ErrorCode } from "./core/errors.js";
export { consoleLogger } from "./core/logger.js";
export type { LoomLogger } from "./core/logger.js";
export { loadConfig } from "./core/config.js";
export type { LoomConfig } from "./core/config.js";

export { createLibsqlDb } from "./db/libsql.js";
export type { SqlClient } from "./db/db.js";
