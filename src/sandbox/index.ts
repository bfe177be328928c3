// Bridge
export { ExecutionBridge, failedOutcome } from "./bridge.js";
export type {
  BridgeState,
  CodeExecutor,
  ExecutionBridgeOpts,
  ExecutionOutcome,
  PrimitiveDispatcher,
} from "./bridge.js";

// Classification
export { classifyOutput, isPlainObject, toJson } from "./classify.js";
export type { ClassifiedOutput, OutputType } from "./classify.js";

// Engine contract
export type {
  CompleteState,
  Engine,
  EngineProgram,
  EngineState,
  FutureSnapshotState,
  PauseRequest,
  ResumeValue,
  RunLimits,
  SnapshotState,
} from "./engine.js";

// Errors
export { SandboxError } from "./errors.js";
export type { SandboxErrorCode } from "./errors.js";

// QuickJS engine
export {
  describeError,
  QuickJSEngine,
  splitKeywordArguments,
  toHandle,
} from "./quickjs.js";

// Worker thread engine
export { WorkerEngine } from "./worker-engine.js";
export type { WorkerEngineOpts } from "./worker-engine.js";
export {
  HostMessageSchema,
  WorkerInitSchema,
  WorkerMessageSchema,
} from "./worker-protocol.js";
export type {
  HostMessage,
  WireResume,
  WorkerInit,
  WorkerMessage,
} from "./worker-protocol.js";
