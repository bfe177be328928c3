/**
 * Contract of the interruptible execution engine the bridge drives.
 *
 * An engine compiles a code unit into a program; starting the program runs it
 * until it either completes or calls one of the declared external functions,
 * at which point it suspends and reports a snapshot. Resuming the snapshot
 * with a return value (or an exception to raise at the call site) continues
 * the same computation.
 *
 * Implementations: QuickJSEngine (production), scripted engines (tests)
 */

export interface PauseRequest {
  function_name: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
}

export type ResumeValue = { return_value: unknown } | { exception: Error };

export interface RunLimits {
  deadline_ms: number; // epoch ms; the engine interrupts execution past this
  max_memory_bytes?: number;
}

export interface SnapshotState {
  kind: "snapshot";
  request: PauseRequest;
  resume(value: ResumeValue): Promise<EngineState>;
}

/** Suspension on async work (promises, pending jobs) */
export interface FutureSnapshotState {
  kind: "future_snapshot";
}

export interface CompleteState {
  kind: "complete";
  output: unknown;
}

export type EngineState = SnapshotState | FutureSnapshotState | CompleteState;

export interface EngineProgram {
  /** Rejects with SandboxError("RUNTIME_ERROR") on an unhandled fault. */
  start(limits: RunLimits): Promise<EngineState>;

  /** Opaque resumable state; stored verbatim, never interpreted by callers. */
  dump(): Uint8Array;

  dispose(): void;
}

export interface Engine {
  /** Rejects with SandboxError("SYNTAX_ERROR") when the code does not parse. */
  compile(
    code: string,
    externalFunctions: readonly string[],
  ): Promise<EngineProgram>;
}
