import { PRIMITIVE_NAMES } from "../router/router.js";
import { type ClassifiedOutput, classifyOutput } from "./classify.js";
import type {
  Engine,
  EngineProgram,
  EngineState,
  ResumeValue,
  RunLimits,
  SnapshotState,
} from "./engine.js";
import { SandboxError } from "./errors.js";

/** Terminal result of one code unit run */
export interface ExecutionOutcome extends ClassifiedOutput {
  code: string;
  error: string | null;
  state: Uint8Array | null; // engine dump, present only on completion
}

/** Anything that can run a code unit to an outcome (the bridge, or a stub) */
export interface CodeExecutor {
  run(code: string): Promise<ExecutionOutcome>;
}

/** The router surface the bridge needs */
export interface PrimitiveDispatcher {
  dispatch(
    functionName: string,
    args: readonly unknown[],
    kwargs: Readonly<Record<string, unknown>>,
  ): unknown;
}

export interface ExecutionBridgeOpts {
  engine: Engine;
  router: PrimitiveDispatcher;
  max_duration_ms: number;
  max_memory_bytes?: number;
  now?: () => number; // injectable clock for tests
}

export type BridgeState =
  | { phase: "compiling"; code: string }
  | {
      phase: "running";
      program: EngineProgram;
      advance: () => Promise<EngineState>;
    }
  | { phase: "paused"; program: EngineProgram; snapshot: SnapshotState }
  | { phase: "complete"; output: unknown; state: Uint8Array }
  | { phase: "failed"; message: string };

type ActiveState = Extract<
  BridgeState,
  { phase: "compiling" | "running" | "paused" }
>;

export function failedOutcome(code: string, message: string): ExecutionOutcome {
  return {
    code,
    output: null,
    output_json: null,
    output_type: "none",
    error: message,
    state: null,
  };
}

/** Error text shown to the agent for each failure kind */
function describeFailure(err: unknown): string {
  if (err instanceof SandboxError) {
    switch (err.code) {
      case "SYNTAX_ERROR":
        return `Syntax error: ${err.message}`;
      case "RUNTIME_ERROR":
        return `Runtime error: ${err.message}`;
      case "UNEXPECTED_ASYNC_PAUSE":
        return err.message;
    }
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drives one code unit through the engine's pause/resume protocol.
 *
 * States advance one `step()` at a time:
 *   compiling → running → (paused ⇄ running)* → complete | failed
 *
 * Every pause is dispatched to the router and the engine is always resumed,
 * with the router's value or its failure raised at the call site; the code
 * unit decides what a failure means. One wall-clock deadline covers the run
 * from compilation onward.
 */
export class ExecutionBridge implements CodeExecutor {
  private readonly engine: Engine;
  private readonly router: PrimitiveDispatcher;
  private readonly maxDurationMs: number;
  private readonly maxMemoryBytes?: number;
  private readonly now: () => number;

  constructor(opts: ExecutionBridgeOpts) {
    this.engine = opts.engine;
    this.router = opts.router;
    this.maxDurationMs = opts.max_duration_ms;
    this.maxMemoryBytes = opts.max_memory_bytes;
    this.now = opts.now ?? Date.now;
  }

  async run(code: string): Promise<ExecutionOutcome> {
    const limits: RunLimits = {
      deadline_ms: this.now() + this.maxDurationMs,
      max_memory_bytes: this.maxMemoryBytes,
    };

    let state: BridgeState = { phase: "compiling", code };
    let program: EngineProgram | null = null;

    try {
      while (state.phase !== "complete" && state.phase !== "failed") {
        state = await this.step(state, limits);
        if (state.phase === "running" || state.phase === "paused") {
          program = state.program;
        }
      }
    } finally {
      program?.dispose();
    }

    if (state.phase === "failed") {
      return failedOutcome(code, state.message);
    }
    return {
      code,
      ...classifyOutput(state.output),
      error: null,
      state: state.state,
    };
  }

  /** Advance the state machine by one transition. */
  async step(state: ActiveState, limits: RunLimits): Promise<BridgeState> {
    switch (state.phase) {
      case "compiling":
        return this.compile(state.code, limits);
      case "running":
        return this.advance(state.program, state.advance);
      case "paused":
        return this.dispatch(state.program, state.snapshot, limits);
    }
  }

  private async compile(code: string, limits: RunLimits): Promise<BridgeState> {
    try {
      const program = await this.engine.compile(code, PRIMITIVE_NAMES);
      return {
        phase: "running",
        program,
        advance: () => program.start(limits),
      };
    } catch (err) {
      return { phase: "failed", message: describeFailure(err) };
    }
  }

  private async advance(
    program: EngineProgram,
    next: () => Promise<EngineState>,
  ): Promise<BridgeState> {
    try {
      const engineState = await next();
      if (engineState.kind === "snapshot") {
        return { phase: "paused", program, snapshot: engineState };
      }
      if (engineState.kind === "complete") {
        return {
          phase: "complete",
          output: engineState.output,
          state: program.dump(),
        };
      }
      throw new SandboxError(
        "UNEXPECTED_ASYNC_PAUSE",
        "Unexpected async pause in sync execution",
      );
    } catch (err) {
      if (err instanceof SandboxError && err.code === "UNEXPECTED_ASYNC_PAUSE") {
        console.warn(`[bridge] ${err.message}`);
      }
      return { phase: "failed", message: describeFailure(err) };
    }
  }

  private async dispatch(
    program: EngineProgram,
    snapshot: SnapshotState,
    limits: RunLimits,
  ): Promise<BridgeState> {
    const { function_name, args, kwargs } = snapshot.request;
    let resumeWith: ResumeValue;

    if (this.now() > limits.deadline_ms) {
      // Past the budget: no further queries, the engine terminates the run
      resumeWith = {
        exception: new SandboxError(
          "RUNTIME_ERROR",
          `execution time limit exceeded (${this.maxDurationMs}ms)`,
        ),
      };
    } else {
      console.debug(`[bridge] paused on ${function_name}()`);
      try {
        resumeWith = {
          return_value: this.router.dispatch(function_name, args, kwargs),
        };
      } catch (err) {
        resumeWith = {
          exception: err instanceof Error ? err : new Error(String(err)),
        };
      }
    }

    return {
      phase: "running",
      program,
      advance: () => snapshot.resume(resumeWith),
    };
  }
}
