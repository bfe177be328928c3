import { Worker } from "node:worker_threads";
import type {
  Engine,
  EngineProgram,
  EngineState,
  ResumeValue,
  RunLimits,
} from "./engine.js";
import { SandboxError } from "./errors.js";
import {
  type HostMessage,
  type WireResume,
  type WorkerMessage,
  WorkerMessageSchema,
} from "./worker-protocol.js";

// Running from TypeScript sources (tests) the worker entry needs a loader
const FROM_SOURCES = import.meta.url.endsWith(".ts");
const WORKER_ENTRY = new URL(
  FROM_SOURCES ? "./worker.ts" : "./worker.js",
  import.meta.url,
);
const WORKER_EXEC_ARGV = FROM_SOURCES ? ["--import", "tsx"] : [];

/** Past the deadline, how long a silent worker is given before termination */
const WATCHDOG_GRACE_MS = 1000;

export interface WorkerEngineOpts {
  watchdog_grace_ms?: number;
}

function toWire(value: ResumeValue): WireResume {
  if ("exception" in value) {
    return {
      exception: {
        name: value.exception.name,
        message: value.exception.message,
      },
    };
  }
  return { return_value: value.return_value };
}

/**
 * Runs each code unit in its own worker thread so guest computation never
 * blocks the host event loop. The worker hosts a QuickJSEngine; every
 * primitive call crosses back to this thread as a pause, and the bridge
 * resolves it against the router here.
 */
export class WorkerEngine implements Engine {
  private readonly graceMs: number;

  constructor(opts: WorkerEngineOpts = {}) {
    this.graceMs = opts.watchdog_grace_ms ?? WATCHDOG_GRACE_MS;
  }

  async compile(
    code: string,
    externalFunctions: readonly string[],
  ): Promise<EngineProgram> {
    const worker = new Worker(WORKER_ENTRY, {
      workerData: { code, external_functions: [...externalFunctions] },
      execArgv: WORKER_EXEC_ARGV,
    });
    const program = new WorkerProgram(worker, this.graceMs);
    try {
      await program.compiled();
    } catch (err) {
      program.dispose();
      throw err;
    }
    return program;
  }
}

interface PendingStep {
  resolve(message: WorkerMessage): void;
  reject(reason: unknown): void;
}

class WorkerProgram implements EngineProgram {
  private pending: PendingStep | null = null;
  private deadlineMs: number | null = null;
  private state: Uint8Array | null = null;
  private terminated = false;

  constructor(
    private readonly worker: Worker,
    private readonly graceMs: number,
  ) {
    worker.on("message", (raw: unknown) => this.receive(raw));
    worker.on("error", (err: Error) => {
      this.abort(new SandboxError("RUNTIME_ERROR", err.message));
    });
    worker.on("exit", (exitCode: number) => {
      this.terminated = true;
      this.abort(
        new SandboxError(
          "RUNTIME_ERROR",
          `sandbox worker exited (code ${exitCode})`,
        ),
      );
    });
  }

  async compiled(): Promise<void> {
    const message = await this.exchange(null);
    if (message.type === "failed") {
      throw new SandboxError(message.code, message.message);
    }
    if (message.type !== "compiled") {
      throw new SandboxError(
        "RUNTIME_ERROR",
        `unexpected sandbox message: ${message.type}`,
      );
    }
  }

  start(limits: RunLimits): Promise<EngineState> {
    this.deadlineMs = limits.deadline_ms;
    return this.step({ type: "start", limits });
  }

  dump(): Uint8Array {
    return this.state ?? new Uint8Array();
  }

  dispose(): void {
    if (this.terminated) return;
    this.terminated = true;
    void this.worker.terminate().catch((err: unknown) => {
      console.warn(
        `[sandbox] worker termination failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    });
  }

  private async step(message: HostMessage): Promise<EngineState> {
    const reply = await this.exchange(message);
    switch (reply.type) {
      case "snapshot":
        return {
          kind: "snapshot",
          request: reply.request,
          resume: (value) =>
            this.step({ type: "resume", value: toWire(value) }),
        };
      case "future_snapshot":
        return { kind: "future_snapshot" };
      case "complete":
        this.state = reply.state;
        return { kind: "complete", output: reply.output };
      case "failed":
        throw new SandboxError(reply.code, reply.message);
      case "compiled":
        throw new SandboxError("RUNTIME_ERROR", "sandbox worker compiled twice");
    }
  }

  /** Send one message (or none) and wait for the worker's single reply */
  private exchange(message: HostMessage | null): Promise<WorkerMessage> {
    if (this.terminated) {
      return Promise.reject(
        new SandboxError("RUNTIME_ERROR", "sandbox worker is not running"),
      );
    }

    const reply = new Promise<WorkerMessage>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
    if (message !== null) this.worker.postMessage(message);
    if (this.deadlineMs === null) return reply;

    // QuickJS interrupts itself at the deadline; this catches a stuck worker
    const wait = Math.max(0, this.deadlineMs - Date.now()) + this.graceMs;
    const timer = setTimeout(() => {
      this.abort(
        new SandboxError(
          "RUNTIME_ERROR",
          "sandbox worker unresponsive (execution time limit exceeded)",
        ),
      );
      this.dispose();
    }, wait);
    return reply.finally(() => clearTimeout(timer));
  }

  private receive(raw: unknown): void {
    const parsed = WorkerMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.abort(
        new SandboxError(
          "RUNTIME_ERROR",
          `malformed sandbox message: ${parsed.error.message}`,
        ),
      );
      return;
    }
    const pending = this.pending;
    this.pending = null;
    if (pending === null) {
      console.warn(`[sandbox] unexpected ${parsed.data.type} message from worker`);
      return;
    }
    pending.resolve(parsed.data);
  }

  private abort(err: SandboxError): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(err);
  }
}
