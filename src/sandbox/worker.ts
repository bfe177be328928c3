import { parentPort, workerData } from "node:worker_threads";
import type { EngineProgram, EngineState, ResumeValue } from "./engine.js";
import { SandboxError } from "./errors.js";
import { QuickJSEngine } from "./quickjs.js";
import {
  HostMessageSchema,
  type WireResume,
  WorkerInitSchema,
  type WorkerMessage,
} from "./worker-protocol.js";

// Entry point of the sandbox worker thread, spawned by WorkerEngine.

const port = parentPort;
if (port === null) {
  throw new Error("sandbox worker must run inside a worker thread");
}

function post(message: WorkerMessage): void {
  port?.postMessage(message);
}

function failure(err: unknown): WorkerMessage {
  if (err instanceof SandboxError) {
    return { type: "failed", code: err.code, message: err.message };
  }
  return {
    type: "failed",
    code: "RUNTIME_ERROR",
    message: err instanceof Error ? err.message : String(err),
  };
}

function fromWire(value: WireResume): ResumeValue {
  if ("exception" in value) {
    const exception = new Error(value.exception.message);
    exception.name = value.exception.name;
    return { exception };
  }
  return { return_value: value.return_value };
}

async function main(): Promise<void> {
  const init = WorkerInitSchema.parse(workerData);

  let program: EngineProgram;
  try {
    program = await new QuickJSEngine().compile(
      init.code,
      init.external_functions,
    );
  } catch (err) {
    post(failure(err));
    return;
  }

  let resume: ((value: ResumeValue) => Promise<EngineState>) | null = null;

  const report = (state: EngineState): void => {
    switch (state.kind) {
      case "snapshot":
        resume = state.resume;
        post({ type: "snapshot", request: state.request });
        return;
      case "future_snapshot":
        resume = null;
        post({ type: "future_snapshot" });
        return;
      case "complete":
        resume = null;
        post({ type: "complete", output: state.output, state: program.dump() });
        return;
    }
  };

  port?.on("message", (raw: unknown) => {
    const message = HostMessageSchema.parse(raw);
    let next: Promise<EngineState>;
    if (message.type === "start") {
      next = program.start(message.limits);
    } else if (resume !== null) {
      next = resume(fromWire(message.value));
    } else {
      next = Promise.reject(
        new SandboxError("RUNTIME_ERROR", "resume without a pending call"),
      );
    }
    void next.then(report).catch((err: unknown) => post(failure(err)));
  });

  post({ type: "compiled" });
}

void main().catch((err: unknown) => post(failure(err)));
