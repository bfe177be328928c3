import {
  newQuickJSAsyncWASMModule,
  type QuickJSAsyncContext,
  type QuickJSAsyncRuntime,
  type QuickJSContext,
  type QuickJSHandle,
  shouldInterruptAfterDeadline,
} from "quickjs-emscripten";
import { isPlainObject } from "./classify.js";
import type {
  Engine,
  EngineProgram,
  EngineState,
  PauseRequest,
  ResumeValue,
  RunLimits,
} from "./engine.js";
import { SandboxError } from "./errors.js";

const UNIT_FILENAME = "unit.js";
const DUMP_VERSION = 1;

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** One completed primitive call, kept for the program dump */
interface CallRecord {
  function_name: string;
  args: unknown[];
  kwargs: Record<string, unknown>;
  result: { value: unknown } | { error: string };
}

/** "Name: message" from a dumped QuickJS error value */
export function describeError(dumped: unknown): string {
  if (typeof dumped === "object" && dumped !== null && "message" in dumped) {
    const name =
      "name" in dumped && typeof dumped.name === "string"
        ? dumped.name
        : "Error";
    return `${name}: ${String(dumped.message)}`;
  }
  return String(dumped);
}

/**
 * JavaScript has no keyword arguments: a trailing plain object after at
 * least one positional argument is treated as the keyword bag.
 *   fetch("t", { where: { a: 1 }, limit: 5 }) → args ["t"], kwargs {where, limit}
 */
export function splitKeywordArguments(values: unknown[]): {
  args: unknown[];
  kwargs: Record<string, unknown>;
} {
  const last = values[values.length - 1];
  if (values.length > 1 && isPlainObject(last)) {
    return { args: values.slice(0, -1), kwargs: { ...last } };
  }
  return { args: values, kwargs: {} };
}

/** Copy a host value into the VM. Rows are plain JSON-like data. */
export function toHandle(vm: QuickJSContext, value: unknown): QuickJSHandle {
  if (value === undefined) return vm.undefined;
  if (value === null) return vm.null;
  if (typeof value === "boolean") return value ? vm.true : vm.false;
  if (typeof value === "number") return vm.newNumber(value);
  if (typeof value === "bigint") return vm.newNumber(Number(value));
  if (typeof value === "string") return vm.newString(value);
  if (value instanceof Date) return vm.newString(value.toISOString());
  if (value instanceof Uint8Array) {
    return vm.newString(Buffer.from(value).toString("base64"));
  }

  if (Array.isArray(value)) {
    const arr = vm.newArray();
    value.forEach((item, i) => {
      const child = toHandle(vm, item);
      vm.setProp(arr, i, child);
      child.dispose();
    });
    return arr;
  }

  if (typeof value === "object") {
    const obj = vm.newObject();
    for (const [key, item] of Object.entries(value)) {
      const child = toHandle(vm, item);
      vm.setProp(obj, key, child);
      child.dispose();
    }
    return obj;
  }

  return vm.newString(String(value));
}

/**
 * Runs JavaScript code units inside QuickJS compiled to WebAssembly.
 * Each compiled program owns a fresh module, runtime and context; external
 * functions are asyncified so a call suspends the VM until resumed.
 */
export class QuickJSEngine implements Engine {
  async compile(
    code: string,
    externalFunctions: readonly string[],
  ): Promise<EngineProgram> {
    const module = await newQuickJSAsyncWASMModule();
    const runtime = module.newRuntime();
    const vm = runtime.newContext();

    const compiled = vm.evalCode(code, UNIT_FILENAME, { compileOnly: true });
    if (compiled.error) {
      const dumped = vm.dump(compiled.error);
      compiled.error.dispose();
      vm.dispose();
      runtime.dispose();
      throw new SandboxError(
        describeError(dumped).startsWith("SyntaxError")
          ? "SYNTAX_ERROR"
          : "RUNTIME_ERROR",
        describeError(dumped),
      );
    }
    compiled.value.dispose();

    return new QuickJSProgram(runtime, vm, code, externalFunctions);
  }
}

class QuickJSProgram implements EngineProgram {
  private readonly calls: CallRecord[] = [];
  private pending: Deferred<EngineState> | null = null;
  private promiseCheck: QuickJSHandle | null = null;
  private started = false;
  private disposed = false;

  constructor(
    private readonly runtime: QuickJSAsyncRuntime,
    private readonly vm: QuickJSAsyncContext,
    private readonly code: string,
    private readonly externalFunctions: readonly string[],
  ) {}

  start(limits: RunLimits): Promise<EngineState> {
    if (this.started) {
      return Promise.reject(
        new SandboxError("RUNTIME_ERROR", "program already started"),
      );
    }
    this.started = true;

    this.runtime.setInterruptHandler(
      shouldInterruptAfterDeadline(limits.deadline_ms),
    );
    if (limits.max_memory_bytes !== undefined) {
      this.runtime.setMemoryLimit(limits.max_memory_bytes);
    }

    // Captured before user code can shadow the global Promise
    this.promiseCheck = this.vm.unwrapResult(
      this.vm.evalCode("(value) => value instanceof Promise"),
    );
    for (const name of this.externalFunctions) {
      this.installExternal(name);
    }

    const step = this.nextStep();
    void this.vm.evalCodeAsync(this.code, UNIT_FILENAME).then(
      (result) => {
        if (result.error) {
          const dumped = this.vm.dump(result.error);
          result.error.dispose();
          this.fail(describeError(dumped), limits);
          return;
        }
        this.finish(result.value);
      },
      (err: unknown) => {
        this.fail(err instanceof Error ? err.message : String(err), limits);
      },
    );
    return step;
  }

  dump(): Uint8Array {
    return Buffer.from(
      JSON.stringify({
        version: DUMP_VERSION,
        code: this.code,
        calls: this.calls,
      }),
      "utf8",
    );
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    try {
      this.promiseCheck?.dispose();
      this.vm.dispose();
      this.runtime.dispose();
    } catch (err) {
      console.warn(
        `[quickjs] dispose failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  private nextStep(): Promise<EngineState> {
    this.pending = deferred<EngineState>();
    return this.pending.promise;
  }

  private deliver(state: EngineState): void {
    const pending = this.pending;
    this.pending = null;
    pending?.resolve(state);
  }

  private fail(diagnostic: string, limits: RunLimits): void {
    const message =
      Date.now() > limits.deadline_ms
        ? `${diagnostic} (execution time limit exceeded)`
        : diagnostic;
    const pending = this.pending;
    this.pending = null;
    pending?.reject(new SandboxError("RUNTIME_ERROR", message));
  }

  private finish(value: QuickJSHandle): void {
    try {
      if (this.runtime.hasPendingJob() || this.isPromise(value)) {
        this.deliver({ kind: "future_snapshot" });
        return;
      }
      this.deliver({ kind: "complete", output: this.vm.dump(value) });
    } finally {
      value.dispose();
    }
  }

  private isPromise(value: QuickJSHandle): boolean {
    if (this.promiseCheck === null) return false;
    const result = this.vm.callFunction(
      this.promiseCheck,
      this.vm.undefined,
      value,
    );
    const flag = this.vm.unwrapResult(result);
    const isPromise = this.vm.dump(flag) === true;
    flag.dispose();
    return isPromise;
  }

  private installExternal(name: string): void {
    const fn = this.vm.newAsyncifiedFunction(name, async (...argHandles) => {
      const { args, kwargs } = splitKeywordArguments(
        argHandles.map((h) => this.vm.dump(h)),
      );
      const request: PauseRequest = { function_name: name, args, kwargs };

      const resumed = await new Promise<ResumeValue>((resolve) => {
        this.deliver({
          kind: "snapshot",
          request,
          resume: (value) => {
            const step = this.nextStep();
            resolve(value);
            return step;
          },
        });
      });

      if ("exception" in resumed) {
        this.calls.push({ ...request, result: { error: resumed.exception.message } });
        throw resumed.exception;
      }
      this.calls.push({ ...request, result: { value: resumed.return_value } });
      return toHandle(this.vm, resumed.return_value);
    });
    this.vm.setProp(this.vm.global, name, fn);
    fn.dispose();
  }
}
