export type SandboxErrorCode =
  | "SYNTAX_ERROR"            // code unit failed to parse; nothing ran
  | "RUNTIME_ERROR"           // unhandled fault or budget exhausted during execution
  | "UNEXPECTED_ASYNC_PAUSE"; // engine suspended on async work; only sync code is accepted

export class SandboxError extends Error {
  constructor(
    public readonly code: SandboxErrorCode,
    message: string
  ) {
    super(message);
    this.name = "SandboxError";
  }
}
