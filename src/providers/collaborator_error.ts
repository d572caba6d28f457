export type CollaboratorName = "nlu" | "memory" | "threat_intel" | "teaming";

export class CollaboratorError extends Error {
  readonly collaborator: CollaboratorName;
  readonly operation: string;
  readonly cause?: unknown;

  constructor(args: { collaborator: CollaboratorName; operation: string; cause?: unknown }) {
    const detail = args.cause instanceof Error ? args.cause.message : String(args.cause ?? "unknown");
    super(`${args.collaborator}.${args.operation} failed: ${detail}`);
    this.name = "CollaboratorError";
    this.collaborator = args.collaborator;
    this.operation = args.operation;
    this.cause = args.cause;
  }

  toJSON() {
    return {
      error: "collaborator_failed",
      collaborator: this.collaborator,
      operation: this.operation,
      message: this.message,
    };
  }
}
