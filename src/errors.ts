import type { MutationCommand, Operation } from "./types/operations.js";

export class InvalidConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[], source?: string) {
    const where = source ? ` in ${source}` : "";
    super(`Invalid configuration${where}:\n  - ${problems.join("\n  - ")}`);
    this.name = "InvalidConfigError";
    this.problems = problems;
  }
}

export class InvalidEntityError extends Error {
  readonly entityId: number;

  constructor(entityId: number, reason: string) {
    super(`#${entityId}: ${reason}`);
    this.name = "InvalidEntityError";
    this.entityId = entityId;
  }
}

/** A tracker rejected one command of an operation; the rest of that operation is not attempted. */
export class MutationFailure extends Error {
  readonly operation: Operation;
  readonly command: MutationCommand;

  constructor(operation: Operation, command: MutationCommand, cause: unknown) {
    super(`${command} on #${operation.entityId} failed: ${errorMessage(cause)}`, { cause });
    this.name = "MutationFailure";
    this.operation = operation;
    this.command = command;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
