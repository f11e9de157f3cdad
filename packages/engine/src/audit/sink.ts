/**
 * Audit Sink
 *
 * Append-only consumer of (operation, caller, non-plaintext payload) records.
 * The engine and registry call into it after every successful operation;
 * a failing sink is logged and otherwise ignored.
 */

import { appendFileSync } from "node:fs";
import type { Identity } from "../types";
import { createLogger } from "../logger";

export type AuditOperation =
  | "add"
  | "scalar_multiply"
  | "compare_at_least"
  | "decrypt"
  | "grant"
  | "profile_submitted"
  | "score_computed"
  | "pool_added"
  | "pool_deactivated";

export interface AuditEvent {
  operation: AuditOperation;
  caller: Identity;
  ts: number;
  /** Base64url ciphertext of the operation's result, when it has one. */
  result?: string;
  /** Public metadata only (ids, capability names, rates). Never plaintext. */
  details?: Record<string, string | number | boolean>;
}

export interface AuditSink {
  record(event: AuditEvent): void | Promise<void>;
}

const logger = createLogger("audit");

/**
 * Deliver an event without letting the sink affect the caller: synchronous
 * throws and async rejections are both logged at warn.
 */
export function emitAudit(sink: AuditSink | undefined, event: AuditEvent): void {
  if (!sink) return;
  const onFailure = (error: unknown) =>
    logger.warn("Audit sink failed", {
      operation: event.operation,
      error: error instanceof Error ? error.message : String(error),
    });
  try {
    const pending = sink.record(event);
    if (pending instanceof Promise) {
      void pending.catch(onFailure);
    }
  } catch (error) {
    onFailure(error);
  }
}

/**
 * In-memory sink for tests and single-process deployments.
 */
export class MemoryAuditSink implements AuditSink {
  private events: AuditEvent[] = [];

  record(event: AuditEvent): void {
    this.events.push({ ...event });
  }

  list(operation?: AuditOperation): AuditEvent[] {
    return operation ? this.events.filter((e) => e.operation === operation) : [...this.events];
  }

  clear(): void {
    this.events = [];
  }
}

/**
 * Sink appending one JSON line per event to a file.
 */
export class JsonlAuditSink implements AuditSink {
  constructor(private readonly path: string) {}

  record(event: AuditEvent): void {
    appendFileSync(this.path, JSON.stringify(event) + "\n", "utf8");
  }
}
