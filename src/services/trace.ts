/**
 * Per-request provenance trace.
 */

import { randomUUID } from 'crypto';
import type { TraceEntry, TraceLevel, TraceStep } from '../types/models.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

/**
 * Append-only list of pipeline steps for one request. Entries are also
 * written to the structured log; recording never affects control flow.
 */
export class RequestTrace {
  readonly requestId: string;
  private readonly entries: TraceEntry[] = [];
  private readonly log: Logger;

  constructor(options: { logger?: Logger; requestId?: string; turn?: number } = {}) {
    this.requestId = options.requestId ?? randomUUID();
    this.log = (options.logger ?? rootLogger).child({
      requestId: this.requestId,
      turn: options.turn,
    });
  }

  record(step: TraceStep, message: string, level: TraceLevel = 'info'): TraceEntry {
    const entry: TraceEntry = Object.freeze({
      seq: this.entries.length + 1,
      step,
      level,
      message,
      at: new Date().toISOString(),
    });
    this.entries.push(entry);
    this.log[level]({ step }, message);
    return entry;
  }

  info(step: TraceStep, message: string): TraceEntry {
    return this.record(step, message, 'info');
  }

  warn(step: TraceStep, message: string): TraceEntry {
    return this.record(step, message, 'warn');
  }

  error(step: TraceStep, message: string): TraceEntry {
    return this.record(step, message, 'error');
  }

  /**
   * Snapshot of the entries recorded so far, in order.
   */
  get steps(): readonly TraceEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
