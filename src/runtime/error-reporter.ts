/**
 * Error reporting for render cycles and event dispatch.
 *
 * Keeps a bounded history, fans reports out to listeners and logs each one.
 * A listener that throws is logged and skipped.
 */

import { isTrellisError } from '../common/errors';
import { logger } from '../dev/logger';

export type ErrorSeverity = 'critical' | 'error' | 'warning';

export interface ErrorReport {
  readonly name: string;
  readonly message: string;
  /** Stable code for engine errors, null for foreign ones. */
  readonly code: string | null;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context: Readonly<Record<string, unknown>>;
  readonly error: unknown;
}

export interface ErrorSummary {
  total: number;
  byName: Record<string, number>;
  recent: ErrorReport[];
}

export type ErrorListener = (report: ErrorReport) => void;

export interface ErrorReporterOptions {
  /** Reports kept in history. Default 100. */
  maxHistory?: number;
  clock?: () => number;
  /** Write each report to the logger. Default true. */
  log?: boolean;
}

const RECENT_COUNT = 10;

function severityOf(error: unknown): ErrorSeverity {
  if (isTrellisError(error)) {
    if (error.code === 'SERIALIZATION_WARNING') return 'warning';
    if (error.code === 'PATCH_APPLICATION') return 'critical';
    return 'error';
  }
  if (error instanceof RangeError) return 'critical';
  return 'error';
}

export class ErrorReporter {
  private history: ErrorReport[] = [];
  private listeners: ErrorListener[] = [];
  private readonly maxHistory: number;
  private readonly clock: () => number;
  private readonly log: boolean;

  constructor(options: ErrorReporterOptions = {}) {
    this.maxHistory = options.maxHistory ?? 100;
    this.clock = options.clock ?? (() => Date.now());
    this.log = options.log ?? true;
  }

  report(error: unknown, context: Record<string, unknown> = {}): ErrorReport {
    const report: ErrorReport = Object.freeze({
      name: error instanceof Error ? error.name : typeof error,
      message: error instanceof Error ? error.message : String(error),
      code: isTrellisError(error) ? error.code : null,
      severity: severityOf(error),
      timestamp: this.clock(),
      context: Object.freeze({ ...context }),
      error,
    });

    this.history.push(report);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }

    for (const listener of this.listeners.slice()) {
      try {
        listener(report);
      } catch (err) {
        logger.error('[Trellis] Error listener threw:', err);
      }
    }

    if (this.log) {
      if (report.severity === 'warning') {
        logger.warn(`[Trellis] ${report.name}: ${report.message}`, context);
      } else {
        logger.error(`[Trellis] ${report.name}: ${report.message}`, context);
      }
    }
    return report;
  }

  /** Returns a function that removes the listener. */
  addListener(listener: ErrorListener): () => void {
    this.listeners.push(listener);
    return () => this.removeListener(listener);
  }

  removeListener(listener: ErrorListener): void {
    const idx = this.listeners.indexOf(listener);
    if (idx !== -1) this.listeners.splice(idx, 1);
  }

  getHistory(): readonly ErrorReport[] {
    return this.history.slice();
  }

  summary(): ErrorSummary {
    const byName: Record<string, number> = {};
    for (const r of this.history) byName[r.name] = (byName[r.name] ?? 0) + 1;
    return {
      total: this.history.length,
      byName,
      recent: this.history.slice(-RECENT_COUNT),
    };
  }

  clear(): void {
    this.history = [];
  }
}
