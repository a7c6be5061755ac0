/**
 * Structured run logger: console lines tagged `[agentRun]` plus the
 * persisted JSONL log store. Payloads are stripped of credentials before
 * they reach either channel.
 */

import type { LogEvent, LogEventType, LogLevel } from '@govpilot/shared';
import { appendLog, createLogEvent } from '../storage/logStore.js';
import { toErrorMessage } from '../errors.js';

export type LogSink = (event: LogEvent) => void;

export interface RunLoggerOptions {
  consoleLogs?: boolean;
  /** Where events are persisted; `null` disables persistence. Defaults to the log store. */
  sink?: LogSink | null;
}

const SENSITIVE_KEY_PATTERN = /private_?key|api_?key|token|secret|password/i;

/** Drop credential-like keys at any depth. */
export function sanitizePayload(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sanitizePayload);
  if (value === null || typeof value !== 'object') return value;
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    if (SENSITIVE_KEY_PATTERN.test(key)) continue;
    out[key] = sanitizePayload(inner);
  }
  return out;
}

export class AgentRunLogger {
  private runId: string | undefined;
  private readonly consoleLogs: boolean;
  private readonly sink: LogSink | null;

  constructor(options: RunLoggerOptions = {}) {
    this.consoleLogs = options.consoleLogs ?? process.env.CONSOLE_LOGS !== 'false';
    this.sink = options.sink === undefined ? appendLog : options.sink;
  }

  bindRun(runId: string | undefined): void {
    this.runId = runId;
  }

  log(type: LogEventType, payload: Record<string, unknown>, level: LogLevel = 'INFO'): void {
    const clean = sanitizePayload(payload);
    if (this.consoleLogs) {
      const line = `[agentRun] ${type} ${JSON.stringify(clean)}`;
      if (level === 'ERROR') console.error(line);
      else if (level === 'WARN') console.warn(line);
      else console.log(line);
    }
    if (!this.sink) return;
    try {
      this.sink(createLogEvent(type, clean, level, this.runId));
    } catch (err) {
      console.error(`[agentRun] failed to persist ${type} event: ${toErrorMessage(err)}`);
    }
  }

  warn(type: LogEventType, payload: Record<string, unknown>): void {
    this.log(type, payload, 'WARN');
  }

  error(message: string, err: unknown, details: Record<string, unknown> = {}): void {
    this.log('ERROR', { message, error: toErrorMessage(err), ...details }, 'ERROR');
  }
}
