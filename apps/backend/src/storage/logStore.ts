import { existsSync, mkdirSync, appendFileSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import crypto from 'node:crypto';
import { LogEventSchema, type LogEvent, type LogLevel, type LogEventType } from '@govpilot/shared';

// ─── Config ──────────────────────────────────────────────

function logDir(): string {
  return process.env.DATA_DIR || join(process.cwd(), '.data');
}

function logFile(): string {
  return join(logDir(), 'logs.jsonl');
}

function ensureDir(): void {
  const dir = logDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function parseLine(line: string): LogEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = LogEventSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { ...parsed.data, payload: parsed.data.payload };
}

function readLines(): string[] {
  ensureDir();
  const file = logFile();
  if (!existsSync(file)) return [];
  return readFileSync(file, 'utf-8').split('\n').filter(Boolean);
}

// ─── Public API ──────────────────────────────────────────

export function appendLog(event: LogEvent): void {
  ensureDir();
  appendFileSync(logFile(), JSON.stringify(event) + '\n', 'utf-8');
}

export function createLogEvent(
  type: LogEventType,
  payload: unknown,
  level: LogLevel = 'INFO',
  runId?: string,
): LogEvent {
  return {
    id: crypto.randomUUID(),
    timestamp: Date.now(),
    type,
    runId,
    payload,
    level,
  };
}

/** Most recent `limit` events; malformed lines are skipped. */
export function readLatest(limit = 100): LogEvent[] {
  const lines = readLines();
  const start = Math.max(0, lines.length - limit);
  const events: LogEvent[] = [];
  for (let i = start; i < lines.length; i++) {
    const event = parseLine(lines[i]);
    if (event) events.push(event);
  }
  return events;
}

export function readByRunId(runId: string): LogEvent[] {
  return readLatest(10_000).filter((e) => e.runId === runId);
}

export function readAllLogs(): LogEvent[] {
  const events: LogEvent[] = [];
  for (const line of readLines()) {
    const event = parseLine(line);
    if (event) events.push(event);
  }
  return events;
}
