import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { LogEvent } from '@govpilot/shared';
import { AgentRunLogger, sanitizePayload } from '../src/orchestrator/runLogger.js';
import { appendLog, createLogEvent, readAllLogs, readByRunId, readLatest } from '../src/storage/logStore.js';

describe('sanitizePayload', () => {
  it('drops credential keys at any depth', () => {
    expect(
      sanitizePayload({
        space: 'test.eth',
        privateKey: 'test-secret',
        nested: { api_key: 'test-secret', token: 'test-secret', keep: 1 },
        list: [{ secret: 'test-secret', id: 'a' }],
      }),
    ).toEqual({ space: 'test.eth', nested: { keep: 1 }, list: [{ id: 'a' }] });
  });

  it('passes primitives through', () => {
    expect(sanitizePayload('plain')).toBe('plain');
    expect(sanitizePayload(null)).toBeNull();
  });
});

describe('AgentRunLogger', () => {
  it('tags events with the bound run id and level', () => {
    const events: LogEvent[] = [];
    const logger = new AgentRunLogger({ consoleLogs: false, sink: (e) => events.push(e) });

    logger.bindRun('run-1');
    logger.log('PROPOSALS_FETCHED', { count: 2 });
    logger.warn('VOTE_EXECUTE_FAIL', { proposalId: 'prop-1', apiKey: 'test-secret' });
    logger.bindRun(undefined);
    logger.error('Agent loop run failed', new Error('boom'), { space: 'test.eth' });

    expect(events.map((e) => [e.type, e.level, e.runId])).toEqual([
      ['PROPOSALS_FETCHED', 'INFO', 'run-1'],
      ['VOTE_EXECUTE_FAIL', 'WARN', 'run-1'],
      ['ERROR', 'ERROR', undefined],
    ]);
    expect(events[1].payload).toEqual({ proposalId: 'prop-1' });
    expect(events[2].payload).toEqual({ message: 'Agent loop run failed', error: 'boom', space: 'test.eth' });
  });

  it('writes console lines by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new AgentRunLogger({ consoleLogs: true, sink: null });

    logger.log('LOOP_START', { intervalMs: 1000 });
    logger.warn('ERROR', { reason: 'slow' });

    expect(log).toHaveBeenCalledWith('[agentRun] LOOP_START {"intervalMs":1000}');
    expect(warn).toHaveBeenCalledWith('[agentRun] ERROR {"reason":"slow"}');
  });

  it('keeps going when the sink throws', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new AgentRunLogger({
      consoleLogs: false,
      sink: () => {
        throw new Error('disk full');
      },
    });

    expect(() => logger.log('CHECKPOINT_SAVED', {})).not.toThrow();
    expect(error).toHaveBeenCalledWith('[agentRun] failed to persist CHECKPOINT_SAVED event: disk full');
  });
});

describe('logStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'govpilot-logs-'));
    vi.stubEnv('DATA_DIR', dir);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends events as JSON lines and reads them back', () => {
    appendLog(createLogEvent('AGENT_RUN_START', { space: 'a.eth' }, 'INFO', 'run-1'));
    appendLog(createLogEvent('AGENT_RUN_END', { space: 'a.eth' }, 'INFO', 'run-1'));
    appendLog(createLogEvent('AGENT_RUN_START', { space: 'b.eth' }, 'INFO', 'run-2'));

    expect(readAllLogs().map((e) => e.type)).toEqual(['AGENT_RUN_START', 'AGENT_RUN_END', 'AGENT_RUN_START']);
    expect(readByRunId('run-1')).toHaveLength(2);
    expect(readLatest(1)[0].runId).toBe('run-2');
  });

  it('skips malformed lines', async () => {
    appendLog(createLogEvent('HEALTH_CHECK', {}));
    await fs.appendFile(path.join(dir, 'logs.jsonl'), 'not json\n{"type":"UNKNOWN"}\n', 'utf-8');

    expect(readAllLogs().map((e) => e.type)).toEqual(['HEALTH_CHECK']);
  });

  it('is empty before anything is written', () => {
    expect(readLatest()).toEqual([]);
  });
});
