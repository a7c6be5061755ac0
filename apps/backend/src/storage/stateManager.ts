/**
 * Key-value persistence for agent state and run checkpoints.
 *
 * Loaded values are `unknown`: callers parse them at their own boundary.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { ValidationError } from '@govpilot/shared';
import { toErrorMessage } from '../errors.js';

export interface StateManager {
  loadState(key: string): Promise<unknown>;
  saveState(key: string, data: object): Promise<void>;
  saveCheckpoint(key: string, data: object): Promise<void>;
  loadCheckpoint(key: string): Promise<unknown>;
  /** Checkpoint keys starting with `prefix`, sorted. */
  listCheckpoints(prefix?: string): Promise<string[]>;
}

const KEY_PATTERN = /^[A-Za-z0-9._-]+$/;
const CHECKPOINT_FILE_PREFIX = 'checkpoint_';

function assertKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new ValidationError(`Invalid state key "${key}" (allowed: letters, digits, ".", "_", "-")`);
  }
}

// ─── File-backed ─────────────────────────────────────────

/**
 * One JSON file per key under `dir`. Writes go to a temp file and are
 * renamed into place, serialized through a promise chain.
 */
export class FileStateManager implements StateManager {
  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly dir: string) {}

  private stateFile(key: string): string {
    assertKey(key);
    return path.join(this.dir, `${key}.json`);
  }

  private checkpointFile(key: string): string {
    assertKey(key);
    return path.join(this.dir, `${CHECKPOINT_FILE_PREFIX}${key}.json`);
  }

  private async withLock<T>(work: () => Promise<T>): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await work();
    } finally {
      release();
    }
  }

  private async writeJson(file: string, data: object): Promise<void> {
    await this.withLock(async () => {
      await fs.mkdir(this.dir, { recursive: true });
      const tmp = `${file}.${process.pid}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(data, null, 2), 'utf-8');
      await fs.rename(tmp, file);
    });
  }

  private async readJson(file: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      console.warn(`[stateManager] corrupt state file ${path.basename(file)}: ${toErrorMessage(err)}`);
      return null;
    }
  }

  async loadState(key: string): Promise<unknown> {
    return this.readJson(this.stateFile(key));
  }

  async saveState(key: string, data: object): Promise<void> {
    await this.writeJson(this.stateFile(key), data);
  }

  async saveCheckpoint(key: string, data: object): Promise<void> {
    await this.writeJson(this.checkpointFile(key), data);
  }

  async loadCheckpoint(key: string): Promise<unknown> {
    return this.readJson(this.checkpointFile(key));
  }

  async listCheckpoints(prefix = ''): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
    return entries
      .filter((name) => name.startsWith(CHECKPOINT_FILE_PREFIX) && name.endsWith('.json'))
      .map((name) => name.slice(CHECKPOINT_FILE_PREFIX.length, -'.json'.length))
      .filter((key) => key.startsWith(prefix))
      .sort();
  }
}

// ─── In-memory ───────────────────────────────────────────

/** Same contract as FileStateManager, values deep-copied in and out. */
export class MemoryStateManager implements StateManager {
  private readonly state = new Map<string, unknown>();
  private readonly checkpoints = new Map<string, unknown>();

  async loadState(key: string): Promise<unknown> {
    assertKey(key);
    return this.state.has(key) ? structuredClone(this.state.get(key)) : null;
  }

  async saveState(key: string, data: object): Promise<void> {
    assertKey(key);
    this.state.set(key, structuredClone(data));
  }

  async saveCheckpoint(key: string, data: object): Promise<void> {
    assertKey(key);
    this.checkpoints.set(key, structuredClone(data));
  }

  async loadCheckpoint(key: string): Promise<unknown> {
    assertKey(key);
    return this.checkpoints.has(key) ? structuredClone(this.checkpoints.get(key)) : null;
  }

  async listCheckpoints(prefix = ''): Promise<string[]> {
    return [...this.checkpoints.keys()].filter((key) => key.startsWith(prefix)).sort();
  }
}
