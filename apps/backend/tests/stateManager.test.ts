/**
 * State persistence
 * - File-backed store: round trip, missing and corrupt files, key rules
 * - Serialized concurrent writes
 * - In-memory store isolation
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '@govpilot/shared';
import { FileStateManager, MemoryStateManager } from '../src/storage/stateManager.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'govpilot-state-'));
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('FileStateManager', () => {
  it('round-trips state and checkpoints under separate files', async () => {
    const store = new FileStateManager(dir);
    await store.saveState('voting_history', { voting_history: [] });
    await store.saveCheckpoint('agent_checkpoint_test.eth', { runId: 'r1' });

    expect(await store.loadState('voting_history')).toEqual({ voting_history: [] });
    expect(await store.loadCheckpoint('agent_checkpoint_test.eth')).toEqual({ runId: 'r1' });
    expect((await fs.readdir(dir)).sort()).toEqual([
      'checkpoint_agent_checkpoint_test.eth.json',
      'voting_history.json',
    ]);
  });

  it('returns null for missing keys', async () => {
    const store = new FileStateManager(path.join(dir, 'not-created-yet'));
    expect(await store.loadState('anything')).toBeNull();
    expect(await store.loadCheckpoint('anything')).toBeNull();
    expect(await store.listCheckpoints()).toEqual([]);
  });

  it('returns null for a corrupt file', async () => {
    await fs.writeFile(path.join(dir, 'broken.json'), '{ not json', 'utf-8');
    expect(await new FileStateManager(dir).loadState('broken')).toBeNull();
  });

  it('rejects keys that could escape the directory', async () => {
    const store = new FileStateManager(dir);
    await expect(store.saveState('../outside', {})).rejects.toThrow(ValidationError);
    await expect(store.loadCheckpoint('a/b')).rejects.toThrow(ValidationError);
  });

  it('lists checkpoint keys by prefix', async () => {
    const store = new FileStateManager(dir);
    await store.saveCheckpoint('agent_checkpoint_b.eth', {});
    await store.saveCheckpoint('agent_checkpoint_a.eth', {});
    await store.saveCheckpoint('other', {});
    await store.saveState('agent_checkpoint_not_a_checkpoint', {});

    expect(await store.listCheckpoints('agent_checkpoint_')).toEqual([
      'agent_checkpoint_a.eth',
      'agent_checkpoint_b.eth',
    ]);
    expect(await store.listCheckpoints()).toEqual(['agent_checkpoint_a.eth', 'agent_checkpoint_b.eth', 'other']);
  });

  it('applies concurrent writes in call order', async () => {
    const store = new FileStateManager(dir);
    await Promise.all(Array.from({ length: 10 }, (_, i) => store.saveState('counter', { value: i })));
    expect(await store.loadState('counter')).toEqual({ value: 9 });
  });
});

describe('MemoryStateManager', () => {
  it('copies values in and out', async () => {
    const store = new MemoryStateManager();
    const original = { items: [1, 2] };
    await store.saveState('k', original);
    original.items.push(3);

    const loaded = await store.loadState('k');
    expect(loaded).toEqual({ items: [1, 2] });
  });

  it('keeps state and checkpoints apart', async () => {
    const store = new MemoryStateManager();
    await store.saveCheckpoint('k', { checkpoint: true });
    expect(await store.loadState('k')).toBeNull();
    expect(await store.listCheckpoints('k')).toEqual(['k']);
  });

  it('validates keys like the file store', async () => {
    await expect(new MemoryStateManager().saveState('bad key', {})).rejects.toThrow(ValidationError);
  });
});
