/**
 * User preferences, loaded from the state manager first and a JSON file
 * second. Anything missing or invalid falls back to the defaults.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {
  DEFAULT_USER_PREFERENCES,
  USER_PREFERENCES_KEY,
  createUserPreferences,
  parseUserPreferences,
  type UserPreferences,
  type UserPreferencesInput,
} from '@govpilot/shared';
import type { PreferencesSource } from '../orchestrator/types.js';
import type { StateManager } from '../storage/stateManager.js';
import { toErrorMessage } from '../errors.js';

function asPreferences(raw: unknown, origin: string): UserPreferences | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    console.warn(`[preferences] ignoring ${origin}: not an object`);
    return null;
  }
  try {
    return parseUserPreferences(raw);
  } catch (err) {
    console.warn(`[preferences] ignoring ${origin}: ${toErrorMessage(err)}`);
    return null;
  }
}

export class UserPreferencesService implements PreferencesSource {
  constructor(
    private readonly stateManager: StateManager,
    private readonly filePath: string,
  ) {}

  async loadPreferences(): Promise<UserPreferences> {
    try {
      const fromState = asPreferences(await this.stateManager.loadState(USER_PREFERENCES_KEY), 'stored preferences');
      if (fromState) return fromState;
    } catch (err) {
      console.warn(`[preferences] state load failed: ${toErrorMessage(err)}`);
    }

    const fromFile = asPreferences(await this.readFile(), this.filePath);
    return fromFile ?? DEFAULT_USER_PREFERENCES;
  }

  /** Write to both the state manager and the preferences file. */
  async savePreferences(input: UserPreferencesInput): Promise<UserPreferences> {
    const preferences = createUserPreferences(input);
    await this.stateManager.saveState(USER_PREFERENCES_KEY, preferences);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(preferences, null, 2), 'utf-8');
    await fs.rename(tmp, this.filePath);
    return preferences;
  }

  private async readFile(): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      console.warn(`[preferences] cannot read ${this.filePath}: ${toErrorMessage(err)}`);
      return null;
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      console.warn(`[preferences] invalid JSON in ${this.filePath}: ${toErrorMessage(err)}`);
      return null;
    }
  }
}
