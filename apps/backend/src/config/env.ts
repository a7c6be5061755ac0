/**
 * Agent configuration, read once from the environment.
 *
 * Every value is optional and falls back to a local-dev default. Invalid
 * values are collected and reported together through ConfigError so the
 * process never starts half-configured.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { getAddress, isAddress, type Address, type Hex } from 'viem';
import { SNAPSHOT_GRAPHQL_URL, SNAPSHOT_HUB_URL } from '@govpilot/shared';
import { ConfigError } from '../errors.js';

export interface AgentConfig {
  dataDir: string;
  preferencesFile: string;
  snapshotGraphqlUrl: string;
  snapshotHubUrl: string;
  rpcUrl: string;
  spaces: string[];
  dryRun: boolean;
  loopEnabled: boolean;
  intervalMs: number;
  decisionConcurrency: number;
  /** Count dry-run decisions as VOTE_CAST when classifying activity */
  dryRunCountsAsVoteCast: boolean;
  healthTimeoutMs: number;
  multisigAddress?: Address;
  quorumTrackerAddress?: Address;
  voterPrivateKey?: Hex;
  geminiApiKey?: string;
  geminiModel: string;
  consoleLogs: boolean;
}

const DEFAULT_INTERVAL_MS = 15 * 60 * 1000; // 15 minutes
const MIN_INTERVAL_MS = 1_000;
const DEFAULT_HEALTH_TIMEOUT_MS = 50;
const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
const DEFAULT_RPC_URL = 'https://mainnet.base.org';

const zUrl = z.string().url();

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseCsv(raw: string): string[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

/**
 * Parse and validate configuration from `env`.
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const violations: string[] = [];

  const flag = (name: string, fallback: boolean): boolean => {
    const raw = envString(env, name);
    if (raw === undefined) return fallback;
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    violations.push(`${name} must be "true" or "false" (got "${raw}").`);
    return fallback;
  };

  const integer = (name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const raw = envString(env, name);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      violations.push(`${name} must be an integer between ${min} and ${max} (got "${raw}").`);
      return fallback;
    }
    return parsed;
  };

  const url = (name: string, fallback: string): string => {
    const raw = envString(env, name) ?? fallback;
    if (!zUrl.safeParse(raw).success) {
      violations.push(`${name} is not a valid URL (got "${raw}").`);
      return fallback;
    }
    return raw.replace(/\/+$/, '');
  };

  const address = (name: string): Address | undefined => {
    const raw = envString(env, name);
    if (raw === undefined) return undefined;
    if (!isAddress(raw, { strict: false })) {
      violations.push(`${name} is not a valid 0x address (got "${raw}").`);
      return undefined;
    }
    return getAddress(raw);
  };

  const privateKey = (name: string): Hex | undefined => {
    const raw = envString(env, name);
    if (raw === undefined) return undefined;
    const body = raw.startsWith('0x') ? raw.slice(2) : raw;
    if (!/^[0-9a-fA-F]{64}$/.test(body)) {
      violations.push(`${name} must be a 32-byte hex private key.`);
      return undefined;
    }
    const hex: Hex = `0x${body}`;
    return hex;
  };

  const dataDir = envString(env, 'DATA_DIR') ?? join(process.cwd(), '.data');

  const config: AgentConfig = {
    dataDir,
    preferencesFile: envString(env, 'PREFERENCES_FILE') ?? join(dataDir, 'user_preferences.json'),
    snapshotGraphqlUrl: url('SNAPSHOT_GRAPHQL_URL', SNAPSHOT_GRAPHQL_URL),
    snapshotHubUrl: url('SNAPSHOT_HUB_URL', SNAPSHOT_HUB_URL),
    rpcUrl: url('RPC_URL', DEFAULT_RPC_URL),
    spaces: parseCsv(envString(env, 'SNAPSHOT_SPACES') ?? ''),
    dryRun: flag('AGENT_DRY_RUN', true),
    loopEnabled: flag('AGENT_LOOP_ENABLED', false),
    intervalMs: integer('AGENT_INTERVAL_MS', DEFAULT_INTERVAL_MS, MIN_INTERVAL_MS),
    decisionConcurrency: integer('DECISION_CONCURRENCY', 3, 1, 10),
    dryRunCountsAsVoteCast: flag('DRY_RUN_COUNTS_AS_VOTE_CAST', false),
    healthTimeoutMs: integer('HEALTH_TIMEOUT_MS', DEFAULT_HEALTH_TIMEOUT_MS, 1, 60_000),
    multisigAddress: address('MULTISIG_ADDRESS'),
    quorumTrackerAddress: address('QUORUM_TRACKER_ADDRESS'),
    voterPrivateKey: privateKey('VOTER_PRIVATE_KEY'),
    geminiApiKey: envString(env, 'GEMINI_API_KEY'),
    geminiModel: envString(env, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL,
    consoleLogs: flag('CONSOLE_LOGS', true),
  };

  if (config.quorumTrackerAddress && !config.multisigAddress) {
    violations.push('QUORUM_TRACKER_ADDRESS is set but MULTISIG_ADDRESS is not. Activity cannot be attributed.');
  }
  if (config.loopEnabled && config.spaces.length === 0) {
    violations.push('AGENT_LOOP_ENABLED=true requires at least one space in SNAPSHOT_SPACES.');
  }

  if (violations.length > 0) {
    throw new ConfigError(violations);
  }
  return config;
}

let _config: AgentConfig | null = null;

/** Get the process config (cached after first load). */
export function getConfig(): AgentConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/** Force-reload config. Useful in tests or after env changes. */
export function reloadConfig(): AgentConfig {
  _config = null;
  return getConfig();
}
