/**
 * Environment configuration: defaults, parsing and collected violations.
 */

import { describe, expect, it } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { loadConfig, parseCsv } from '../src/config/env.js';

const MULTISIG = '0x2222222222222222222222222222222222222222';
const TRACKER = '0x1111111111111111111111111111111111111111';

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

describe('parseCsv', () => {
  it('trims and drops empty parts', () => {
    expect(parseCsv(' a.eth, ,b.eth,')).toEqual(['a.eth', 'b.eth']);
  });
});

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({ DATA_DIR: '/tmp/govpilot-data' });
    expect(config).toMatchObject({
      dataDir: '/tmp/govpilot-data',
      preferencesFile: '/tmp/govpilot-data/user_preferences.json',
      snapshotGraphqlUrl: 'https://hub.snapshot.org/graphql',
      snapshotHubUrl: 'https://hub.snapshot.org',
      rpcUrl: 'https://mainnet.base.org',
      spaces: [],
      dryRun: true,
      loopEnabled: false,
      intervalMs: 900_000,
      decisionConcurrency: 3,
      dryRunCountsAsVoteCast: false,
      healthTimeoutMs: 50,
      geminiModel: 'gemini-2.0-flash',
      consoleLogs: true,
    });
    expect(config.multisigAddress).toBeUndefined();
    expect(config.voterPrivateKey).toBeUndefined();
  });

  it('parses explicit values', () => {
    const config = loadConfig({
      SNAPSHOT_SPACES: 'a.eth,b.eth',
      AGENT_DRY_RUN: 'false',
      AGENT_LOOP_ENABLED: 'true',
      AGENT_INTERVAL_MS: '60000',
      SNAPSHOT_HUB_URL: 'https://hub.test/',
      MULTISIG_ADDRESS: MULTISIG,
      QUORUM_TRACKER_ADDRESS: TRACKER,
      VOTER_PRIVATE_KEY: 'ab'.repeat(32),
    });
    expect(config.spaces).toEqual(['a.eth', 'b.eth']);
    expect(config.dryRun).toBe(false);
    expect(config.loopEnabled).toBe(true);
    expect(config.intervalMs).toBe(60_000);
    expect(config.snapshotHubUrl).toBe('https://hub.test');
    expect(config.multisigAddress).toBe(MULTISIG);
    expect(config.voterPrivateKey).toBe(`0x${'ab'.repeat(32)}`);
  });

  it('collects every violation', () => {
    const err = configError({
      AGENT_DRY_RUN: 'yes',
      AGENT_INTERVAL_MS: '10',
      MULTISIG_ADDRESS: '0x123',
      VOTER_PRIVATE_KEY: 'test-secret',
    });
    expect(err.violations).toEqual([
      'AGENT_DRY_RUN must be "true" or "false" (got "yes").',
      `AGENT_INTERVAL_MS must be an integer between 1000 and ${Number.MAX_SAFE_INTEGER} (got "10").`,
      'MULTISIG_ADDRESS is not a valid 0x address (got "0x123").',
      'VOTER_PRIVATE_KEY must be a 32-byte hex private key.',
    ]);
  });

  it('requires a multisig when the tracker is configured', () => {
    expect(configError({ QUORUM_TRACKER_ADDRESS: TRACKER }).violations).toEqual([
      'QUORUM_TRACKER_ADDRESS is set but MULTISIG_ADDRESS is not. Activity cannot be attributed.',
    ]);
  });

  it('requires spaces when the loop is enabled', () => {
    expect(configError({ AGENT_LOOP_ENABLED: 'true' }).violations).toEqual([
      'AGENT_LOOP_ENABLED=true requires at least one space in SNAPSHOT_SPACES.',
    ]);
  });
});
