// ─── Constants ───────────────────────────────────────────

import type { UserPreferences, VoteDirection } from '../types/governance.js';

/** Rolling voting-history window size */
export const VOTING_HISTORY_LIMIT = 10;

/** 1-based Snapshot choice index per vote direction */
export const VOTE_CHOICE_MAPPING: Readonly<Record<VoteDirection, number>> = {
  FOR: 1,
  AGAINST: 2,
  ABSTAIN: 3,
};

export const CONFIDENCE_DECIMAL_PLACES = 3;
export const MIN_REASONING_LENGTH = 10;
export const MIN_PROPOSAL_ID_LENGTH = 3;
export const MAX_PROPOSALS_PER_RUN_LIMIT = 10;
export const DEFAULT_ESTIMATED_GAS_COST = 0.005;
export const MAX_ESTIMATED_GAS_COST = 1000;

/** Queued attestations are dropped after this many failed attempts */
export const MAX_ATTESTATION_RETRIES = 3;

const defaultPreferences: UserPreferences = {
  votingStrategy: 'balanced',
  confidenceThreshold: 0.7,
  maxProposalsPerRun: 3,
  blacklistedProposers: [],
  whitelistedProposers: [],
};

export const DEFAULT_USER_PREFERENCES: UserPreferences = Object.freeze(defaultPreferences);

// State-manager keys
export const VOTING_HISTORY_KEY = 'voting_history';
export const USER_PREFERENCES_KEY = 'user_preferences';
export const CHECKPOINT_KEY_PREFIX = 'agent_checkpoint_';
export const SHUTDOWN_STATE_KEY = 'agent_shutdown_state';

export function checkpointKey(spaceId: string): string {
  return `${CHECKPOINT_KEY_PREFIX}${spaceId}`;
}

/** Snapshot Hub URL */
export const SNAPSHOT_HUB_URL = 'https://hub.snapshot.org';

/** Snapshot GraphQL endpoint */
export const SNAPSHOT_GRAPHQL_URL = 'https://hub.snapshot.org/graphql';
