// ─── Agent Run Types ─────────────────────────────────────

import type { ActivityType, VoteDecision, VoteDirection } from './governance.js';

export interface AgentRunRequest {
  spaceId: string;
  dryRun: boolean;
}

/**
 * Summary of one agent run. `errors` is the only channel for
 * recoverable failures; a run with errors is still a valid response.
 */
export interface AgentRunResponse {
  runId: string;
  spaceId: string;
  proposalsAnalyzed: number;
  votesCast: VoteDecision[];
  userPreferencesApplied: boolean;
  executionTime: number; // seconds
  errors: string[];
  activityType: ActivityType;
  nextCheckTime: string | null;
}

export type RunStage =
  | 'IDLE'
  | 'STARTING'
  | 'LOADING_PREFERENCES'
  | 'FETCHING_PROPOSALS'
  | 'FILTERING'
  | 'DECIDING'
  | 'EXECUTING'
  | 'CLASSIFYING_ACTIVITY'
  | 'PERSISTING'
  | 'COMPLETED'
  | 'ERROR';

export interface StageTransition {
  from: RunStage;
  to: RunStage;
  at: number; // ms
  valid: boolean;
  runId?: string;
}

/** Attestation waiting to be written for an executed vote. */
export interface PendingAttestation {
  proposalId: string;
  spaceId: string;
  voterAddress: string;
  choice: number;
  vote: VoteDirection;
  voteTxHash: string;
  reasoning: string;
  timestamp: string;
  retryCount: number;
  lastError?: string;
}

export interface CheckpointVote {
  proposalId: string;
  vote: VoteDirection;
  confidence: number;
  executed: boolean;
  transactionHash?: string;
  error?: string;
  timestamp: string;
}

export interface AgentCheckpoint {
  runId: string;
  spaceId: string;
  proposalsAnalyzed: number;
  votesCast: CheckpointVote[];
  executionTime: number;
  errors: string[];
  activityType: ActivityType;
  dryRun: boolean;
  timestamp: string; // ISO
  pendingAttestations: PendingAttestation[];
}

export interface AgentStatus {
  currentStage: RunStage;
  isActive: boolean;
  currentSpaceId: string | null;
  lastRunTimestamp: string | null;
}

export interface RunStatistics {
  totalRuns: number;
  totalProposalsEvaluated: number;
  totalVotesCast: number;
  averageConfidenceScore: number;
  successRate: number;
  averageRuntimeSeconds: number;
}
