// ─── @govpilot/shared barrel export ──────────────────────

// Types
export type {
  VoteDirection,
  ProposalState,
  VotingStrategy,
  RiskLevel,
  Proposal,
  UserPreferences,
  AttestationStatus,
  VoteDecision,
  VoteExecutionOutcome,
  AttestationOutcome,
  VotingHistoryEntry,
  RawHistoryRecord,
  VotingHistoryDocument,
  VotingPatterns,
  FilteringMetrics,
} from './types/governance.js';
export { ActivityType } from './types/governance.js';

export type {
  AgentRunRequest,
  AgentRunResponse,
  RunStage,
  StageTransition,
  PendingAttestation,
  CheckpointVote,
  AgentCheckpoint,
  AgentStatus,
  RunStatistics,
} from './types/agent.js';

export type { LogEventType, LogLevel, LogEvent } from './types/logs.js';

// Schemas
export {
  VoteDirectionSchema,
  ProposalStateSchema,
  VotingStrategySchema,
  RiskLevelSchema,
  AttestationStatusSchema,
  ProposalSchema,
  UserPreferencesSchema,
  VoteDecisionSchema,
  AgentRunRequestSchema,
  RawHistoryRecordSchema,
  roundConfidence,
  createProposal,
  isProposal,
  createUserPreferences,
  parseUserPreferences,
  createVoteDecision,
  withExecution,
  withAttestation,
} from './schemas/governance.js';
export type {
  ProposalInput,
  UserPreferencesInput,
  VoteDecisionInput,
  AgentRunRequestInput,
} from './schemas/governance.js';

export {
  ActivityTypeSchema,
  PendingAttestationSchema,
  CheckpointVoteSchema,
  AgentCheckpointSchema,
} from './schemas/agent.js';

export { LogEventTypeSchema, LogLevelSchema, LogEventSchema } from './schemas/logs.js';

// ─── Validators ──────────────────────────────────────────
export { zISOTimestamp } from './schemas/validators.js';

// ─── Errors ──────────────────────────────────────────────
export { ValidationError, formatZodIssues } from './errors.js';

// Constants
export * from './constants/index.js';
