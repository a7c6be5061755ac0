// ─── Governance Types ────────────────────────────────────

/** Vote direction */
export type VoteDirection = 'FOR' | 'AGAINST' | 'ABSTAIN';

export type ProposalState = 'pending' | 'active' | 'closed';

export type VotingStrategy = 'conservative' | 'balanced' | 'aggressive';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

/**
 * Normalized governance proposal. Read-only for the whole run.
 */
export interface Proposal {
  readonly id: string;
  readonly title: string;
  readonly body: string;
  readonly author: string;
  readonly choices: readonly string[];
  readonly start: number; // unix seconds
  readonly end: number;
  readonly created: number;
  readonly state: ProposalState;
  readonly scores: readonly number[]; // voting power per choice
  readonly scoresTotal: number;
  readonly votes: number; // participant count
  readonly quorum: number;
  readonly space?: string;
  readonly snapshot?: string;
  readonly discussion?: string;
  readonly url?: string;
}

export interface UserPreferences {
  readonly votingStrategy: VotingStrategy;
  readonly confidenceThreshold: number;
  readonly maxProposalsPerRun: number;
  readonly blacklistedProposers: readonly string[];
  readonly whitelistedProposers: readonly string[];
}

export type AttestationStatus = 'pending' | 'success' | 'failed';

/**
 * Outcome of the decision step for one proposal.
 * Execution and attestation fields are the only ones set after creation.
 */
export interface VoteDecision {
  readonly proposalId: string;
  readonly vote: VoteDirection;
  readonly confidence: number;
  readonly reasoning: string;
  readonly riskAssessment: RiskLevel;
  readonly strategyUsed: VotingStrategy;
  readonly spaceId?: string;
  readonly estimatedGasCost: number;
  readonly executed?: boolean;
  readonly dryRun?: boolean;
  readonly transactionHash?: string;
  readonly error?: string;
  readonly attestationStatus?: AttestationStatus;
  readonly attestationTxHash?: string;
  readonly attestationUid?: string;
  readonly attestationError?: string;
}

export interface VoteExecutionOutcome {
  executed: boolean;
  dryRun?: boolean;
  transactionHash?: string;
  error?: string;
}

export interface AttestationOutcome {
  attestationStatus: AttestationStatus;
  attestationTxHash?: string;
  attestationUid?: string;
  attestationError?: string;
}

/** Validated entry of the rolling voting history. */
export interface VotingHistoryEntry {
  proposalId: string;
  vote: VoteDirection;
  confidence: number;
  reasoning?: string;
  riskAssessment?: RiskLevel;
  strategyUsed?: VotingStrategy;
  spaceId?: string;
  executed?: boolean;
  transactionHash?: string;
  timestamp?: string;
}

/**
 * On-disk shape of one history entry. Anything loaded from storage is
 * treated as unknown until parsed into a VotingHistoryEntry.
 */
export interface RawHistoryRecord {
  proposal_id: string;
  vote: VoteDirection;
  confidence: number;
  reasoning?: string;
  risk_assessment?: RiskLevel;
  strategy_used?: VotingStrategy;
  space_id?: string;
  executed?: boolean;
  transaction_hash?: string;
  timestamp?: string;
}

export interface VotingHistoryDocument {
  voting_history: RawHistoryRecord[];
}

export interface VotingPatterns {
  totalVotes: number;
  voteDistribution: Record<VoteDirection, number>;
  averageConfidence: number;
}

export interface FilteringMetrics {
  originalCount: number;
  filteredCount: number;
  blacklistedCount: number;
  whitelistFilteredCount: number;
  filterEfficiency: number;
  blacklistedProposers: number;
  whitelistedProposers: number;
  hasWhitelist: boolean;
  hasBlacklist: boolean;
}

/**
 * Activity classification reported to the on-chain tracker.
 * Values are fixed by the tracker contract's enum.
 */
export const ActivityType = {
  VOTE_CAST: 0,
  OPPORTUNITY_CONSIDERED: 1,
  NO_OPPORTUNITY: 2,
} as const;

export type ActivityType = (typeof ActivityType)[keyof typeof ActivityType];
