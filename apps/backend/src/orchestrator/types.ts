// ─── Collaborator contracts consumed by the agent run ────

import type {
  ActivityType,
  Proposal,
  ProposalState,
  UserPreferences,
  VoteDecision,
  VotingStrategy,
} from '@govpilot/shared';

export interface ProposalSource {
  /** Resolves to `[]` when the space has no matching proposals. */
  getProposals(spaceId: string, state: ProposalState, limit: number): Promise<Proposal[]>;
}

export interface PreferencesSource {
  loadPreferences(): Promise<UserPreferences>;
}

export interface DecisionMaker {
  /** May reject; callers handle each proposal's failure on its own. */
  decideVote(proposal: Proposal, strategy: VotingStrategy, spaceId?: string): Promise<VoteDecision>;
}

export interface VoteResult {
  success: boolean;
  transactionHash?: string;
  error?: string;
}

export interface VoteExecutor {
  /** Address votes are cast from, when a signer is configured. */
  readonly voterAddress: string | null;
  voteOnProposal(space: string, proposalId: string, choice: number): Promise<VoteResult>;
}

export interface ActivityResult {
  success: boolean;
  txHash?: string;
  error?: string;
}

export interface ActivityTracker {
  registerActivity(multisigAddress: string, activityType: ActivityType): Promise<ActivityResult>;
}

export interface AttestationRequest {
  proposalId: string;
  spaceId: string;
  voterAddress: string;
  choice: number;
  voteTxHash: string;
  reasoning: string;
  timestamp: string;
}

export interface AttestationResult {
  txHash?: string;
  attestationUid?: string;
}

export interface AttestationService {
  /** Rejects when the attestation could not be written. */
  createAttestation(request: AttestationRequest): Promise<AttestationResult>;
}
