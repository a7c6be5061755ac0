import { z } from 'zod';
import {
  CONFIDENCE_DECIMAL_PLACES,
  DEFAULT_ESTIMATED_GAS_COST,
  DEFAULT_USER_PREFERENCES,
  MAX_ESTIMATED_GAS_COST,
  MAX_PROPOSALS_PER_RUN_LIMIT,
  MIN_PROPOSAL_ID_LENGTH,
  MIN_REASONING_LENGTH,
} from '../constants/index.js';
import { ValidationError } from '../errors.js';
import type {
  AttestationOutcome,
  Proposal,
  UserPreferences,
  VoteDecision,
  VoteExecutionOutcome,
} from '../types/governance.js';

// ─── Governance Zod Schemas ─────────────────────────────

export const VoteDirectionSchema = z.enum(['FOR', 'AGAINST', 'ABSTAIN']);
export const ProposalStateSchema = z.enum(['pending', 'active', 'closed']);
export const VotingStrategySchema = z.enum(['conservative', 'balanced', 'aggressive']);
export const RiskLevelSchema = z.enum(['LOW', 'MEDIUM', 'HIGH']);
export const AttestationStatusSchema = z.enum(['pending', 'success', 'failed']);

const unixSeconds = z.number().int().nonnegative();

export const ProposalSchema = z
  .object({
    id: z.string().trim().min(1, 'id must be a non-empty string'),
    title: z.string().trim().min(1, 'title must be a non-empty string'),
    body: z.string().default(''),
    author: z.string().trim().min(1, 'author must be a non-empty string'),
    choices: z.array(z.string()).default([]),
    start: unixSeconds,
    end: unixSeconds,
    created: unixSeconds,
    state: ProposalStateSchema,
    scores: z.array(z.number().finite()).default([]),
    scoresTotal: z.number().finite().nonnegative().default(0),
    votes: z.number().int().nonnegative().default(0),
    quorum: z.number().finite().nonnegative().default(0),
    space: z.string().optional(),
    snapshot: z.string().optional(),
    discussion: z.string().optional(),
    url: z.string().optional(),
  })
  .superRefine((p, ctx) => {
    if (p.created > p.start) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['created'], message: 'created must not be after start' });
    }
    if (p.start > p.end) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['start'], message: 'start must not be after end' });
    }
    if (p.scores.length > 0 && p.scores.length !== p.choices.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scores'],
        message: `scores has ${p.scores.length} entries for ${p.choices.length} choices`,
      });
    }
  });

export type ProposalInput = z.input<typeof ProposalSchema>;

const ProposerListSchema = z.array(z.string().trim().min(1, 'proposer entries must be non-empty'));

/** Shape check with no defaults: every field must be present. */
export const UserPreferencesSchema = z.object({
  votingStrategy: VotingStrategySchema,
  confidenceThreshold: z.number().min(0).max(1),
  maxProposalsPerRun: z.number().int().min(1).max(MAX_PROPOSALS_PER_RUN_LIMIT),
  blacklistedProposers: ProposerListSchema,
  whitelistedProposers: ProposerListSchema,
});

export type UserPreferencesInput = Partial<z.input<typeof UserPreferencesSchema>>;

export function roundConfidence(value: number): number {
  const factor = 10 ** CONFIDENCE_DECIMAL_PLACES;
  return Math.round(value * factor) / factor;
}

export const VoteDecisionSchema = z.object({
  proposalId: z.string().trim().min(MIN_PROPOSAL_ID_LENGTH, `proposalId must be at least ${MIN_PROPOSAL_ID_LENGTH} characters`),
  vote: VoteDirectionSchema,
  confidence: z.number().finite().min(0).max(1).transform(roundConfidence),
  reasoning: z.string().trim().min(MIN_REASONING_LENGTH, `reasoning must be at least ${MIN_REASONING_LENGTH} characters`),
  riskAssessment: RiskLevelSchema.default('MEDIUM'),
  strategyUsed: VotingStrategySchema.default('balanced'),
  spaceId: z.string().trim().min(1).optional(),
  estimatedGasCost: z.number().min(0).max(MAX_ESTIMATED_GAS_COST).default(DEFAULT_ESTIMATED_GAS_COST),
  executed: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  transactionHash: z.string().optional(),
  error: z.string().optional(),
  attestationStatus: AttestationStatusSchema.optional(),
  attestationTxHash: z.string().optional(),
  attestationUid: z.string().optional(),
  attestationError: z.string().optional(),
});

export type VoteDecisionInput = z.input<typeof VoteDecisionSchema>;

export const AgentRunRequestSchema = z.object({
  spaceId: z.string().trim().min(1, 'spaceId must be a non-empty string'),
  dryRun: z.boolean().default(false),
});

export type AgentRunRequestInput = z.input<typeof AgentRunRequestSchema>;

/**
 * Lenient schema for one persisted history record. A missing or
 * malformed confidence reads as 0; malformed optional fields are dropped.
 * Records without a proposal id or a known vote fail.
 */
export const RawHistoryRecordSchema = z.object({
  proposal_id: z.string().trim().min(1),
  vote: VoteDirectionSchema,
  confidence: z.number().finite().min(0).max(1).catch(0),
  reasoning: z.string().optional().catch(undefined),
  risk_assessment: RiskLevelSchema.optional().catch(undefined),
  strategy_used: VotingStrategySchema.optional().catch(undefined),
  space_id: z.string().optional().catch(undefined),
  executed: z.boolean().optional().catch(undefined),
  transaction_hash: z.string().optional().catch(undefined),
  timestamp: z.string().optional().catch(undefined),
});

// ─── Constructors ────────────────────────────────────────

export function createProposal(input: ProposalInput): Proposal {
  const parsed = ProposalSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid proposal', parsed.error);
  }
  return Object.freeze(parsed.data);
}

export function isProposal(value: unknown): value is Proposal {
  return ProposalSchema.safeParse(value).success;
}

/**
 * Preferences from an untrusted object (stored state, a JSON file).
 * Unset fields come from the defaults.
 */
export function parseUserPreferences(raw: object): UserPreferences {
  const parsed = UserPreferencesSchema.safeParse({ ...DEFAULT_USER_PREFERENCES, ...raw });
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid user preferences', parsed.error);
  }
  return Object.freeze(parsed.data);
}

/** Build preferences from partial input, filling unset fields from the defaults. */
export function createUserPreferences(input: UserPreferencesInput = {}): UserPreferences {
  return parseUserPreferences(input);
}


export function createVoteDecision(input: VoteDecisionInput): VoteDecision {
  const parsed = VoteDecisionSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid vote decision', parsed.error);
  }
  return Object.freeze(parsed.data);
}

/** Copy of `decision` with its execution outcome set. */
export function withExecution(decision: VoteDecision, outcome: VoteExecutionOutcome): VoteDecision {
  return Object.freeze({ ...decision, ...outcome });
}

/** Copy of `decision` with its attestation outcome set. */
export function withAttestation(decision: VoteDecision, outcome: AttestationOutcome): VoteDecision {
  return Object.freeze({ ...decision, ...outcome });
}
