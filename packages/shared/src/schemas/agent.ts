import { z } from 'zod';
import { VoteDirectionSchema } from './governance.js';
import { zISOTimestamp } from './validators.js';

// ─── Agent Run Zod Schemas ──────────────────────────────

export const ActivityTypeSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const PendingAttestationSchema = z.object({
  proposalId: z.string().min(1),
  spaceId: z.string().min(1),
  voterAddress: z.string(),
  choice: z.number().int(),
  vote: VoteDirectionSchema,
  voteTxHash: z.string(),
  reasoning: z.string(),
  timestamp: z.string(),
  retryCount: z.number().int().nonnegative().default(0),
  lastError: z.string().optional(),
});

export const CheckpointVoteSchema = z.object({
  proposalId: z.string(),
  vote: VoteDirectionSchema,
  confidence: z.number().finite().min(0).max(1),
  executed: z.boolean(),
  transactionHash: z.string().optional(),
  error: z.string().optional(),
  timestamp: z.string(),
});

/**
 * Stored run checkpoint. Unknown attestations are dropped individually
 * rather than failing the whole checkpoint.
 */
export const AgentCheckpointSchema = z.object({
  runId: z.string(),
  spaceId: z.string().min(1),
  proposalsAnalyzed: z.number().int().nonnegative(),
  votesCast: z.array(CheckpointVoteSchema),
  executionTime: z.number().nonnegative(),
  errors: z.array(z.string()),
  activityType: ActivityTypeSchema,
  dryRun: z.boolean().default(false),
  timestamp: zISOTimestamp,
  pendingAttestations: z
    .array(z.unknown())
    .default([])
    .transform((items) =>
      items.flatMap((item) => {
        const parsed = PendingAttestationSchema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      }),
    ),
});
