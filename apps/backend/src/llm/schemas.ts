/**
 * Zod schema for the voting agent's LLM output. Every response is
 * validated before it becomes a VoteDecision.
 */

import { z } from 'zod';
import { RiskLevelSchema, VoteDirectionSchema } from '@govpilot/shared';

export const VoteDecisionOutputSchema = z.object({
  vote: VoteDirectionSchema,
  confidence: z.number().min(0).max(1),
  reasoning: z.string().min(10).max(1000),
  riskLevel: RiskLevelSchema,
  keyFactors: z.array(z.string().max(200)).max(5).default([]),
});

export type VoteDecisionOutput = z.infer<typeof VoteDecisionOutputSchema>;
