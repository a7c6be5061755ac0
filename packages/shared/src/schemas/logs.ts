import { z } from 'zod';

export const LogEventTypeSchema = z.enum([
  'AGENT_RUN_START', 'AGENT_RUN_END', 'STAGE_TRANSITION',
  'PROPOSALS_FETCHED', 'PROPOSALS_FILTERED', 'VOTE_DECISION', 'VOTE_EXECUTED', 'VOTE_EXECUTE_FAIL',
  'ACTIVITY_TRACKED', 'ATTESTATION_QUEUED', 'ATTESTATION_PROCESSED', 'CHECKPOINT_SAVED',
  'HEALTH_CHECK', 'ERROR', 'LOOP_START', 'LOOP_STOP',
]);

export const LogLevelSchema = z.enum(['INFO', 'WARN', 'ERROR']);

export const LogEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: LogEventTypeSchema,
  runId: z.string().optional(),
  payload: z.unknown(),
  level: LogLevelSchema,
});
