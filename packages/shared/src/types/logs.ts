// ─── Log Event Types ─────────────────────────────────────

/**
 * Structured log event persisted for every run action.
 */
export type LogEventType =
  | 'AGENT_RUN_START'
  | 'AGENT_RUN_END'
  | 'STAGE_TRANSITION'
  | 'PROPOSALS_FETCHED'
  | 'PROPOSALS_FILTERED'
  | 'VOTE_DECISION'
  | 'VOTE_EXECUTED'
  | 'VOTE_EXECUTE_FAIL'
  | 'ACTIVITY_TRACKED'
  | 'ATTESTATION_QUEUED'
  | 'ATTESTATION_PROCESSED'
  | 'CHECKPOINT_SAVED'
  | 'HEALTH_CHECK'
  | 'ERROR'
  | 'LOOP_START'
  | 'LOOP_STOP';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogEvent {
  id: string;
  timestamp: number; // ms
  type: LogEventType;
  runId?: string;
  payload: unknown;
  level: LogLevel;
}
