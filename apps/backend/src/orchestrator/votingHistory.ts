/**
 * Rolling voting history, bounded to the most recent entries.
 *
 * Stored as `{ voting_history: RawHistoryRecord[] }` under the
 * `voting_history` key. Records are parsed leniently on load: a missing
 * confidence reads as 0, records without a proposal id or a known vote
 * are dropped.
 */

import {
  RawHistoryRecordSchema,
  VOTING_HISTORY_KEY,
  VOTING_HISTORY_LIMIT,
  roundConfidence,
  type RawHistoryRecord,
  type VoteDecision,
  type VotingHistoryDocument,
  type VotingHistoryEntry,
  type VotingPatterns,
} from '@govpilot/shared';
import type { StateManager } from '../storage/stateManager.js';

// ─── Deserialization boundary ────────────────────────────

export function parseHistoryRecord(raw: unknown): VotingHistoryEntry | null {
  const parsed = RawHistoryRecordSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  return {
    proposalId: r.proposal_id,
    vote: r.vote,
    confidence: r.confidence,
    reasoning: r.reasoning,
    riskAssessment: r.risk_assessment,
    strategyUsed: r.strategy_used,
    spaceId: r.space_id,
    executed: r.executed,
    transactionHash: r.transaction_hash,
    timestamp: r.timestamp,
  };
}

/** Entries of a stored history document; anything unrecognizable reads as empty. */
export function parseHistoryDocument(raw: unknown): VotingHistoryEntry[] {
  if (raw === null || typeof raw !== 'object' || !(VOTING_HISTORY_KEY in raw)) return [];
  const records: unknown = raw[VOTING_HISTORY_KEY];
  if (!Array.isArray(records)) return [];

  const entries: VotingHistoryEntry[] = [];
  for (const record of records) {
    const entry = parseHistoryRecord(record);
    if (entry) entries.push(entry);
  }
  return entries;
}

export function toHistoryRecord(entry: VotingHistoryEntry): RawHistoryRecord {
  const record: RawHistoryRecord = {
    proposal_id: entry.proposalId,
    vote: entry.vote,
    confidence: entry.confidence,
  };
  if (entry.reasoning !== undefined) record.reasoning = entry.reasoning;
  if (entry.riskAssessment !== undefined) record.risk_assessment = entry.riskAssessment;
  if (entry.strategyUsed !== undefined) record.strategy_used = entry.strategyUsed;
  if (entry.spaceId !== undefined) record.space_id = entry.spaceId;
  if (entry.executed !== undefined) record.executed = entry.executed;
  if (entry.transactionHash !== undefined) record.transaction_hash = entry.transactionHash;
  if (entry.timestamp !== undefined) record.timestamp = entry.timestamp;
  return record;
}

export function decisionToHistoryEntry(decision: VoteDecision, timestamp: string): VotingHistoryEntry {
  return {
    proposalId: decision.proposalId,
    vote: decision.vote,
    confidence: decision.confidence,
    reasoning: decision.reasoning,
    riskAssessment: decision.riskAssessment,
    strategyUsed: decision.strategyUsed,
    spaceId: decision.spaceId,
    executed: decision.executed ?? false,
    transactionHash: decision.transactionHash,
    timestamp,
  };
}

/** Last `limit` items in insertion order. */
export function trimHistory<T>(entries: readonly T[], limit: number = VOTING_HISTORY_LIMIT): T[] {
  return entries.slice(Math.max(0, entries.length - limit));
}

export function summarizePatterns(entries: readonly VotingHistoryEntry[]): VotingPatterns {
  const voteDistribution = { FOR: 0, AGAINST: 0, ABSTAIN: 0 };
  let confidenceSum = 0;
  for (const entry of entries) {
    voteDistribution[entry.vote]++;
    confidenceSum += entry.confidence;
  }
  return {
    totalVotes: entries.length,
    voteDistribution,
    averageConfidence: entries.length === 0 ? 0 : roundConfidence(confidenceSum / entries.length),
  };
}

// ─── Store ───────────────────────────────────────────────

export class VotingHistoryStore {
  constructor(
    private readonly stateManager: StateManager,
    private readonly limit: number = VOTING_HISTORY_LIMIT,
  ) {}

  async load(): Promise<VotingHistoryEntry[]> {
    const raw = await this.stateManager.loadState(VOTING_HISTORY_KEY);
    return trimHistory(parseHistoryDocument(raw), this.limit);
  }

  /** Append in the given order, evicting the oldest beyond the limit. No-op for an empty list. */
  async append(decisions: readonly VoteDecision[], timestamp: string): Promise<VotingHistoryEntry[] | null> {
    if (decisions.length === 0) return null;

    const existing = await this.load();
    const combined = trimHistory(
      [...existing, ...decisions.map((decision) => decisionToHistoryEntry(decision, timestamp))],
      this.limit,
    );
    const document: VotingHistoryDocument = { voting_history: combined.map(toHistoryRecord) };
    await this.stateManager.saveState(VOTING_HISTORY_KEY, document);
    return combined;
  }

  async patterns(): Promise<VotingPatterns> {
    return summarizePatterns(await this.load());
  }
}
