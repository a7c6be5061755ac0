/**
 * Voting history storage
 * - Lenient parsing of stored records
 * - Bounded append in insertion order
 * - Pattern summary
 */

import { describe, expect, it } from 'vitest';
import { VOTING_HISTORY_KEY } from '@govpilot/shared';
import {
  VotingHistoryStore,
  parseHistoryDocument,
  parseHistoryRecord,
  summarizePatterns,
  trimHistory,
} from '../src/orchestrator/votingHistory.js';
import { MemoryStateManager } from '../src/storage/stateManager.js';
import { makeDecision } from './fixtures.js';

const TS = '2024-01-01T00:00:00.000Z';

describe('parseHistoryRecord', () => {
  it('maps snake_case records to entries', () => {
    expect(
      parseHistoryRecord({
        proposal_id: 'prop-1',
        vote: 'AGAINST',
        confidence: 0.8,
        risk_assessment: 'HIGH',
        executed: true,
        transaction_hash: '0xhash',
        timestamp: TS,
      }),
    ).toEqual({
      proposalId: 'prop-1',
      vote: 'AGAINST',
      confidence: 0.8,
      riskAssessment: 'HIGH',
      executed: true,
      transactionHash: '0xhash',
      timestamp: TS,
    });
  });

  it('reads a missing or malformed confidence as 0', () => {
    expect(parseHistoryRecord({ proposal_id: 'prop-1', vote: 'FOR' })?.confidence).toBe(0);
    expect(parseHistoryRecord({ proposal_id: 'prop-1', vote: 'FOR', confidence: 'high' })?.confidence).toBe(0);
  });

  it('drops malformed optional fields', () => {
    expect(parseHistoryRecord({ proposal_id: 'prop-1', vote: 'FOR', confidence: 0.5, executed: 'yes' })?.executed).toBeUndefined();
  });

  it('rejects records without a proposal id or a known vote', () => {
    expect(parseHistoryRecord({ vote: 'FOR' })).toBeNull();
    expect(parseHistoryRecord({ proposal_id: 'prop-1', vote: 'MAYBE' })).toBeNull();
    expect(parseHistoryRecord('prop-1')).toBeNull();
  });
});

describe('parseHistoryDocument', () => {
  it('reads anything unrecognizable as empty', () => {
    expect(parseHistoryDocument(null)).toEqual([]);
    expect(parseHistoryDocument({})).toEqual([]);
    expect(parseHistoryDocument({ voting_history: 'nope' })).toEqual([]);
  });

  it('keeps valid records and skips the rest', () => {
    const entries = parseHistoryDocument({
      voting_history: [{ proposal_id: 'prop-1', vote: 'FOR', confidence: 0.9 }, { vote: 'FOR' }, 7],
    });
    expect(entries.map((e) => e.proposalId)).toEqual(['prop-1']);
  });
});

describe('trimHistory', () => {
  it('keeps the last items in order', () => {
    expect(trimHistory([1, 2, 3, 4], 2)).toEqual([3, 4]);
    expect(trimHistory([1, 2], 5)).toEqual([1, 2]);
  });
});

describe('summarizePatterns', () => {
  it('is zeroed for an empty history', () => {
    expect(summarizePatterns([])).toEqual({
      totalVotes: 0,
      voteDistribution: { FOR: 0, AGAINST: 0, ABSTAIN: 0 },
      averageConfidence: 0,
    });
  });

  it('rounds the average confidence to three places', () => {
    const patterns = summarizePatterns([
      { proposalId: 'a', vote: 'FOR', confidence: 0.9 },
      { proposalId: 'b', vote: 'ABSTAIN', confidence: 0.8 },
      { proposalId: 'c', vote: 'ABSTAIN', confidence: 0.8 },
    ]);
    expect(patterns.voteDistribution).toEqual({ FOR: 1, AGAINST: 0, ABSTAIN: 2 });
    expect(patterns.averageConfidence).toBe(0.833);
  });
});

describe('VotingHistoryStore', () => {
  it('stores snake_case records under the history key', async () => {
    const stateManager = new MemoryStateManager();
    const store = new VotingHistoryStore(stateManager);
    await store.append([makeDecision({ proposalId: 'prop-1', spaceId: 'test.eth' })], TS);

    expect(await stateManager.loadState(VOTING_HISTORY_KEY)).toEqual({
      voting_history: [
        {
          proposal_id: 'prop-1',
          vote: 'FOR',
          confidence: 0.9,
          reasoning: 'Proposal benefits the DAO at low risk.',
          risk_assessment: 'MEDIUM',
          strategy_used: 'balanced',
          space_id: 'test.eth',
          executed: false,
          timestamp: TS,
        },
      ],
    });
  });

  it('evicts the oldest entries beyond the limit', async () => {
    const store = new VotingHistoryStore(new MemoryStateManager(), 3);
    await store.append([makeDecision({ proposalId: 'prop-1' }), makeDecision({ proposalId: 'prop-2' })], TS);
    await store.append([makeDecision({ proposalId: 'prop-3' }), makeDecision({ proposalId: 'prop-4' })], TS);

    expect((await store.load()).map((e) => e.proposalId)).toEqual(['prop-2', 'prop-3', 'prop-4']);
  });

  it('starts from an empty history when the stored one is corrupt', async () => {
    const stateManager = new MemoryStateManager();
    await stateManager.saveState(VOTING_HISTORY_KEY, { voting_history: 'garbage' });
    const store = new VotingHistoryStore(stateManager);

    await store.append([makeDecision({ proposalId: 'prop-1' })], TS);
    expect((await store.load()).map((e) => e.proposalId)).toEqual(['prop-1']);
  });
});
