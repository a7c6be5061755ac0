/**
 * Shared builders for proposal, decision and collaborator fakes.
 */

import { vi } from 'vitest';
import {
  createProposal,
  createUserPreferences,
  createVoteDecision,
  type Proposal,
  type ProposalInput,
  type UserPreferences,
  type UserPreferencesInput,
  type VoteDecision,
  type VoteDecisionInput,
} from '@govpilot/shared';
import type {
  DecisionMaker,
  PreferencesSource,
  ProposalSource,
  VoteExecutor,
  VoteResult,
} from '../src/orchestrator/types.js';

/** 2024-01-01T00:00:00.000Z */
export const NOW_MS = Date.UTC(2024, 0, 1);
export const NOW_S = NOW_MS / 1000;
export const HOUR = 3600;

export function makeProposal(overrides: Partial<ProposalInput> = {}): Proposal {
  return createProposal({
    id: 'prop-1',
    title: 'Fund the community grants program',
    body: 'Allocate a small grant budget for tooling.',
    author: '0xauthor1',
    choices: ['For', 'Against', 'Abstain'],
    created: NOW_S - 2 * HOUR,
    start: NOW_S - HOUR,
    end: NOW_S + 48 * HOUR,
    state: 'active',
    scoresTotal: 0,
    votes: 0,
    ...overrides,
  });
}

export function makePreferences(overrides: UserPreferencesInput = {}): UserPreferences {
  return createUserPreferences(overrides);
}

export function makeDecision(overrides: Partial<VoteDecisionInput> = {}): VoteDecision {
  return createVoteDecision({
    proposalId: 'prop-1',
    vote: 'FOR',
    confidence: 0.9,
    reasoning: 'Proposal benefits the DAO at low risk.',
    ...overrides,
  });
}

export function fakeProposalSource(proposals: Proposal[]) {
  return {
    getProposals: vi.fn<ProposalSource['getProposals']>(async () => proposals),
  };
}

export function fakePreferencesSource(preferences: UserPreferences) {
  return {
    loadPreferences: vi.fn<PreferencesSource['loadPreferences']>(async () => preferences),
  };
}

/** Votes FOR with the given confidence per proposal id (default 0.9). */
export function fakeDecisionMaker(confidenceById: Record<string, number> = {}) {
  return {
    decideVote: vi.fn<DecisionMaker['decideVote']>(async (proposal, strategy, spaceId) =>
      makeDecision({
        proposalId: proposal.id,
        confidence: confidenceById[proposal.id] ?? 0.9,
        strategyUsed: strategy,
        spaceId,
      }),
    ),
  };
}

export function fakeVoteExecutor(result: VoteResult = { success: true, transactionHash: '0xreceipt' }, voterAddress: string | null = null) {
  return {
    voterAddress,
    voteOnProposal: vi.fn<VoteExecutor['voteOnProposal']>(async () => result),
  };
}
