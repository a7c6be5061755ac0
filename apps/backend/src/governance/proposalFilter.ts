/**
 * Proposal filtering and ranking against one set of user preferences.
 *
 * Pure and synchronous: the only side effect is console logging.
 * Every public method validates its input and throws ValidationError
 * on anything that is not a list of proposals.
 */

import {
  UserPreferencesSchema,
  ValidationError,
  isProposal,
  type FilteringMetrics,
  type Proposal,
  type UserPreferences,
} from '@govpilot/shared';
import { ProposalFilterError } from '../errors.js';

// ─── Scoring ────────────────────────────────────────────

const URGENCY_WEIGHT = 0.5;
const VOTING_POWER_WEIGHT = 0.3;
const PARTICIPATION_WEIGHT = 0.2;

/** log10 normalization ceilings: 10^6 voting power, 10^3 voters */
const VOTING_POWER_LOG_MAX = 6;
const PARTICIPATION_LOG_MAX = 3;

/** Floor for composite scores so every proposal ranks with a positive score. */
export const MIN_PROPOSAL_SCORE = 1e-6;

const HOUR_SECONDS = 3600;

/** Step function over seconds remaining until `end`. */
export function calculateUrgencyFactor(end: number, nowSeconds: number): number {
  const remaining = end - nowSeconds;
  if (remaining <= 0) return 0.0;
  if (remaining <= HOUR_SECONDS) return 1.0;
  if (remaining <= 6 * HOUR_SECONDS) return 0.8;
  if (remaining <= 24 * HOUR_SECONDS) return 0.6;
  if (remaining <= 72 * HOUR_SECONDS) return 0.4;
  return 0.2;
}

export function calculateVotingPowerFactor(scoresTotal: number): number {
  if (scoresTotal <= 0) return 0.0;
  return Math.min(Math.log10(Math.max(scoresTotal, 1.0)) / VOTING_POWER_LOG_MAX, 1.0);
}

export function calculateParticipationFactor(votes: number): number {
  if (votes <= 0) return 0.0;
  return Math.min(Math.log10(Math.max(votes, 1.0)) / PARTICIPATION_LOG_MAX, 1.0);
}

// ─── Validation ─────────────────────────────────────────

function assertProposalList(value: unknown, operation: string): asserts value is readonly Proposal[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${operation}: proposals must be an array`);
  }
  value.forEach((item: unknown, index: number) => {
    if (!isProposal(item)) {
      throw new ValidationError(`${operation}: item at index ${index} is not a valid Proposal`);
    }
  });
}

type Rejection = 'blacklisted' | 'not_whitelisted';

// ─── Filter ─────────────────────────────────────────────

export interface ProposalFilterOptions {
  /** Current time in ms. */
  clock?: () => number;
}

export class ProposalFilter {
  readonly preferences: UserPreferences;
  private readonly blacklist: ReadonlySet<string>;
  private readonly whitelist: ReadonlySet<string>;
  private readonly clock: () => number;

  constructor(preferences: UserPreferences, options: ProposalFilterOptions = {}) {
    const parsed = UserPreferencesSchema.safeParse(preferences);
    if (!parsed.success) {
      throw ValidationError.fromZod('ProposalFilter requires valid UserPreferences', parsed.error);
    }
    this.preferences = Object.freeze(parsed.data);
    this.blacklist = new Set(parsed.data.blacklistedProposers);
    this.whitelist = new Set(parsed.data.whitelistedProposers);
    this.clock = options.clock ?? Date.now;

    console.log(
      `[proposalFilter] initialized strategy=${this.preferences.votingStrategy} ` +
        `blacklist=${this.blacklist.size} whitelist=${this.whitelist.size}`,
    );
  }

  private rejectionFor(proposal: Proposal): Rejection | null {
    // Blacklist wins even when the author is also whitelisted.
    if (this.blacklist.has(proposal.author)) return 'blacklisted';
    if (this.whitelist.size > 0 && !this.whitelist.has(proposal.author)) return 'not_whitelisted';
    return null;
  }

  /** Keep proposals whose author passes the blacklist and whitelist, in input order. */
  filterProposals(proposals: readonly Proposal[]): Proposal[] {
    assertProposalList(proposals, 'filterProposals');

    const kept: Proposal[] = [];
    for (const proposal of proposals) {
      const rejection = this.rejectionFor(proposal);
      if (rejection) {
        console.debug(`[proposalFilter] drop ${proposal.id} author=${proposal.author} reason=${rejection}`);
        continue;
      }
      kept.push(proposal);
    }

    console.log(`[proposalFilter] filtered ${proposals.length} -> ${kept.length}`);
    return kept;
  }

  /** Stable sort by descending score; ties keep input order. */
  rankProposals(proposals: readonly Proposal[]): Proposal[] {
    assertProposalList(proposals, 'rankProposals');
    if (proposals.length === 0) return [];

    const now = this.clock();
    const scored = proposals.map((proposal) => ({
      proposal,
      score: this.calculateProposalScore(proposal, now),
    }));
    scored.sort((a, b) => b.score - a.score);

    const top = scored[0];
    console.log(`[proposalFilter] ranked ${scored.length} proposal(s), top=${top.proposal.id} score=${top.score.toFixed(4)}`);
    return scored.map((entry) => entry.proposal);
  }

  /**
   * Composite priority: 0.5 urgency + 0.3 voting power + 0.2 participation.
   * Floored at MIN_PROPOSAL_SCORE, so proposals tied at the floor keep input order when ranked.
   * @param nowMs  defaults to the filter's clock
   */
  calculateProposalScore(proposal: Proposal, nowMs: number = this.clock()): number {
    const urgency = calculateUrgencyFactor(proposal.end, Math.floor(nowMs / 1000));
    const votingPower = calculateVotingPowerFactor(proposal.scoresTotal);
    const participation = calculateParticipationFactor(proposal.votes);

    const composite =
      URGENCY_WEIGHT * urgency + VOTING_POWER_WEIGHT * votingPower + PARTICIPATION_WEIGHT * participation;
    if (!Number.isFinite(composite)) {
      throw new ProposalFilterError(`Non-finite score for proposal ${proposal.id}`);
    }
    return Math.max(composite, MIN_PROPOSAL_SCORE);
  }

  /**
   * Filtering summary. Blacklist and whitelist counts are recomputed from
   * `original`, so `filtered` may come from any filtering pass.
   */
  getFilteringMetrics(original: readonly Proposal[], filtered: readonly Proposal[]): FilteringMetrics {
    assertProposalList(original, 'getFilteringMetrics');
    assertProposalList(filtered, 'getFilteringMetrics');

    let blacklistedCount = 0;
    let whitelistFilteredCount = 0;
    for (const proposal of original) {
      const rejection = this.rejectionFor(proposal);
      if (rejection === 'blacklisted') blacklistedCount++;
      else if (rejection === 'not_whitelisted') whitelistFilteredCount++;
    }

    return {
      originalCount: original.length,
      filteredCount: filtered.length,
      blacklistedCount,
      whitelistFilteredCount,
      filterEfficiency: original.length === 0 ? 0.0 : filtered.length / original.length,
      blacklistedProposers: this.blacklist.size,
      whitelistedProposers: this.whitelist.size,
      hasWhitelist: this.whitelist.size > 0,
      hasBlacklist: this.blacklist.size > 0,
    };
  }
}
