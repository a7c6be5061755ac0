import { ProposalSchema, formatZodIssues, type Proposal, type ProposalState } from '@govpilot/shared';
import type { ProposalSource } from '../orchestrator/types.js';
import { ProposalFetchError, toErrorMessage } from '../errors.js';
import { fetchProposals as fetchSnapshotProposals, type SnapshotProposal } from '../services/snapshot.js';

const SNAPSHOT_APP_URL = 'https://snapshot.org';

/**
 * Map a Snapshot row to a validated Proposal, or null when the row
 * does not satisfy the proposal invariants.
 */
export function toProposal(row: SnapshotProposal): Proposal | null {
  const space = row.space?.id ?? 'unknown';
  const parsed = ProposalSchema.safeParse({
    id: row.id,
    title: row.title,
    body: row.body ?? '',
    author: row.author,
    choices: row.choices ?? [],
    start: row.start,
    end: row.end,
    created: row.created,
    state: normalizeState(row.state),
    scores: row.scores ?? [],
    scoresTotal: row.scores_total ?? 0,
    votes: row.votes ?? 0,
    quorum: row.quorum ?? 0,
    space,
    snapshot: row.snapshot,
    discussion: row.discussion || undefined,
    url: `${SNAPSHOT_APP_URL}/#/${space}/proposal/${row.id}`,
  });
  if (!parsed.success) {
    console.warn(`[governance/proposals] skipping proposal ${row.id}: ${formatZodIssues(parsed.error).join('; ')}`);
    return null;
  }
  return Object.freeze(parsed.data);
}

function normalizeState(state: string): ProposalState {
  if (state === 'active' || state === 'closed' || state === 'pending') return state;
  return 'pending';
}

function dedupeById(items: Proposal[]): Proposal[] {
  const seen = new Set<string>();
  const deduped: Proposal[] = [];
  for (const item of items) {
    if (seen.has(item.id)) continue;
    seen.add(item.id);
    deduped.push(item);
  }
  return deduped;
}

/** Proposal source backed by the Snapshot GraphQL API. */
export class SnapshotProposalSource implements ProposalSource {
  constructor(private readonly graphqlUrl?: string) {}

  async getProposals(spaceId: string, state: ProposalState, limit: number): Promise<Proposal[]> {
    let rows: SnapshotProposal[];
    try {
      rows = await fetchSnapshotProposals({ spaces: [spaceId], state, first: limit, graphqlUrl: this.graphqlUrl });
    } catch (err) {
      throw new ProposalFetchError(`Snapshot fetch for ${spaceId} failed: ${toErrorMessage(err)}`);
    }

    const proposals: Proposal[] = [];
    for (const row of rows) {
      const proposal = toProposal(row);
      if (proposal) proposals.push(proposal);
    }
    return dedupeById(proposals);
  }
}
