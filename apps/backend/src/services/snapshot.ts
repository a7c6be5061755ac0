import { SNAPSHOT_GRAPHQL_URL, SNAPSHOT_HUB_URL, type ProposalState } from '@govpilot/shared';
import { toErrorMessage } from '../errors.js';

const FETCH_TIMEOUT_MS = 9_000;
const VOTE_TIMEOUT_MS = 15_000;

export interface SnapshotProposal {
  id: string;
  title: string;
  body: string;
  choices: string[];
  start: number;
  end: number;
  created: number;
  snapshot: string;
  state: string;
  author: string;
  space: { id: string } | null;
  votes?: number;
  scores?: number[];
  scores_total?: number;
  quorum?: number;
  discussion?: string;
}

export interface FetchProposalsParams {
  spaces: string[];
  state?: ProposalState;
  first?: number;
  graphqlUrl?: string;
}

const PROPOSALS_QUERY = `
  query Proposals($spaces: [String!], $state: String, $first: Int!) {
    proposals(
      first: $first
      where: { space_in: $spaces, state: $state }
      orderBy: "created"
      orderDirection: desc
    ) {
      id
      title
      body
      choices
      start
      end
      created
      snapshot
      state
      author
      votes
      scores
      scores_total
      quorum
      discussion
      space {
        id
      }
    }
  }
`;

/**
 * Fetch proposals for one or more Snapshot spaces.
 * @throws on HTTP or GraphQL errors
 */
export async function fetchProposals({
  spaces,
  state,
  first = 20,
  graphqlUrl = SNAPSHOT_GRAPHQL_URL,
}: FetchProposalsParams): Promise<SnapshotProposal[]> {
  if (spaces.length === 0) return [];

  const res = await fetch(graphqlUrl, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ query: PROPOSALS_QUERY, variables: { spaces, state, first } }),
    signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
  });

  if (!res.ok) {
    throw new Error(`Snapshot Hub HTTP ${res.status}`);
  }

  const json = (await res.json()) as {
    data?: { proposals?: SnapshotProposal[] | null };
    errors?: Array<{ message?: string }>;
  };

  if (json.errors && json.errors.length > 0) {
    throw new Error(json.errors[0]?.message ?? 'Snapshot GraphQL error');
  }

  return json.data?.proposals ?? [];
}

export interface SnapshotHealth {
  ok: boolean;
  mode: 'live' | 'disabled';
  detail?: string;
}

/** Probe the GraphQL endpoint with a one-row query. */
export async function snapshotHealthCheck(space: string | undefined, graphqlUrl = SNAPSHOT_GRAPHQL_URL): Promise<SnapshotHealth> {
  if (!space) {
    return { ok: true, mode: 'disabled', detail: 'no space configured' };
  }

  try {
    await fetchProposals({ spaces: [space], first: 1, graphqlUrl });
    return { ok: true, mode: 'live' };
  } catch (err) {
    return { ok: false, mode: 'live', detail: toErrorMessage(err) };
  }
}

export interface CastVoteResult {
  success: boolean;
  receipt?: string;
  error?: string;
}

/**
 * Cast a vote on Snapshot with a signed JSON message.
 * Returns the hub receipt (vote id or ipfs hash) on success; never throws.
 */
export async function castSnapshotVote(
  space: string,
  proposalId: string,
  choice: number, // 1-based index into proposal.choices
  voterAddress: string,
  signMessage: (message: string) => Promise<string>,
  hubUrl: string = SNAPSHOT_HUB_URL,
): Promise<CastVoteResult> {
  const timestamp = Math.floor(Date.now() / 1000);
  const payload = {
    space,
    proposal: proposalId,
    choice,
    reason: '',
    app: 'govpilot',
    from: voterAddress,
    timestamp,
  };
  const msg = JSON.stringify(payload);
  try {
    const sig = await signMessage(msg);
    const res = await fetch(`${hubUrl}/api/message`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        address: voterAddress,
        msg,
        sig,
      }),
      signal: AbortSignal.timeout(VOTE_TIMEOUT_MS),
    });
    if (!res.ok) {
      const text = await res.text();
      return { success: false, error: `HTTP ${res.status}: ${text}` };
    }
    const data = (await res.json()) as { id?: string; ipfs?: string };
    return { success: true, receipt: data.id ?? data.ipfs ?? JSON.stringify(data) };
  } catch (e) {
    return { success: false, error: toErrorMessage(e) };
  }
}
