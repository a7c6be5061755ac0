import { privateKeyToAccount } from 'viem/accounts';
import type { Hex } from 'viem';
import { SNAPSHOT_HUB_URL } from '@govpilot/shared';
import type { VoteExecutor, VoteResult } from '../orchestrator/types.js';
import { castSnapshotVote } from './snapshot.js';

export interface VoteSigner {
  address: string;
  signMessage: (message: string) => Promise<string>;
}

/** Local viem account from a hex private key. */
export function createSignerFromPrivateKey(privateKey: Hex): VoteSigner {
  const account = privateKeyToAccount(privateKey);
  return {
    address: account.address,
    signMessage: (message: string) => account.signMessage({ message }),
  };
}

/**
 * Casts votes on Snapshot. Without a signer every vote reports failure;
 * no path throws.
 */
export class SnapshotVoteExecutor implements VoteExecutor {
  constructor(
    private readonly signer: VoteSigner | null,
    private readonly hubUrl: string = SNAPSHOT_HUB_URL,
  ) {}

  get voterAddress(): string | null {
    return this.signer?.address ?? null;
  }

  async voteOnProposal(space: string, proposalId: string, choice: number): Promise<VoteResult> {
    if (!this.signer) {
      return { success: false, error: 'Signer not configured (set VOTER_PRIVATE_KEY)' };
    }
    const result = await castSnapshotVote(
      space,
      proposalId,
      choice,
      this.signer.address,
      this.signer.signMessage,
      this.hubUrl,
    );
    if (!result.success) {
      return { success: false, error: result.error ?? 'Snapshot vote failed' };
    }
    return { success: true, transactionHash: result.receipt };
  }
}
