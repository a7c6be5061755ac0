/**
 * QuorumTracker activity registration.
 *
 * Encodes `register(multisig, activityType)` and hands the call to a
 * TransactionSubmitter. Failures come back as `{ success: false }`; this
 * service never throws into the agent run.
 */

import {
  createPublicClient,
  createWalletClient,
  encodeFunctionData,
  getAddress,
  http,
  isAddress,
  type Address,
  type Hex,
} from 'viem';
import { base } from 'viem/chains';
import { privateKeyToAccount } from 'viem/accounts';
import { ActivityTypeSchema, type ActivityType } from '@govpilot/shared';
import { QuorumTrackerAbi } from '../abi/QuorumTracker.js';
import type { ActivityResult, ActivityTracker } from '../orchestrator/types.js';
import type { AgentConfig } from '../config/env.js';
import { toErrorMessage } from '../errors.js';

export interface ContractCall {
  to: Address;
  data: Hex;
  value: bigint;
}

export interface SubmitResult {
  success: boolean;
  txHash?: string;
  error?: string;
}

export interface TransactionSubmitter {
  submit(call: ContractCall): Promise<SubmitResult>;
}

export function encodeRegisterCall(multisigAddress: Address, activityType: ActivityType): Hex {
  return encodeFunctionData({
    abi: QuorumTrackerAbi,
    functionName: 'register',
    args: [multisigAddress, activityType],
  });
}

export class QuorumTrackerService implements ActivityTracker {
  private readonly trackerAddress: Address;

  constructor(
    trackerAddress: string,
    private readonly submitter: TransactionSubmitter,
  ) {
    if (!isAddress(trackerAddress, { strict: false })) {
      throw new Error(`Invalid QuorumTracker address: ${trackerAddress}`);
    }
    this.trackerAddress = getAddress(trackerAddress);
  }

  async registerActivity(multisigAddress: string, activityType: ActivityType): Promise<ActivityResult> {
    if (!isAddress(multisigAddress, { strict: false })) {
      return { success: false, error: `Invalid multisig address: ${multisigAddress}` };
    }
    const parsedType = ActivityTypeSchema.safeParse(activityType);
    if (!parsedType.success) {
      return { success: false, error: `Invalid activity type: ${String(activityType)}` };
    }

    try {
      const data = encodeRegisterCall(getAddress(multisigAddress), parsedType.data);
      console.log(
        `[quorumTracker] registering activity ${parsedType.data} for ${multisigAddress} on ${this.trackerAddress}`,
      );
      const result = await this.submitter.submit({ to: this.trackerAddress, data, value: 0n });
      if (!result.success) {
        return { success: false, error: result.error ?? 'Transaction submission failed' };
      }
      return { success: true, txHash: result.txHash };
    } catch (err) {
      return { success: false, error: toErrorMessage(err) };
    }
  }
}

/** Sends calls from the agent's own key and waits for the receipt. */
export class WalletTransactionSubmitter implements TransactionSubmitter {
  private readonly account: ReturnType<typeof privateKeyToAccount>;

  constructor(
    privateKey: Hex,
    private readonly rpcUrl: string,
    private readonly receiptTimeoutMs = 30_000,
  ) {
    this.account = privateKeyToAccount(privateKey);
  }

  async submit(call: ContractCall): Promise<SubmitResult> {
    const walletClient = createWalletClient({
      account: this.account,
      chain: base,
      transport: http(this.rpcUrl),
    });
    const publicClient = createPublicClient({
      chain: base,
      transport: http(this.rpcUrl),
    });

    try {
      const hash = await walletClient.sendTransaction({
        account: this.account,
        to: call.to,
        data: call.data,
        value: call.value,
      });
      const receipt = await publicClient.waitForTransactionReceipt({ hash, timeout: this.receiptTimeoutMs });
      if (receipt.status !== 'success') {
        return { success: false, txHash: hash, error: 'Transaction reverted' };
      }
      return { success: true, txHash: hash };
    } catch (err) {
      return { success: false, error: toErrorMessage(err) };
    }
  }
}

/**
 * Tracker for the configured contract, or null when activity tracking is
 * off (no tracker address) or impossible (no key to submit with).
 */
export function createActivityTracker(
  config: Pick<AgentConfig, 'quorumTrackerAddress' | 'voterPrivateKey' | 'rpcUrl'>,
  submitter?: TransactionSubmitter,
): QuorumTrackerService | null {
  if (!config.quorumTrackerAddress) return null;
  if (submitter) return new QuorumTrackerService(config.quorumTrackerAddress, submitter);
  if (!config.voterPrivateKey) {
    console.warn('[quorumTracker] QUORUM_TRACKER_ADDRESS is set but VOTER_PRIVATE_KEY is not. Tracking disabled.');
    return null;
  }
  return new QuorumTrackerService(
    config.quorumTrackerAddress,
    new WalletTransactionSubmitter(config.voterPrivateKey, config.rpcUrl),
  );
}
