/**
 * QuorumTracker activity registration through a fake submitter.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { decodeFunctionData, getAddress } from 'viem';
import { ActivityType } from '@govpilot/shared';
import { QuorumTrackerAbi } from '../src/abi/QuorumTracker.js';
import {
  QuorumTrackerService,
  createActivityTracker,
  encodeRegisterCall,
  type TransactionSubmitter,
} from '../src/services/quorumTracker.js';

const TRACKER = '0x1111111111111111111111111111111111111111';
const MULTISIG = '0x2222222222222222222222222222222222222222';

function fakeSubmitter(result: Awaited<ReturnType<TransactionSubmitter['submit']>> = { success: true, txHash: '0xtx' }) {
  return { submit: vi.fn<TransactionSubmitter['submit']>(async () => result) };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('encodeRegisterCall', () => {
  it('encodes register(multisig, activityType)', () => {
    const data = encodeRegisterCall(getAddress(MULTISIG), ActivityType.NO_OPPORTUNITY);
    const decoded = decodeFunctionData({ abi: QuorumTrackerAbi, data });
    expect(decoded.functionName).toBe('register');
    expect(decoded.args).toEqual([getAddress(MULTISIG), 2]);
  });
});

describe('QuorumTrackerService', () => {
  it('submits the encoded call to the tracker', async () => {
    const submitter = fakeSubmitter();
    const service = new QuorumTrackerService(TRACKER, submitter);

    const result = await service.registerActivity(MULTISIG, ActivityType.VOTE_CAST);

    expect(result).toEqual({ success: true, txHash: '0xtx' });
    expect(submitter.submit).toHaveBeenCalledWith({
      to: getAddress(TRACKER),
      data: encodeRegisterCall(getAddress(MULTISIG), ActivityType.VOTE_CAST),
      value: 0n,
    });
  });

  it('rejects a bad tracker address at construction', () => {
    expect(() => new QuorumTrackerService('0x1234', fakeSubmitter())).toThrow('Invalid QuorumTracker address: 0x1234');
  });

  it('reports a bad multisig address without submitting', async () => {
    const submitter = fakeSubmitter();
    const result = await new QuorumTrackerService(TRACKER, submitter).registerActivity('not-an-address', ActivityType.VOTE_CAST);
    expect(result).toEqual({ success: false, error: 'Invalid multisig address: not-an-address' });
    expect(submitter.submit).not.toHaveBeenCalled();
  });

  it('passes submission failures through', async () => {
    const submitter = fakeSubmitter({ success: false, error: 'nonce too low' });
    const result = await new QuorumTrackerService(TRACKER, submitter).registerActivity(MULTISIG, ActivityType.VOTE_CAST);
    expect(result).toEqual({ success: false, error: 'nonce too low' });
  });

  it('never throws when the submitter does', async () => {
    const submitter = {
      submit: vi.fn<TransactionSubmitter['submit']>(async () => {
        throw new Error('rpc unreachable');
      }),
    };
    const result = await new QuorumTrackerService(TRACKER, submitter).registerActivity(MULTISIG, ActivityType.VOTE_CAST);
    expect(result).toEqual({ success: false, error: 'rpc unreachable' });
  });
});

describe('createActivityTracker', () => {
  const rpcUrl = 'https://rpc.test';

  it('is null without a tracker address', () => {
    expect(createActivityTracker({ rpcUrl })).toBeNull();
  });

  it('is null without a key to submit with', () => {
    expect(createActivityTracker({ rpcUrl, quorumTrackerAddress: getAddress(TRACKER) })).toBeNull();
  });

  it('uses an injected submitter', () => {
    expect(createActivityTracker({ rpcUrl, quorumTrackerAddress: getAddress(TRACKER) }, fakeSubmitter())).toBeInstanceOf(
      QuorumTrackerService,
    );
  });
});
