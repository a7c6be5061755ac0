/**
 * QuorumTracker ABI for activity registration.
 * activityType: 0 = VOTE_CAST, 1 = OPPORTUNITY_CONSIDERED, 2 = NO_OPPORTUNITY
 */
export const QuorumTrackerAbi = [
  {
    inputs: [
      { name: 'multisig', type: 'address' },
      { name: 'activityType', type: 'uint8' },
    ],
    name: 'register',
    outputs: [],
    stateMutability: 'nonpayable',
    type: 'function',
  },
] as const;
