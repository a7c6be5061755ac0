/**
 * Health snapshot for the agent process. Each external probe is bounded
 * so a slow dependency degrades the report instead of stalling it.
 */

import type { AgentStatus } from '@govpilot/shared';
import { snapshotHealthCheck, type SnapshotHealth } from './snapshot.js';
import { toErrorMessage } from '../errors.js';

/** Resolve to `fallback` if `promise` has not settled within `ms`. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, fallback: T, label = 'operation'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((resolve) => {
    timer = setTimeout(() => {
      console.warn(`[health] ${label} timed out after ${ms}ms`);
      resolve(fallback);
    }, ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface HealthDependencies {
  /** Status of the run service. */
  agentStatus: () => AgentStatus;
  /** Space probed for Snapshot reachability. */
  space?: string;
  graphqlUrl?: string;
  timeoutMs: number;
  /** Override the Snapshot probe. */
  probeSnapshot?: (space: string | undefined) => Promise<SnapshotHealth>;
  clock?: () => number;
}

export interface HealthStatus {
  status: 'ok' | 'degraded';
  snapshot: SnapshotHealth;
  agent: { isActive: boolean; currentStage: AgentStatus['currentStage'] };
  lastRun: string | null;
  timestamp: string;
}

export async function getHealthStatus(deps: HealthDependencies): Promise<HealthStatus> {
  const probe = deps.probeSnapshot ?? ((space) => snapshotHealthCheck(space, deps.graphqlUrl));
  const timedOut: SnapshotHealth = { ok: false, mode: 'live', detail: `timed out after ${deps.timeoutMs}ms` };

  const snapshot = await withTimeout(
    probe(deps.space).catch((err: unknown): SnapshotHealth => ({ ok: false, mode: 'live', detail: toErrorMessage(err) })),
    deps.timeoutMs,
    timedOut,
    'snapshot probe',
  );

  const agent = deps.agentStatus();
  return {
    status: snapshot.ok ? 'ok' : 'degraded',
    snapshot,
    agent: { isActive: agent.isActive, currentStage: agent.currentStage },
    lastRun: agent.lastRunTimestamp,
    timestamp: new Date((deps.clock ?? Date.now)()).toISOString(),
  };
}
