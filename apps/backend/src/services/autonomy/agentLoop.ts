/**
 * Interval loop that runs the agent over every configured space.
 * Spaces run one after another; a tick that fires while the previous
 * one is still running is skipped.
 */

import type { AgentRunService } from '../../orchestrator/agentRunService.js';
import { AgentRunLogger } from '../../orchestrator/runLogger.js';

const MIN_INTERVAL_MS = 1_000;

export interface AgentLoopOptions {
  enabled: boolean;
  spaces: readonly string[];
  dryRun: boolean;
  intervalMs: number;
  logger?: AgentRunLogger;
}

export interface AgentLoopHandle {
  stop: () => void;
  /** Resolves once no cycle is in flight. */
  idle: () => Promise<void>;
}

type LoopTrigger = 'startup' | 'interval';

export function startAgentLoop(
  service: Pick<AgentRunService, 'executeAgentRun'>,
  options: AgentLoopOptions,
): AgentLoopHandle | null {
  const logger = options.logger ?? new AgentRunLogger();

  if (!options.enabled) {
    console.log('[agentLoop] disabled. Set AGENT_LOOP_ENABLED=true to enable the loop');
    return null;
  }

  const intervalMs = Math.max(MIN_INTERVAL_MS, Math.floor(options.intervalMs));
  const spaces = [...options.spaces];
  let inFlight: Promise<void> | null = null;
  let stopped = false;
  let timer: NodeJS.Timeout | null = null;

  const runSpaces = async (cycleId: string): Promise<void> => {
    const startedAtMs = Date.now();
    for (const spaceId of spaces) {
      if (stopped) break;
      try {
        const result = await service.executeAgentRun({ spaceId, dryRun: options.dryRun });
        console.log(
          `[agentLoop] ${cycleId} ${spaceId}: analyzed=${result.proposalsAnalyzed} votes=${result.votesCast.length} errors=${result.errors.length}`,
        );
      } catch (err) {
        logger.error('Agent loop run failed', err, { cycleId, spaceId });
      }
    }
    console.log(`[agentLoop] ${cycleId} finished in ${Date.now() - startedAtMs}ms`);
  };

  const runCycle = (trigger: LoopTrigger): void => {
    if (stopped) return;
    if (inFlight) {
      console.warn(`[agentLoop] ${trigger} tick skipped: previous cycle still running`);
      return;
    }
    const cycleId = `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    inFlight = runSpaces(cycleId).finally(() => {
      inFlight = null;
    });
  };

  logger.log('LOOP_START', { intervalMs, spaces, dryRun: options.dryRun });

  // Run one cycle immediately, then schedule.
  runCycle('startup');
  timer = setInterval(() => runCycle('interval'), intervalMs);

  return {
    stop: () => {
      if (stopped) return;
      stopped = true;
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
      logger.log('LOOP_STOP', { spaces });
    },
    idle: () => inFlight ?? Promise.resolve(),
  };
}
