import 'dotenv/config';
import { join } from 'node:path';
import { getConfig, type AgentConfig } from './config/env.js';
import { ConfigError, toErrorMessage } from './errors.js';
import { GeminiClient } from './llm/geminiClient.js';
import { VotingAgent } from './agents/votingAgent.js';
import { SnapshotProposalSource } from './governance/proposals.js';
import { AgentRunService } from './orchestrator/agentRunService.js';
import { AgentRunLogger } from './orchestrator/runLogger.js';
import { startAgentLoop, type AgentLoopHandle } from './services/autonomy/agentLoop.js';
import { getHealthStatus } from './services/health.js';
import { createActivityTracker } from './services/quorumTracker.js';
import { UserPreferencesService } from './services/userPreferences.js';
import { SnapshotVoteExecutor, createSignerFromPrivateKey } from './services/voteExecutor.js';
import { FileStateManager } from './storage/stateManager.js';

function createAgentRunService(config: AgentConfig): AgentRunService {
  const stateManager = new FileStateManager(join(config.dataDir, 'state'));
  const signer = config.voterPrivateKey ? createSignerFromPrivateKey(config.voterPrivateKey) : null;

  return new AgentRunService(
    {
      proposalSource: new SnapshotProposalSource(config.snapshotGraphqlUrl),
      preferencesSource: new UserPreferencesService(stateManager, config.preferencesFile),
      decisionMaker: new VotingAgent(new GeminiClient({ apiKey: config.geminiApiKey, model: config.geminiModel })),
      voteExecutor: new SnapshotVoteExecutor(signer, config.snapshotHubUrl),
      stateManager,
      activityTracker: createActivityTracker(config),
      logger: new AgentRunLogger({ consoleLogs: config.consoleLogs }),
    },
    {
      multisigAddress: config.multisigAddress,
      dryRunCountsAsVoteCast: config.dryRunCountsAsVoteCast,
      decisionConcurrency: config.decisionConcurrency,
    },
  );
}

async function runOnce(service: AgentRunService, config: AgentConfig): Promise<void> {
  for (const spaceId of config.spaces) {
    const result = await service.executeAgentRun({ spaceId, dryRun: config.dryRun });
    console.log(JSON.stringify(result, null, 2));
  }
}

async function main(): Promise<void> {
  let config: AgentConfig;
  try {
    config = getConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const service = createAgentRunService(config);
  const health = await getHealthStatus({
    agentStatus: () => service.getStatus(),
    space: config.spaces[0],
    graphqlUrl: config.snapshotGraphqlUrl,
    timeoutMs: config.healthTimeoutMs,
  });
  console.log(`[govpilot] health ${health.status} (snapshot ${health.snapshot.mode}${health.snapshot.detail ? `: ${health.snapshot.detail}` : ''})`);
  console.log(`[govpilot] spaces=${config.spaces.join(',') || '(none)'} dryRun=${config.dryRun}`);

  if (process.argv.includes('--once')) {
    await runOnce(service, config);
    return;
  }

  const loop: AgentLoopHandle | null = startAgentLoop(service, {
    enabled: config.loopEnabled,
    spaces: config.spaces,
    dryRun: config.dryRun,
    intervalMs: config.intervalMs,
  });
  if (!loop) return;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    console.log(`[govpilot] ${signal} received, shutting down`);
    loop.stop();
    await service.shutdown(`signal_${signal}`);
    await loop.idle();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error(`[govpilot] shutdown failed: ${toErrorMessage(err)}`);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error(`[govpilot] fatal: ${toErrorMessage(err)}`);
  process.exitCode = 1;
});
