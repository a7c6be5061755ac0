/**
 * Agent run orchestration.
 *
 * One call to `executeAgentRun` performs a full decision cycle for a
 * governance space:
 *
 *   preferences → fetch → filter/rank → truncate → decide → confidence
 *   gate → execute (or dry run) → classify activity → persist
 *
 * Every stage failure is recoverable and lands in `response.errors`.
 * Only a missing or malformed request throws.
 */

import crypto from 'node:crypto';
import {
  ActivityType,
  AgentCheckpointSchema,
  AgentRunRequestSchema,
  DEFAULT_USER_PREFERENCES,
  MAX_ATTESTATION_RETRIES,
  SHUTDOWN_STATE_KEY,
  CHECKPOINT_KEY_PREFIX,
  VOTE_CHOICE_MAPPING,
  ValidationError,
  checkpointKey,
  roundConfidence,
  withAttestation,
  withExecution,
  type AgentCheckpoint,
  type AgentRunRequestInput,
  type AgentRunResponse,
  type AgentStatus,
  type CheckpointVote,
  type PendingAttestation,
  type Proposal,
  type RunStatistics,
  type UserPreferences,
  type VoteDecision,
  type VotingHistoryEntry,
  type VotingPatterns,
  type VotingStrategy,
} from '@govpilot/shared';
import { ProposalFilter } from '../governance/proposalFilter.js';
import { mapSettled } from '../runtime/concurrency.js';
import type { StateManager } from '../storage/stateManager.js';
import { VoteDecisionError, toErrorMessage } from '../errors.js';
import { AgentRunLogger } from './runLogger.js';
import { RunStageTracker } from './runStageTracker.js';
import { VotingHistoryStore } from './votingHistory.js';
import type {
  ActivityTracker,
  AttestationService,
  DecisionMaker,
  PreferencesSource,
  ProposalSource,
  VoteExecutor,
} from './types.js';

export interface AgentRunDependencies {
  proposalSource: ProposalSource;
  preferencesSource: PreferencesSource;
  decisionMaker: DecisionMaker;
  voteExecutor: VoteExecutor;
  stateManager: StateManager;
  activityTracker?: ActivityTracker | null;
  attestationService?: AttestationService | null;
  logger?: AgentRunLogger;
}

export interface AgentRunOptions {
  /** Address reported to the activity tracker. Tracking is skipped without it. */
  multisigAddress?: string;
  dryRunCountsAsVoteCast?: boolean;
  decisionConcurrency?: number;
  /** How many active proposals to request before filtering and ranking. */
  proposalFetchLimit?: number;
  /** Current time in ms. */
  clock?: () => number;
}

const DEFAULT_DECISION_CONCURRENCY = 3;
const DEFAULT_PROPOSAL_FETCH_LIMIT = 20;

// ─── Activity classification ────────────────────────────

export interface ActivityInput {
  candidateCount: number;
  acceptedCount: number;
  executedCount: number;
  dryRun: boolean;
  dryRunCountsAsVoteCast: boolean;
}

export function classifyActivity(input: ActivityInput): ActivityType {
  if (input.candidateCount === 0) return ActivityType.NO_OPPORTUNITY;
  if (input.executedCount > 0) return ActivityType.VOTE_CAST;
  if (input.dryRun && input.dryRunCountsAsVoteCast && input.acceptedCount > 0) {
    return ActivityType.VOTE_CAST;
  }
  return ActivityType.OPPORTUNITY_CONSIDERED;
}

// ─── Checkpoint helpers ─────────────────────────────────

export function parseCheckpoint(raw: unknown): AgentCheckpoint | null {
  const parsed = AgentCheckpointSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function toCheckpointVote(decision: VoteDecision, timestamp: string): CheckpointVote {
  return {
    proposalId: decision.proposalId,
    vote: decision.vote,
    confidence: decision.confidence,
    executed: decision.executed ?? false,
    transactionHash: decision.transactionHash,
    error: decision.error,
    timestamp,
  };
}

interface ActiveRun {
  runId: string;
  spaceId: string;
  dryRun: boolean;
  startedAt: string;
}

interface ExecutionOutcome {
  decisions: VoteDecision[];
  queuedAttestations: PendingAttestation[];
  executedCount: number;
}

// ─── Service ────────────────────────────────────────────

export class AgentRunService {
  private readonly deps: AgentRunDependencies;
  private readonly logger: AgentRunLogger;
  private readonly tracker: RunStageTracker;
  private readonly history: VotingHistoryStore;
  private readonly clock: () => number;
  private readonly multisigAddress: string | undefined;
  private readonly dryRunCountsAsVoteCast: boolean;
  private readonly decisionConcurrency: number;
  private readonly proposalFetchLimit: number;

  private activeRun: ActiveRun | null = null;
  private lastRunTimestamp: string | null = null;

  constructor(deps: AgentRunDependencies, options: AgentRunOptions = {}) {
    this.deps = deps;
    this.logger = deps.logger ?? new AgentRunLogger();
    this.clock = options.clock ?? Date.now;
    this.tracker = new RunStageTracker((transition) => {
      if (transition.valid) return;
      this.logger.warn('STAGE_TRANSITION', { from: transition.from, to: transition.to, valid: false });
    }, this.clock);
    this.history = new VotingHistoryStore(deps.stateManager);
    this.multisigAddress = options.multisigAddress;
    this.dryRunCountsAsVoteCast = options.dryRunCountsAsVoteCast ?? false;
    this.decisionConcurrency = options.decisionConcurrency ?? DEFAULT_DECISION_CONCURRENCY;
    this.proposalFetchLimit = options.proposalFetchLimit ?? DEFAULT_PROPOSAL_FETCH_LIMIT;
  }

  private nowIso(): string {
    return new Date(this.clock()).toISOString();
  }

  // ─── Entry point ──────────────────────────────────────

  /**
   * Run one full decision cycle for a space.
   * @throws ValidationError when `request` is missing or malformed
   */
  async executeAgentRun(request: AgentRunRequestInput | null | undefined): Promise<AgentRunResponse> {
    if (request === null || request === undefined) {
      throw new ValidationError('executeAgentRun requires a request');
    }
    const parsedRequest = AgentRunRequestSchema.safeParse(request);
    if (!parsedRequest.success) {
      throw ValidationError.fromZod('Invalid agent run request', parsedRequest.error);
    }
    const { spaceId, dryRun } = parsedRequest.data;

    const runId = crypto.randomUUID();
    const startedAtMs = this.clock();
    const errors: string[] = [];
    let proposalsAnalyzed = 0;
    let userPreferencesApplied = false;

    this.activeRun = { runId, spaceId, dryRun, startedAt: new Date(startedAtMs).toISOString() };
    this.logger.bindRun(runId);
    this.tracker.transition('STARTING', runId);
    this.logger.log('AGENT_RUN_START', { spaceId, dryRun });

    const elapsedSeconds = (): number => (this.clock() - startedAtMs) / 1000;

    try {
      const carriedAttestations = await this.processPendingAttestations(spaceId);

      this.tracker.transition('LOADING_PREFERENCES', runId);
      const preferences = await this.loadPreferences(errors);
      userPreferencesApplied = preferences.applied;
      const prefs = preferences.value;

      this.tracker.transition('FETCHING_PROPOSALS', runId);
      const fetched = await this.fetchProposals(spaceId, errors);

      this.tracker.transition('FILTERING', runId);
      const ranked = this.filterAndRank(fetched, prefs, errors);
      const candidates = ranked.slice(0, prefs.maxProposalsPerRun);
      proposalsAnalyzed = candidates.length;

      this.tracker.transition('DECIDING', runId);
      const decisions = await this.makeDecisions(candidates, prefs.votingStrategy, spaceId, errors);
      const accepted = decisions.filter((d) => d.confidence >= prefs.confidenceThreshold);
      if (accepted.length < decisions.length) {
        this.logger.log('VOTE_DECISION', {
          belowThreshold: decisions.length - accepted.length,
          threshold: prefs.confidenceThreshold,
        });
      }

      this.tracker.transition('EXECUTING', runId);
      const execution = await this.executeVotes(accepted, spaceId, dryRun, errors);

      this.tracker.transition('CLASSIFYING_ACTIVITY', runId);
      const activityType = classifyActivity({
        candidateCount: fetched.length,
        acceptedCount: accepted.length,
        executedCount: execution.executedCount,
        dryRun,
        dryRunCountsAsVoteCast: this.dryRunCountsAsVoteCast,
      });
      await this.reportActivity(activityType);

      this.tracker.transition('PERSISTING', runId);
      const response: AgentRunResponse = {
        runId,
        spaceId,
        proposalsAnalyzed,
        votesCast: execution.decisions,
        userPreferencesApplied,
        executionTime: elapsedSeconds(),
        errors,
        activityType,
        nextCheckTime: null,
      };
      await this.persistRun(response, dryRun, [...carriedAttestations, ...execution.queuedAttestations]);
      response.executionTime = elapsedSeconds();

      this.tracker.transition('COMPLETED', runId);
      this.logger.log('AGENT_RUN_END', {
        spaceId,
        proposalsAnalyzed,
        votesCast: response.votesCast.length,
        activityType,
        errors: errors.length,
        executionTime: response.executionTime,
      });
      return response;
    } catch (err) {
      this.tracker.transition('ERROR', runId);
      this.logger.error('Unexpected error during agent run', err, { spaceId });
      errors.push(`Unexpected error during agent run: ${toErrorMessage(err)}`);
      return {
        runId,
        spaceId,
        proposalsAnalyzed,
        votesCast: [],
        userPreferencesApplied,
        executionTime: elapsedSeconds(),
        errors,
        activityType: proposalsAnalyzed > 0 ? ActivityType.OPPORTUNITY_CONSIDERED : ActivityType.NO_OPPORTUNITY,
        nextCheckTime: null,
      };
    } finally {
      this.lastRunTimestamp = this.nowIso();
      this.activeRun = null;
      this.tracker.transition('IDLE', runId);
      this.logger.bindRun(undefined);
    }
  }

  // ─── Stages ───────────────────────────────────────────

  private async loadPreferences(errors: string[]): Promise<{ value: UserPreferences; applied: boolean }> {
    try {
      return { value: await this.deps.preferencesSource.loadPreferences(), applied: true };
    } catch (err) {
      errors.push(`Failed to load user preferences: ${toErrorMessage(err)}`);
      this.logger.error('Failed to load user preferences, using defaults', err);
      return { value: DEFAULT_USER_PREFERENCES, applied: false };
    }
  }

  private async fetchProposals(spaceId: string, errors: string[]): Promise<Proposal[]> {
    try {
      const proposals = await this.deps.proposalSource.getProposals(spaceId, 'active', this.proposalFetchLimit);
      this.logger.log('PROPOSALS_FETCHED', { spaceId, count: proposals.length });
      return proposals;
    } catch (err) {
      errors.push(`Failed to fetch active proposals: ${toErrorMessage(err)}`);
      this.logger.error('Failed to fetch active proposals', err, { spaceId });
      return [];
    }
  }

  /** Filter then rank; any failure falls back to the fetched list. */
  private filterAndRank(proposals: Proposal[], preferences: UserPreferences, errors: string[]): Proposal[] {
    if (proposals.length === 0) return [];
    try {
      const filter = new ProposalFilter(preferences, { clock: this.clock });
      const filtered = filter.filterProposals(proposals);
      const ranked = filter.rankProposals(filtered);
      this.logger.log('PROPOSALS_FILTERED', { ...filter.getFilteringMetrics(proposals, filtered) });
      return ranked;
    } catch (err) {
      errors.push(`Failed to filter and rank proposals: ${toErrorMessage(err)}`);
      this.logger.error('Filtering failed, continuing with unfiltered proposals', err);
      return proposals;
    }
  }

  private async makeDecisions(
    proposals: Proposal[],
    strategy: VotingStrategy,
    spaceId: string,
    errors: string[],
  ): Promise<VoteDecision[]> {
    const settled = await mapSettled(proposals, this.decisionConcurrency, async (proposal) => {
      const decision = await this.deps.decisionMaker.decideVote(proposal, strategy, spaceId);
      if (decision.proposalId !== proposal.id) {
        throw new VoteDecisionError(`decision is for proposal ${decision.proposalId}`);
      }
      return decision;
    });

    const decisions: VoteDecision[] = [];
    settled.forEach((result, index) => {
      const proposal = proposals[index];
      if (result.status === 'fulfilled') {
        decisions.push(result.value);
        this.logger.log('VOTE_DECISION', {
          proposalId: proposal.id,
          vote: result.value.vote,
          confidence: result.value.confidence,
          risk: result.value.riskAssessment,
        });
      } else {
        errors.push(`Failed to decide vote for proposal ${proposal.id}: ${toErrorMessage(result.reason)}`);
        this.logger.error('Vote decision failed', result.reason, { proposalId: proposal.id });
      }
    });
    return decisions;
  }

  private async executeVotes(
    decisions: VoteDecision[],
    spaceId: string,
    dryRun: boolean,
    errors: string[],
  ): Promise<ExecutionOutcome> {
    if (dryRun) {
      return {
        decisions: decisions.map((d) => withExecution(d, { executed: false, dryRun: true })),
        queuedAttestations: [],
        executedCount: 0,
      };
    }

    const outcome: ExecutionOutcome = { decisions: [], queuedAttestations: [], executedCount: 0 };
    for (const decision of decisions) {
      const choice = VOTE_CHOICE_MAPPING[decision.vote];
      let error: string;
      try {
        const result = await this.deps.voteExecutor.voteOnProposal(spaceId, decision.proposalId, choice);
        if (result.success) {
          const executed = withExecution(decision, {
            executed: true,
            dryRun: false,
            transactionHash: result.transactionHash,
          });
          outcome.executedCount++;
          this.logger.log('VOTE_EXECUTED', { proposalId: decision.proposalId, choice, txHash: result.transactionHash });
          const queued = this.buildAttestation(decision, spaceId, choice, result.transactionHash);
          if (queued) {
            outcome.queuedAttestations.push(queued);
            outcome.decisions.push(withAttestation(executed, { attestationStatus: 'pending' }));
          } else {
            outcome.decisions.push(executed);
          }
          continue;
        }
        error = result.error ?? 'vote executor reported failure';
      } catch (err) {
        error = toErrorMessage(err);
      }
      errors.push(`Failed to execute vote for proposal ${decision.proposalId}: ${error}`);
      this.logger.warn('VOTE_EXECUTE_FAIL', { proposalId: decision.proposalId, choice, error });
      outcome.decisions.push(withExecution(decision, { executed: false, dryRun: false, error }));
    }
    return outcome;
  }

  private async reportActivity(activityType: ActivityType): Promise<void> {
    const tracker = this.deps.activityTracker;
    if (!tracker || !this.multisigAddress) return;
    try {
      const result = await tracker.registerActivity(this.multisigAddress, activityType);
      if (result.success) {
        this.logger.log('ACTIVITY_TRACKED', { activityType, txHash: result.txHash });
      } else {
        this.logger.warn('ACTIVITY_TRACKED', { activityType, error: result.error ?? 'unknown error' });
      }
    } catch (err) {
      this.logger.error('Activity tracking failed', err, { activityType });
    }
  }

  private async persistRun(
    response: AgentRunResponse,
    dryRun: boolean,
    pendingAttestations: PendingAttestation[],
  ): Promise<void> {
    const timestamp = this.nowIso();
    try {
      await this.saveVotingDecisions(response.votesCast);
    } catch (err) {
      response.errors.push(`Failed to persist voting history: ${toErrorMessage(err)}`);
      this.logger.error('Failed to persist voting history', err);
    }

    // Written even when the history save failed.
    try {
      const checkpoint: AgentCheckpoint = {
        runId: response.runId,
        spaceId: response.spaceId,
        proposalsAnalyzed: response.proposalsAnalyzed,
        votesCast: response.votesCast.map((d) => toCheckpointVote(d, timestamp)),
        executionTime: response.executionTime,
        errors: [...response.errors],
        activityType: response.activityType,
        dryRun,
        timestamp,
        pendingAttestations,
      };
      await this.deps.stateManager.saveCheckpoint(checkpointKey(response.spaceId), checkpoint);
      this.logger.log('CHECKPOINT_SAVED', {
        key: checkpointKey(response.spaceId),
        pendingAttestations: pendingAttestations.length,
      });
    } catch (err) {
      response.errors.push(`Failed to persist run state: ${toErrorMessage(err)}`);
      this.logger.error('Failed to persist run state', err);
    }
  }

  // ─── Attestations ─────────────────────────────────────

  private buildAttestation(
    decision: VoteDecision,
    spaceId: string,
    choice: number,
    voteTxHash: string | undefined,
  ): PendingAttestation | null {
    const voterAddress = this.deps.voteExecutor.voterAddress;
    if (!this.deps.attestationService || !voterAddress) return null;
    const attestation: PendingAttestation = {
      proposalId: decision.proposalId,
      spaceId,
      voterAddress,
      choice,
      vote: decision.vote,
      voteTxHash: voteTxHash ?? 'unknown',
      reasoning: decision.reasoning,
      timestamp: this.nowIso(),
      retryCount: 0,
    };
    this.logger.log('ATTESTATION_QUEUED', { proposalId: decision.proposalId });
    return attestation;
  }

  /**
   * Retry attestations queued by earlier runs of this space.
   * Returns the ones still pending; entries past the retry limit are dropped.
   */
  private async processPendingAttestations(spaceId: string): Promise<PendingAttestation[]> {
    const service = this.deps.attestationService;
    try {
      const checkpoint = parseCheckpoint(await this.deps.stateManager.loadCheckpoint(checkpointKey(spaceId)));
      if (!checkpoint || checkpoint.pendingAttestations.length === 0) return [];
      if (!service) return checkpoint.pendingAttestations;

      const remaining: PendingAttestation[] = [];
      for (const pending of checkpoint.pendingAttestations) {
        if (pending.retryCount >= MAX_ATTESTATION_RETRIES) {
          this.logger.warn('ATTESTATION_PROCESSED', { proposalId: pending.proposalId, dropped: true });
          continue;
        }
        try {
          const result = await service.createAttestation({
            proposalId: pending.proposalId,
            spaceId: pending.spaceId,
            voterAddress: pending.voterAddress,
            choice: pending.choice,
            voteTxHash: pending.voteTxHash,
            reasoning: pending.reasoning,
            timestamp: pending.timestamp,
          });
          this.logger.log('ATTESTATION_PROCESSED', {
            proposalId: pending.proposalId,
            txHash: result.txHash,
            uid: result.attestationUid,
          });
        } catch (err) {
          const retryCount = pending.retryCount + 1;
          this.logger.warn('ATTESTATION_PROCESSED', {
            proposalId: pending.proposalId,
            retryCount,
            error: toErrorMessage(err),
          });
          if (retryCount < MAX_ATTESTATION_RETRIES) {
            remaining.push({ ...pending, retryCount, lastError: toErrorMessage(err) });
          }
        }
      }

      await this.deps.stateManager.saveCheckpoint(checkpointKey(spaceId), {
        ...checkpoint,
        pendingAttestations: remaining,
      });
      return remaining;
    } catch (err) {
      this.logger.error('Failed to process pending attestations', err, { spaceId });
      return [];
    }
  }

  // ─── Voting history ───────────────────────────────────

  /** The ten most recent history entries, oldest first. */
  async getVotingHistory(): Promise<VotingHistoryEntry[]> {
    return this.history.load();
  }

  async saveVotingDecisions(decisions: readonly VoteDecision[]): Promise<void> {
    await this.history.append(decisions, this.nowIso());
  }

  async getVotingPatterns(): Promise<VotingPatterns> {
    return this.history.patterns();
  }

  // ─── Status & statistics ──────────────────────────────

  getStatus(): AgentStatus {
    return {
      currentStage: this.tracker.current,
      isActive: this.activeRun !== null,
      currentSpaceId: this.activeRun?.spaceId ?? null,
      lastRunTimestamp: this.lastRunTimestamp,
    };
  }

  get stageTracker(): RunStageTracker {
    return this.tracker;
  }

  private async loadAllCheckpoints(): Promise<AgentCheckpoint[]> {
    const keys = await this.deps.stateManager.listCheckpoints(CHECKPOINT_KEY_PREFIX);
    const checkpoints: AgentCheckpoint[] = [];
    for (const key of keys) {
      const checkpoint = parseCheckpoint(await this.deps.stateManager.loadCheckpoint(key));
      if (checkpoint) checkpoints.push(checkpoint);
      else console.warn(`[agentRun] skipping unreadable checkpoint ${key}`);
    }
    return checkpoints;
  }

  /** Newest checkpoint across all spaces, by timestamp. */
  async getLatestCheckpoint(): Promise<AgentCheckpoint | null> {
    let latest: AgentCheckpoint | null = null;
    for (const checkpoint of await this.loadAllCheckpoints()) {
      if (!latest || Date.parse(checkpoint.timestamp) > Date.parse(latest.timestamp)) {
        latest = checkpoint;
      }
    }
    return latest;
  }

  async getRunStatistics(): Promise<RunStatistics> {
    const checkpoints = await this.loadAllCheckpoints();
    if (checkpoints.length === 0) {
      return {
        totalRuns: 0,
        totalProposalsEvaluated: 0,
        totalVotesCast: 0,
        averageConfidenceScore: 0,
        successRate: 0,
        averageRuntimeSeconds: 0,
      };
    }

    let totalProposalsEvaluated = 0;
    let totalVotesCast = 0;
    let confidenceSum = 0;
    let successfulRuns = 0;
    let runtimeSum = 0;
    for (const checkpoint of checkpoints) {
      totalProposalsEvaluated += checkpoint.proposalsAnalyzed;
      totalVotesCast += checkpoint.votesCast.length;
      confidenceSum += checkpoint.votesCast.reduce((sum, vote) => sum + vote.confidence, 0);
      if (checkpoint.errors.length === 0) successfulRuns++;
      runtimeSum += checkpoint.executionTime;
    }

    return {
      totalRuns: checkpoints.length,
      totalProposalsEvaluated,
      totalVotesCast,
      averageConfidenceScore: totalVotesCast === 0 ? 0 : roundConfidence(confidenceSum / totalVotesCast),
      successRate: roundConfidence(successfulRuns / checkpoints.length),
      averageRuntimeSeconds: Math.round((runtimeSum / checkpoints.length) * 100) / 100,
    };
  }

  /** Record the in-flight run, if any, so it can be inspected after restart. */
  async shutdown(reason = 'graceful_shutdown'): Promise<void> {
    const run = this.activeRun;
    if (!run) return;
    try {
      await this.deps.stateManager.saveState(SHUTDOWN_STATE_KEY, {
        ...run,
        shutdownTime: this.nowIso(),
        reason,
      });
    } catch (err) {
      this.logger.error('Failed to save shutdown state', err);
    }
  }
}
