/**
 * Voting Agent
 *
 * Turns a proposal plus a voting strategy into a VoteDecision.
 *
 * - Uses Gemini with strict schema validation when an API key is set.
 * - Falls back to deterministic keyword analysis otherwise, or when the
 *   model fails. Fallback confidence stays below the default threshold,
 *   so fallback decisions are recorded but not cast unless the user
 *   lowers it.
 * - Never signs or submits anything; execution belongs to the run service.
 */

import {
  createVoteDecision,
  type Proposal,
  type RiskLevel,
  type VoteDecision,
  type VoteDirection,
  type VotingStrategy,
} from '@govpilot/shared';
import type { DecisionMaker } from '../orchestrator/types.js';
import type { JsonGenerator } from '../llm/geminiClient.js';
import { VoteDecisionOutputSchema } from '../llm/schemas.js';
import { toErrorMessage } from '../errors.js';

// ─── Prompts ────────────────────────────────────────────

const BASE_PROMPT = `You are an autonomous DAO voting agent. Given a governance proposal, produce a JSON object:
{
  "vote": "FOR" | "AGAINST" | "ABSTAIN",
  "confidence": <0.0 to 1.0>,
  "reasoning": "<why you chose this vote, 1-3 sentences>",
  "riskLevel": "LOW" | "MEDIUM" | "HIGH",
  "keyFactors": ["<factor>", ...]
}
Confidence must reflect how certain the analysis is. Return ONLY the JSON object.`;

const STRATEGY_GUIDANCE: Record<VotingStrategy, string> = {
  conservative:
    'You are a conservative voter. Prioritize treasury protection, minimal risk and proven track records. Vote AGAINST high-risk or unproven proposals.',
  balanced:
    'You are a balanced voter. Weigh risk against reward, community benefit and long-term sustainability.',
  aggressive:
    'You are a growth-oriented voter. Favor innovation, experimentation and new initiatives. Vote FOR proposals that could drive growth.',
};

export function buildSystemPrompt(strategy: VotingStrategy): string {
  return `${BASE_PROMPT}\n\n${STRATEGY_GUIDANCE[strategy]}`;
}

function formatTime(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function buildUserPrompt(proposal: Proposal): string {
  const tally = proposal.choices
    .map((choice, i) => `${choice}: ${proposal.scores[i] ?? 0}`)
    .join(', ');
  return [
    `Title: ${proposal.title}`,
    `Author: ${proposal.author}`,
    `Space: ${proposal.space ?? 'unknown'}`,
    `Voting window: ${formatTime(proposal.start)} to ${formatTime(proposal.end)}`,
    `Choices: ${tally || 'none'}`,
    `Votes so far: ${proposal.votes} (total score ${proposal.scoresTotal}, quorum ${proposal.quorum})`,
    '',
    'Proposal text:',
    proposal.body.slice(0, 3000),
  ].join('\n');
}

// ─── Deterministic Fallback ─────────────────────────────

interface RiskRule {
  pattern: RegExp;
  weight: number;
  flag: string;
}

const RISK_RULES: readonly RiskRule[] = [
  { pattern: /treasury|fund|budget|drain/, weight: 30, flag: 'moves treasury funds' },
  { pattern: /quorum|threshold|admin|owner|upgrade|proxy/, weight: 25, flag: 'changes governance parameters or admin access' },
  { pattern: /emergency|urgent|immediate|critical/, weight: 20, flag: 'uses urgency language' },
  { pattern: /mint|inflate|supply/, weight: 15, flag: 'affects token supply' },
];

/** Risk score at or above `against` votes AGAINST; at or above `abstain` abstains. */
const STRATEGY_THRESHOLDS: Record<VotingStrategy, { against: number; abstain: number }> = {
  conservative: { against: 30, abstain: 1 },
  balanced: { against: 50, abstain: 20 },
  aggressive: { against: 70, abstain: 45 },
};

const FALLBACK_CONFIDENCE: Record<VoteDirection, number> = {
  FOR: 0.65,
  AGAINST: 0.6,
  ABSTAIN: 0.5,
};

export interface KeywordAnalysis {
  vote: VoteDirection;
  confidence: number;
  riskLevel: RiskLevel;
  riskScore: number;
  flags: string[];
}

/** Same input and strategy always give the same analysis. */
export function analyzeByKeywords(text: string, strategy: VotingStrategy): KeywordAnalysis {
  const lower = text.toLowerCase();
  const matched = RISK_RULES.filter((rule) => rule.pattern.test(lower));
  const riskScore = matched.reduce((sum, rule) => sum + rule.weight, 0);
  const thresholds = STRATEGY_THRESHOLDS[strategy];

  const vote: VoteDirection =
    riskScore >= thresholds.against ? 'AGAINST' : riskScore >= thresholds.abstain ? 'ABSTAIN' : 'FOR';
  const riskLevel: RiskLevel = riskScore >= 50 ? 'HIGH' : riskScore >= 20 ? 'MEDIUM' : 'LOW';

  return {
    vote,
    confidence: FALLBACK_CONFIDENCE[vote],
    riskLevel,
    riskScore,
    flags: matched.map((rule) => rule.flag),
  };
}

// ─── Agent ──────────────────────────────────────────────

export class VotingAgent implements DecisionMaker {
  constructor(private readonly llm: JsonGenerator) {}

  async decideVote(proposal: Proposal, strategy: VotingStrategy, spaceId?: string): Promise<VoteDecision> {
    const space = spaceId ?? proposal.space;

    if (this.llm.isConfigured()) {
      try {
        const output = await this.llm.generateJSON(
          VoteDecisionOutputSchema,
          buildSystemPrompt(strategy),
          buildUserPrompt(proposal),
        );
        return createVoteDecision({
          proposalId: proposal.id,
          vote: output.vote,
          confidence: output.confidence,
          reasoning: output.reasoning,
          riskAssessment: output.riskLevel,
          strategyUsed: strategy,
          spaceId: space,
        });
      } catch (err) {
        console.warn(
          `[votingAgent] Gemini decision failed for ${proposal.id}, using deterministic fallback: ${toErrorMessage(err)}`,
        );
      }
    }

    return this.fallbackDecision(proposal, strategy, space);
  }

  private fallbackDecision(proposal: Proposal, strategy: VotingStrategy, spaceId: string | undefined): VoteDecision {
    const analysis = analyzeByKeywords(`${proposal.title}\n\n${proposal.body}`, strategy);
    const detail =
      analysis.flags.length > 0
        ? `Proposal ${analysis.flags.join('; ')} (risk score ${analysis.riskScore}).`
        : 'No risk keywords detected.';

    return createVoteDecision({
      proposalId: proposal.id,
      vote: analysis.vote,
      confidence: analysis.confidence,
      reasoning: `Keyword analysis under ${strategy} strategy. ${detail}`,
      riskAssessment: analysis.riskLevel,
      strategyUsed: strategy,
      spaceId,
    });
  }
}
