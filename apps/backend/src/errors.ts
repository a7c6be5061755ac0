/**
 * Error taxonomy for the agent backend.
 *
 * ValidationError (from the shared package) marks programmer errors and
 * malformed domain data. Everything deriving from AgentRunError is a
 * recoverable, external-service failure the run pipeline records in its
 * `errors` list and moves past.
 */

export { ValidationError } from '@govpilot/shared';

export class ProposalFilterError extends Error {
  override name = 'ProposalFilterError';
}

export class AgentRunError extends Error {
  override name = 'AgentRunError';
}

export class ProposalFetchError extends AgentRunError {
  override name = 'ProposalFetchError';
}

export class VoteDecisionError extends AgentRunError {
  override name = 'VoteDecisionError';
}

/**
 * Configuration error, thrown at startup with every violation found
 * so operators can fix them in one pass.
 */
export class ConfigError extends Error {
  override name = 'ConfigError';
  public readonly violations: string[];

  constructor(violations: string[]) {
    const header = `Agent config is invalid (${violations.length} violation(s)):`;
    const body = violations.map((v, i) => `  ${i + 1}. ${v}`).join('\n');
    super(`${header}\n${body}`);
    this.violations = violations;
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
