/**
 * Gemini JSON adapter.
 *
 * - Enforces JSON output via responseMimeType.
 * - Parses and validates the output with a Zod schema before returning.
 * - Retries ONCE on invalid output; never retries quota or not-found errors.
 * - Temperature is pinned low.
 *
 * Usage:
 *   const client = new GeminiClient({ apiKey, model });
 *   const result = await client.generateJSON(VoteDecisionOutputSchema, systemPrompt, userPrompt);
 */

import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { ZodType, ZodTypeDef } from 'zod';
import { toErrorMessage } from '../errors.js';

// ─── Configuration ──────────────────────────────────────

const DEFAULT_MODEL = 'gemini-2.0-flash';
const MAX_RETRIES = 1;
const MAX_OUTPUT_TOKENS = 1024;
const TEMPERATURE = 0.2;
const REQUEST_TIMEOUT_MS = 15_000;

export interface GeminiClientOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

/** Anything that can turn prompts into schema-validated JSON. */
export interface JsonGenerator {
  isConfigured(): boolean;
  generateJSON<T>(schema: ZodType<T, ZodTypeDef, unknown>, systemPrompt: string, userPrompt: string): Promise<T>;
}

// ─── JSON extraction ────────────────────────────────────

/** Find the first balanced { … } block in arbitrary text. */
export function extractFirstJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === '{') depth++;
    else if (ch === '}') depth--;
    if (depth === 0) return text.slice(start, i + 1);
  }
  return null;
}

/** Parse model text, tolerating markdown fences and trailing prose. */
export function parseGeminiJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // not bare JSON; look for an embedded object
  }

  const extracted = extractFirstJsonObject(text);
  if (!extracted) {
    throw new GeminiInvalidJSONError(`Gemini returned invalid JSON: ${text.slice(0, 120)}`);
  }
  try {
    return JSON.parse(extracted);
  } catch {
    throw new GeminiInvalidJSONError(`Gemini returned invalid JSON: ${text.slice(0, 120)}`);
  }
}

function isNonRetryable(err: Error): boolean {
  return /\[404|\[429|quota|resource.*exhausted/i.test(err.message);
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('Gemini request timed out')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

// ─── Client ─────────────────────────────────────────────

export class GeminiClient implements JsonGenerator {
  private model: GenerativeModel | null = null;
  private readonly apiKey: string;
  private readonly modelName: string;
  private readonly timeoutMs: number;

  constructor(options: GeminiClientOptions = {}) {
    this.apiKey = options.apiKey ?? '';
    this.modelName = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  /** Callers fall back to deterministic logic when this is false. */
  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  private getModel(): GenerativeModel | null {
    if (!this.isConfigured()) return null;
    if (!this.model) {
      this.model = new GoogleGenerativeAI(this.apiKey).getGenerativeModel({
        model: this.modelName,
        generationConfig: {
          temperature: TEMPERATURE,
          responseMimeType: 'application/json',
          maxOutputTokens: MAX_OUTPUT_TOKENS,
        },
      });
    }
    return this.model;
  }

  /**
   * Generate a validated JSON response.
   * @throws GeminiUnavailableError without an API key, GeminiValidationError after the retry
   */
  async generateJSON<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    systemPrompt: string,
    userPrompt: string,
  ): Promise<T> {
    const model = this.getModel();
    if (!model) {
      throw new GeminiUnavailableError('GEMINI_API_KEY is not set, cannot generate LLM response');
    }

    const jsonDirective =
      'Return ONLY valid JSON. No markdown. No code fences. No comments. No trailing commas.';
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      try {
        const retryHint =
          attempt > 0
            ? '\nREMINDER: Output must be parseable JSON. Do not include any other text.'
            : '';

        const result = await withTimeout(
          model.generateContent({
            contents: [
              {
                role: 'user',
                parts: [{ text: `${systemPrompt}\n${jsonDirective}${retryHint}\n\n${userPrompt}` }],
              },
            ],
          }),
          this.timeoutMs,
        );

        const raw = result.response.text();
        if (!raw) {
          throw new GeminiEmptyResponseError('Gemini returned empty response');
        }
        return schema.parse(parseGeminiJson(raw));
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));

        if (isNonRetryable(lastError)) {
          throw lastError;
        }

        if (attempt < MAX_RETRIES) {
          console.warn(
            `[GeminiClient] Attempt ${attempt + 1} failed, retrying: ${lastError.message.slice(0, 160)}`,
          );
        }
      }
    }

    throw new GeminiValidationError(
      `Gemini response failed validation after ${MAX_RETRIES + 1} attempts: ${toErrorMessage(lastError).slice(0, 160)}`,
    );
  }
}

// ─── Error Classes ──────────────────────────────────────

export class GeminiUnavailableError extends Error {
  override name = 'GeminiUnavailableError' as const;
}

export class GeminiEmptyResponseError extends Error {
  override name = 'GeminiEmptyResponseError' as const;
}

export class GeminiInvalidJSONError extends Error {
  override name = 'GeminiInvalidJSONError' as const;
}

export class GeminiValidationError extends Error {
  override name = 'GeminiValidationError' as const;
}
