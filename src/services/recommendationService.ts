import { z } from 'zod';
import { RecommendationUnavailableError } from '../errors';
import { aiLogger } from '../logger';
import type { MonthStats, Recommendation } from '../types';

export const FALLBACK_RECOMMENDATION =
  'Keep focusing on your wellbeing and celebrate small wins.';

export function buildRecommendationPrompt(stats: MonthStats): string {
  const { counts } = stats;
  return [
    'Based on these diary stats:',
    `- Average polarity: ${stats.avgPolarity.toFixed(2)}`,
    `- Distribution: ${counts.happy} happy days, ${counts.veryHappy} very happy days, ` +
      `compared to ${counts.sad} sad days and ${counts.verySad} very sad days.`,
    `- Happiest day: ${stats.happiestDay ?? 'none'}`,
    '',
    'Please give the user a short, straight-forward paragraph that reflects the overall trend.',
    'Celebrate positives if they dominate, but also mention one area to improve.',
    'Limit to no more than 6 sentences.'
  ].join('\n');
}

export interface TextGenerator {
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const generateChunkSchema = z.object({
  response: z.string().optional(),
  error: z.string().optional()
});

/** Client for a local Ollama server's `/api/generate`, which answers with newline-delimited JSON. */
export class OllamaClient implements TextGenerator {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OllamaClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`timeout after ${this.options.timeoutMs}ms`)),
      this.options.timeoutMs
    );
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(
        `${this.options.baseUrl.replace(/\/+$/, '')}/api/generate`,
        {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify({ model: this.options.model, prompt }),
          signal: controller.signal
        }
      );
      if (!response.ok) {
        throw new RecommendationUnavailableError(`HTTP ${response.status}`);
      }
      const output = this.collect(await response.text());
      if (!output) {
        throw new RecommendationUnavailableError('empty response');
      }
      return output;
    } catch (err) {
      if (err instanceof RecommendationUnavailableError) {
        throw err;
      }
      throw new RecommendationUnavailableError(err instanceof Error ? err.message : String(err));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private collect(body: string): string {
    let output = '';
    body.split('\n').forEach((line) => {
      if (!line.trim()) {
        return;
      }
      const chunk = generateChunkSchema.parse(JSON.parse(line));
      if (chunk.error) {
        throw new RecommendationUnavailableError(chunk.error);
      }
      output += chunk.response ?? '';
    });
    return output.trim();
  }
}

export class RecommendationService {
  constructor(private readonly generator: TextGenerator) {}

  /**
   * Never rejects: any failure of the generator yields the fallback text. When
   * `signal` aborts, the pending request is cancelled and its result dropped.
   */
  async recommend(stats: MonthStats, signal?: AbortSignal): Promise<Recommendation> {
    try {
      const text = await this.generator.generate(buildRecommendationPrompt(stats), signal);
      return { text, source: 'model' };
    } catch (err) {
      if (signal?.aborted) {
        aiLogger.debug('Recommendation abandoned by caller');
      } else {
        aiLogger.warn({ err }, 'Recommendation unavailable, using fallback');
      }
      return { text: FALLBACK_RECOMMENDATION, source: 'fallback' };
    }
  }
}
