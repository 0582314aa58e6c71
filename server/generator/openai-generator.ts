import OpenAI from 'openai';
import type { Catalog } from '../config/catalog.js';
import { GeneratorError, errorMessage } from '../errors.js';
import { tracedLLMCall, type ChatCompletionClient } from '../observability/llm-tracer.js';
import { buildAnalysisPrompt } from './prompt-builder.js';
import { analysisOutputSchema, type AnalysisGenerator, type AnalysisOutput, type GenerateRequest } from './types.js';

export interface OpenAIGeneratorOptions {
  client: ChatCompletionClient;
  catalog: Catalog;
  models: readonly string[];
  timeoutMs: number;
  temperature: number;
  logPrompts?: boolean;
}

export function createOpenAIClient(apiKey: string | undefined, baseURL: string | undefined): OpenAI {
  return new OpenAI({ apiKey, baseURL });
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof OpenAI.APIError) return error.status;
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map anything thrown during one model attempt onto a GeneratorError kind.
 */
export function classifyGeneratorError(
  error: unknown,
  state: { timedOut: boolean; cancelled: boolean },
): GeneratorError {
  if (error instanceof GeneratorError) return error;
  const message = errorMessage(error);
  if (state.cancelled) return new GeneratorError('cancelled', message);
  if (state.timedOut || error instanceof OpenAI.APIConnectionTimeoutError) {
    return new GeneratorError('timeout', message);
  }

  const status = statusOf(error);
  if (status === 429) return new GeneratorError('rate_limited', message, { status });
  if (status === 408 || status === 504) return new GeneratorError('timeout', message, { status });
  return new GeneratorError('provider_error', message, status === undefined ? {} : { status });
}

/**
 * Generator backed by any OpenAI-compatible chat completions endpoint.
 * Models are tried in order; the first one that returns well-formed output wins.
 */
export class OpenAIAnalysisGenerator implements AnalysisGenerator {
  readonly name = 'openai';

  constructor(private readonly options: OpenAIGeneratorOptions) {}

  async generate({ key, datasetSummary, signal }: GenerateRequest): Promise<AnalysisOutput> {
    const { client, catalog, models, timeoutMs, temperature, logPrompts } = this.options;
    const prompt = buildAnalysisPrompt(key, datasetSummary, catalog);
    let lastError: GeneratorError | undefined;

    for (const model of models) {
      if (signal?.aborted) {
        throw new GeneratorError('cancelled', `Generation for ${key.hash.slice(0, 12)} was cancelled`);
      }

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      const started = Date.now();
      try {
        const result = await tracedLLMCall({
          client,
          agentName: 'findings-generator',
          systemPrompt: prompt.systemPrompt,
          userPrompt: prompt.userPrompt,
          model,
          temperature,
          responseFormat: 'json_object',
          signal: controller.signal,
          timeoutMs,
          logPrompts,
        });

        if (result.parseError !== undefined) {
          throw new GeneratorError('malformed_output', `Model ${model} returned invalid JSON: ${result.parseError}`);
        }
        const parsed = analysisOutputSchema.safeParse(result.parsed);
        if (!parsed.success) {
          throw new GeneratorError(
            'malformed_output',
            `Model ${model} returned an unexpected shape: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
          );
        }

        return {
          ...parsed.data,
          generator_id: `openai:${result.model}`,
          latency_ms: Date.now() - started,
          data_points_count: parsed.data.data_points_count ?? datasetSummary.totalPoints,
        };
      } catch (error) {
        const classified = classifyGeneratorError(error, { timedOut, cancelled: signal?.aborted ?? false });
        if (classified.kind === 'cancelled') throw classified;
        lastError = classified;
        console.warn(`⚠️ [Generator] Model ${model} failed (${classified.kind}): ${classified.message}`);
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }
    }

    throw lastError ?? new GeneratorError('provider_error', 'No generator models configured');
  }
}
