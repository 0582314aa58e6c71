/**
 * LLM Tracer - chat completions wrapped in an OpenTelemetry span carrying
 * OpenInference attributes. No exporter is started here; whichever process
 * hosts the generator decides where spans go.
 */

import type OpenAI from 'openai';
import { trace, context, SpanStatusCode } from '@opentelemetry/api';

/**
 * The slice of the OpenAI SDK the tracer calls. The real client satisfies
 * it; tests pass a fake.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number },
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export interface TracedLLMCall {
  client: ChatCompletionClient;
  agentName: string;
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  model?: string;
  responseFormat?: 'json_object' | 'text';
  maxTokens?: number;
  signal?: AbortSignal;
  timeoutMs?: number;
  logPrompts?: boolean;
}

export interface LLMCallResult {
  content: string;
  parsed?: unknown;
  parseError?: string;
  model: string;
  tokensUsed: { prompt: number; completion: number; total: number };
  cost: { prompt: number; completion: number; total: number };
  responseId?: string;
}

const MAX_ATTRIBUTE_LENGTH = 16_000;
const TRUNCATION_SUFFIX = '…[truncated]';

// USD per 1K tokens
const PRICING: Record<string, { prompt: number; completion: number }> = {
  'gpt-4o': { prompt: 0.0025, completion: 0.01 },
  'gpt-4o-mini': { prompt: 0.00015, completion: 0.0006 },
  'gpt-4-turbo': { prompt: 0.01, completion: 0.03 },
  'gpt-3.5-turbo': { prompt: 0.0005, completion: 0.0015 },
};

export function truncateAttribute(text: string, maxLength: number = MAX_ATTRIBUTE_LENGTH): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - TRUNCATION_SUFFIX.length) + TRUNCATION_SUFFIX;
}

export function estimateCost(
  model: string,
  promptTokens: number,
  completionTokens: number,
): { prompt: number; completion: number; total: number } {
  const pricing = PRICING[model] ?? PRICING['gpt-4o'] ?? { prompt: 0, completion: 0 };
  const prompt = (promptTokens / 1000) * pricing.prompt;
  const completion = (completionTokens / 1000) * pricing.completion;
  return { prompt, completion, total: prompt + completion };
}

export async function tracedLLMCall({
  client,
  agentName,
  systemPrompt,
  userPrompt,
  temperature = 0.3,
  model = 'gpt-4o-mini',
  responseFormat = 'json_object',
  maxTokens,
  signal,
  timeoutMs,
  logPrompts = false,
}: TracedLLMCall): Promise<LLMCallResult> {
  if (logPrompts) {
    console.log('\n' + '='.repeat(80));
    console.log(`LLM PROMPT [${agentName}] model=${model} temperature=${temperature}`);
    console.log('='.repeat(80));
    console.log('\nSYSTEM PROMPT:\n' + systemPrompt);
    console.log('\nUSER PROMPT:\n' + userPrompt);
    console.log('-'.repeat(80));
  }

  const tracer = trace.getTracer('findings-generator');
  const span = tracer.startSpan(
    `${agentName}.generate`,
    {
      attributes: {
        'ai.agent.name': agentName,
        'ai.operation': 'generate',
        'openinference.span.kind': 'LLM',
      },
    },
    context.active(),
  );

  const invocationParams: Record<string, string | number> = { temperature };
  if (responseFormat === 'json_object') invocationParams.response_format = 'json_object';
  if (maxTokens !== undefined) invocationParams.max_tokens = maxTokens;

  span.setAttribute('llm.model_name', model);
  span.setAttribute('llm.system', 'openai');
  span.setAttribute('llm.invocation_parameters', JSON.stringify(invocationParams));
  span.setAttribute('input.messages.0.message.role', 'system');
  span.setAttribute('input.messages.0.message.content', truncateAttribute(systemPrompt));
  span.setAttribute('input.messages.1.message.role', 'user');
  span.setAttribute('input.messages.1.message.content', truncateAttribute(userPrompt));

  try {
    return await context.with(trace.setSpan(context.active(), span), async () => {
      const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
        model,
        temperature,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
      };
      if (responseFormat === 'json_object') body.response_format = { type: 'json_object' };
      if (maxTokens !== undefined) body.max_tokens = maxTokens;

      // Retries belong to the caller (model fallback, pipeline backoff).
      const response = await client.chat.completions.create(body, { signal, timeout: timeoutMs, maxRetries: 0 });
      const content = response.choices[0]?.message.content ?? '';

      if (logPrompts) {
        console.log('\nLLM RESPONSE:');
        console.log(content.substring(0, 500) + (content.length > 500 ? '...[truncated]' : ''));
        console.log('='.repeat(80) + '\n');
      }

      const promptTokens = response.usage?.prompt_tokens || Math.ceil((systemPrompt.length + userPrompt.length) / 4);
      const completionTokens = response.usage?.completion_tokens || Math.ceil(content.length / 4);
      const totalTokens = response.usage?.total_tokens || promptTokens + completionTokens;
      const cost = estimateCost(model, promptTokens, completionTokens);

      span.setAttribute('output.value', truncateAttribute(content));
      span.setAttribute('llm.token_count.prompt', promptTokens);
      span.setAttribute('llm.token_count.completion', completionTokens);
      span.setAttribute('llm.token_count.total', totalTokens);
      span.setAttribute('llm.cost.total', cost.total);
      if (response.id) span.setAttribute('llm.response_id', response.id);
      if (response.model) span.setAttribute('llm.model_used', response.model);

      let parsed: unknown;
      let parseError: string | undefined;
      if (responseFormat === 'json_object') {
        try {
          parsed = JSON.parse(content);
        } catch (e) {
          parseError = e instanceof Error ? e.message : 'Unknown error';
          console.error(`[LLM Tracer] Failed to parse JSON response from ${agentName}: ${parseError}`);
          span.setAttribute('llm.parse_error', true);
          span.addEvent('json_parse_failed', { 'error.message': parseError });
        }
      }

      span.setAttribute('llm.success', parseError === undefined);
      span.setStatus({ code: SpanStatusCode.OK });

      return {
        content,
        parsed,
        parseError,
        model: response.model || model,
        tokensUsed: { prompt: promptTokens, completion: completionTokens, total: totalTokens },
        cost,
        responseId: response.id,
      };
    });
  } catch (error) {
    if (error instanceof Error) {
      span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      span.setAttribute('error.type', error.name);
    } else {
      span.setStatus({ code: SpanStatusCode.ERROR, message: 'Unknown error' });
    }
    span.setAttribute('error', true);
    span.setAttribute('llm.success', false);
    throw error;
  } finally {
    span.end();
  }
}
