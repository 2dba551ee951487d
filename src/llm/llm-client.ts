/**
 * Generation capability: a fetch-based Anthropic Messages client, no SDK dependency.
 * Any text may come back; shaping it is the normalizer's job.
 */
import { z } from 'zod';
import { serviceError, toError } from '../shared/errors';

export interface LLMCompletionOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface LLMClient {
  complete(system: string, user: string, options: LLMCompletionOptions): Promise<LLMResponse>;
}

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';

const anthropicMessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  model: z.string(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
});

export function createAnthropicClient(apiKey: string, fetchImpl: typeof fetch = fetch): LLMClient {
  return {
    async complete(system: string, user: string, options: LLMCompletionOptions): Promise<LLMResponse> {
      let response: Response;
      try {
        response = await fetchImpl(ANTHROPIC_MESSAGES_URL, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': apiKey,
            'anthropic-version': '2023-06-01',
          },
          body: JSON.stringify({
            model: options.model,
            max_tokens: options.maxTokens,
            temperature: options.temperature,
            system,
            messages: [{ role: 'user', content: user }],
          }),
          signal: options.signal,
        });
      } catch (err) {
        const cause = toError(err);
        throw serviceError(`Anthropic API request failed: ${cause.message}`, { cause, retryable: true });
      }

      if (!response.ok) {
        const body = await response.text();
        throw serviceError(`Anthropic API error ${response.status}: ${body.slice(0, 200)}`, {
          context: { status: response.status },
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      const parsed = anthropicMessageSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw serviceError('Unexpected Anthropic API response shape');
      }
      const data = parsed.data;

      const text = data.content
        .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
        .join('');
      if (text === '') {
        throw serviceError('No text content in Anthropic API response');
      }

      return {
        content: text,
        model: data.model,
        inputTokens: data.usage.input_tokens,
        outputTokens: data.usage.output_tokens,
      };
    },
  };
}
