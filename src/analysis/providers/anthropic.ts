/**
 * Anthropic Messages API adapter.
 *
 * Claude has no JSON mode here; the text reply is handed to the extractor,
 * which finds the object inside it.
 */

import { PipelineError, configError, invalidResponseError } from '../../domain/errors';
import { isRecord } from '../../domain/values';
import { extractJsonObject } from '../extraction';
import { InferenceSettings } from '../../config/schema';
import { HttpFetch, HttpResponse } from '../../http';
import { VisionProvider, VisionRequest, failureFromException, failureFromResponse, readJson } from './types';

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com';
export const ANTHROPIC_VERSION = '2023-06-01';

function textContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.content)) return undefined;
  const parts: string[] = [];
  for (const block of data.content) {
    if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
      parts.push(block.text);
    }
  }
  return parts.length > 0 ? parts.join('\n') : undefined;
}

export function createAnthropicProvider(fetchImpl: HttpFetch, baseUrl: string = ANTHROPIC_BASE_URL): VisionProvider {
  const service = 'Anthropic';
  return {
    id: 'anthropic',
    service,

    checkSettings(settings: InferenceSettings): void {
      if (!settings.credential) {
        throw new PipelineError(configError('Anthropic requires an API key (inference.credential)'));
      }
    },

    async complete(request: VisionRequest): Promise<string> {
      const secrets = [request.credential];
      const body = {
        model: request.model,
        system: request.systemPrompt,
        temperature: request.temperature,
        max_tokens: request.maxOutputTokens,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: request.userPrompt },
              {
                type: 'image',
                source: { type: 'base64', media_type: request.mimeType, data: request.image.toString('base64') },
              },
            ],
          },
        ],
      };

      let res: HttpResponse;
      try {
        res = await fetchImpl(`${baseUrl}/v1/messages`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'x-api-key': request.credential,
            'anthropic-version': ANTHROPIC_VERSION,
          },
          body: JSON.stringify(body),
          signal: request.signal,
        });
      } catch (err) {
        throw failureFromException(service, err, secrets);
      }

      if (!res.ok) {
        throw await failureFromResponse(service, res, secrets);
      }

      const text = textContent(await readJson(service, res));
      if (text === undefined) {
        throw new PipelineError(invalidResponseError('Anthropic response has no text content', ''));
      }
      return text;
    },

    extract: extractJsonObject,
  };
}
