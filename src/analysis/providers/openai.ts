/**
 * OpenAI chat-completions adapter.
 *
 * Sends the image as a base64 data URL and asks for JSON mode so the
 * message content is a bare JSON object; anything else is rejected.
 */

import { PipelineError, configError, invalidResponseError } from '../../domain/errors';
import { isRecord } from '../../domain/values';
import { parseStrictJsonObject } from '../extraction';
import { InferenceSettings } from '../../config/schema';
import { HttpFetch, HttpResponse } from '../../http';
import { VisionProvider, VisionRequest, failureFromException, failureFromResponse, readJson } from './types';

export const OPENAI_BASE_URL = 'https://api.openai.com';

/** Model name fragments that accept image input. */
export const OPENAI_VISION_MODELS = ['gpt-4-vision-preview', 'gpt-4o', 'gpt-4o-mini', 'gpt-4-turbo'];

export function supportsVision(model: string): boolean {
  return OPENAI_VISION_MODELS.some((name) => model.includes(name));
}

function messageContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
  const [choice] = data.choices;
  if (!isRecord(choice) || !isRecord(choice.message)) return undefined;
  const content = choice.message.content;
  return typeof content === 'string' ? content : undefined;
}

export function createOpenAIProvider(fetchImpl: HttpFetch, baseUrl: string = OPENAI_BASE_URL): VisionProvider {
  const service = 'OpenAI';
  return {
    id: 'openai',
    service,

    checkSettings(settings: InferenceSettings): void {
      if (!settings.credential) {
        throw new PipelineError(configError('OpenAI requires an API key (inference.credential)'));
      }
      if (!supportsVision(settings.model)) {
        throw new PipelineError(configError(
          `Model "${settings.model}" does not support image analysis. Use a vision-capable model such as gpt-4o or gpt-4o-mini.`,
          { model: settings.model, visionModels: OPENAI_VISION_MODELS },
        ));
      }
    },

    async complete(request: VisionRequest): Promise<string> {
      const secrets = [request.credential];
      const body = {
        model: request.model,
        temperature: request.temperature,
        max_tokens: request.maxOutputTokens,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: request.systemPrompt },
          {
            role: 'user',
            content: [
              { type: 'text', text: request.userPrompt },
              {
                type: 'image_url',
                image_url: { url: `data:${request.mimeType};base64,${request.image.toString('base64')}` },
              },
            ],
          },
        ],
      };

      let res: HttpResponse;
      try {
        res = await fetchImpl(`${baseUrl}/v1/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${request.credential}`,
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

      const content = messageContent(await readJson(service, res));
      if (content === undefined) {
        throw new PipelineError(invalidResponseError('OpenAI response has no message content', ''));
      }
      return content;
    },

    extract: parseStrictJsonObject,
  };
}
