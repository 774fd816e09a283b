/**
 * Ollama adapter for a locally hosted vision model.
 *
 * Ollama serves `/api/chat` at `inference.localEndpoint`
 * (default http://localhost:11434) and takes images as base64 strings on
 * the user message. No API key is needed.
 */

import { PipelineError, invalidResponseError } from '../../domain/errors';
import { isRecord } from '../../domain/values';
import { extractJsonObject } from '../extraction';
import { HttpFetch, HttpResponse } from '../../http';
import { VisionProvider, VisionRequest, failureFromException, failureFromResponse, readJson } from './types';

/** Ollama /api/chat request body. */
interface OllamaChatRequest {
  model: string;
  messages: Array<{ role: string; content: string; images?: string[] }>;
  stream: false;
  format: 'json';
  options: {
    temperature: number;
    num_predict: number;
  };
}

export function createOllamaProvider(fetchImpl: HttpFetch): VisionProvider {
  const service = 'Ollama';
  return {
    id: 'ollama',
    service,

    checkSettings(): void {
      // localEndpoint is already validated as a URL by the schema
    },

    async complete(request: VisionRequest): Promise<string> {
      const baseUrl = request.endpoint.replace(/\/+$/, '');
      const body: OllamaChatRequest = {
        model: request.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt, images: [request.image.toString('base64')] },
        ],
        stream: false,
        format: 'json',
        options: {
          temperature: request.temperature,
          num_predict: request.maxOutputTokens,
        },
      };

      let res: HttpResponse;
      try {
        res = await fetchImpl(`${baseUrl}/api/chat`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(body),
          signal: request.signal,
        });
      } catch (err) {
        throw failureFromException(`${service} (${baseUrl})`, err, []);
      }

      if (!res.ok) {
        throw await failureFromResponse(service, res, []);
      }

      const data = await readJson(service, res);
      const content = isRecord(data) && isRecord(data.message) ? data.message.content : undefined;
      if (typeof content !== 'string') {
        throw new PipelineError(invalidResponseError('Ollama response has no message content', ''));
      }
      return content;
    },

    extract: extractJsonObject,
  };
}
