/**
 * Closed set of vision providers, selected by `inference.providerId`.
 */

import { ProviderId } from '../../domain/analysis';
import { HttpFetch } from '../../http';
import { createAnthropicProvider } from './anthropic';
import { createOllamaProvider } from './ollama';
import { createOpenAIProvider } from './openai';
import { VisionProvider } from './types';

export type { VisionProvider, VisionRequest } from './types';
export { supportsVision, OPENAI_VISION_MODELS } from './openai';

export function createProvider(id: ProviderId, fetchImpl: HttpFetch): VisionProvider {
  switch (id) {
    case 'openai':
      return createOpenAIProvider(fetchImpl);
    case 'anthropic':
      return createAnthropicProvider(fetchImpl);
    case 'ollama':
      return createOllamaProvider(fetchImpl);
  }
}
