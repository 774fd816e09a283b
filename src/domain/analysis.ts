/**
 * Analysis domain model.
 */

/** Inference providers the engine can dispatch to. */
export const PROVIDER_IDS = ['openai', 'anthropic', 'ollama'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

/** JSON-compatible attribute value extracted from a provider response. */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue };

export type Attributes = Record<string, AttributeValue>;

export interface AnalysisResult {
  attributes: Attributes;
  /** 0..1 */
  confidence: number;
  rawProviderOutput: string;
  providerId: ProviderId;
  model: string;
  analyzedAt: string;
  /** Provider attempts used, including retries. */
  attempts: number;
}
