/**
 * Configuration schema.
 *
 * One zod object per section. Every key has a default, so an empty file
 * (or a missing one) yields a complete configuration. Unknown keys are
 * rejected.
 */

import { z } from 'zod';
import { PROVIDER_IDS } from '../domain/analysis';

export const inferenceSchema = z
  .object({
    providerId: z.enum(PROVIDER_IDS).default('openai'),
    credential: z.string().default(''),
    model: z.string().min(1).default('gpt-4o'),
    temperature: z.number().min(0).max(2).default(0.2),
    maxOutputTokens: z.number().int().positive().default(1024),
    localEndpoint: z.string().url().default('http://localhost:11434'),
    timeoutMs: z.number().int().positive().default(60_000),
    maxRetries: z.number().int().min(0).max(10).default(2),
    backoffBaseMs: z.number().int().min(0).default(1000),
    backoffCapMs: z.number().int().min(0).default(30_000),
    maxConcurrent: z.number().int().positive().default(2),
    /** Empty means the built-in prompt. */
    promptTemplate: z.string().default(''),
  })
  .strict();

export const recordSystemSchema = z
  .object({
    backend: z.enum(['elabftw', 'memory']).default('elabftw'),
    baseUrl: z.string().url().default('https://localhost/api/v2'),
    credential: z.string().default(''),
    defaultCategory: z.string().min(1).default('1'),
    teamId: z.number().int().positive().default(1),
    verifyTls: z.boolean().default(true),
    timeoutMs: z.number().int().positive().default(30_000),
    maxRetries: z.number().int().min(0).max(10).default(3),
    maxConflictRetries: z.number().int().min(0).max(10).default(3),
    attachImages: z.boolean().default(true),
  })
  .strict();

export const captureSchema = z
  .object({
    deviceId: z.string().min(1).default('default'),
    resolution: z
      .tuple([z.number().int().positive(), z.number().int().positive()])
      .default([1920, 1080]),
    frameRate: z.number().positive().max(240).default(30),
    autoStart: z.boolean().default(false),
    timeoutMs: z.number().int().positive().default(10_000),
    /** Directory the still-image driver serves frames from. */
    sourceDir: z.string().min(1).default('./data/source'),
  })
  .strict();

export const storageSchema = z
  .object({
    imagesDir: z.string().min(1).default('./data/images'),
    labelsDir: z.string().min(1).default('./data/labels'),
    /** What happens to a capture image once its Job is terminal. */
    imageRetention: z.enum(['keep', 'archive', 'delete']).default('keep'),
    archiveDir: z.string().min(1).default('./data/archive'),
  })
  .strict();

export const labelSchema = z
  .object({
    errorCorrectionLevel: z.enum(['L', 'M', 'Q', 'H']).default('M'),
    maxVersion: z.number().int().min(1).max(40).default(10),
    margin: z.number().int().min(0).max(20).default(4),
    scale: z.number().int().min(1).max(50).default(8),
  })
  .strict();

export const pipelineSchema = z
  .object({
    workerLimit: z.number().int().positive().default(2),
    /** Also reject a submit whose image bytes match an active job. */
    dedupByContent: z.boolean().default(false),
  })
  .strict();

export const configSchema = z
  .object({
    inference: inferenceSchema.default({}),
    recordSystem: recordSystemSchema.default({}),
    capture: captureSchema.default({}),
    storage: storageSchema.default({}),
    label: labelSchema.default({}),
    pipeline: pipelineSchema.default({}),
  })
  .strict();

export type Configuration = z.infer<typeof configSchema>;
export type ConfigSection = keyof Configuration;
export type InferenceSettings = Configuration['inference'];
export type RecordSystemSettings = Configuration['recordSystem'];
export type CaptureSettings = Configuration['capture'];
export type StorageSettings = Configuration['storage'];
export type LabelSettings = Configuration['label'];
export type PipelineSettings = Configuration['pipeline'];

export const CONFIG_SECTIONS: readonly ConfigSection[] = [
  'inference',
  'recordSystem',
  'capture',
  'storage',
  'label',
  'pipeline',
];

export function isConfigSection(value: string): value is ConfigSection {
  return CONFIG_SECTIONS.some((section) => section === value);
}

/** A complete configuration with every default applied. */
export function defaultConfiguration(): Configuration {
  return configSchema.parse({});
}

/** Credential values to mask out of messages. */
export function configSecrets(config: Configuration): string[] {
  return [config.inference.credential, config.recordSystem.credential].filter((secret) => secret.length > 0);
}
