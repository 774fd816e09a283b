/**
 * Request body schemas shared by the route modules.
 */

import { z } from 'zod';
import { inferenceSchema, recordSystemSchema } from '../config/schema';

const dimension = z.number().int().positive();

/** `[w, h]` or `{width, height}` */
export const resolutionSchema = z.union([
  z.tuple([dimension, dimension]).transform(([width, height]) => ({ width, height })),
  z.object({ width: dimension, height: dimension }).strict(),
]);

export const errorCorrectionLevelSchema = z.enum(['L', 'M', 'Q', 'H']);

export const jobOptionsSchema = z
  .object({
    promptTemplate: z.string().optional(),
    templateId: z.string().min(1).optional(),
    categoryId: z.string().min(1).optional(),
    additionalPrompt: z.string().optional(),
    labelProfile: z
      .object({
        errorCorrectionLevel: errorCorrectionLevelSchema.optional(),
        maxVersion: z.number().int().min(1).max(40).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const captureRequestSchema = z
  .object({
    deviceId: z.string().min(1).optional(),
    resolution: resolutionSchema.optional(),
    timeoutMs: z.number().int().positive().optional(),
    /** Submit the capture as a Job. */
    process: z.boolean().default(false),
    /** With `process`, answer once the Job is terminal. */
    wait: z.boolean().default(false),
    options: jobOptionsSchema.optional(),
  })
  .strict();

export const analyzeRequestSchema = z
  .object({
    artifactId: z.string().min(1),
    prompt: z.string().optional(),
    templateId: z.string().min(1).optional(),
    additionalPrompt: z.string().optional(),
  })
  .strict();

const attributesSchema = z.record(z.unknown());
const recordStatusSchema = z.enum(['draft', 'registered', 'labeled']);

export const createRecordSchema = z
  .object({
    idempotencyKey: z.string().min(1),
    title: z.string().min(1),
    body: z.string().optional(),
    categoryId: z.string().min(1).optional(),
    attributes: attributesSchema.default({}),
    tags: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const updateRecordSchema = z
  .object({
    expectedVersion: z.number().int().positive(),
    title: z.string().min(1).optional(),
    body: z.string().optional(),
    attributes: attributesSchema.optional(),
    status: recordStatusSchema.optional(),
    tags: z.array(z.string().min(1)).optional(),
  })
  .strict();

export const generateLabelSchema = z
  .object({
    externalId: z.string().min(1),
    title: z.string().optional(),
    errorCorrectionLevel: errorCorrectionLevelSchema.optional(),
    maxVersion: z.number().int().min(1).max(40).optional(),
    margin: z.number().int().min(0).max(20).optional(),
    scale: z.number().int().min(1).max(50).optional(),
  })
  .strict();

export const submitJobSchema = z
  .object({
    captureArtifactId: z.string().min(1),
    options: jobOptionsSchema.default({}),
    /** Answer once the Job is terminal instead of running it in the background. */
    wait: z.boolean().default(false),
  })
  .strict();

/** Partial section updates; unknown keys are rejected. */
export const inferencePatchSchema = inferenceSchema.partial();
export const recordSystemPatchSchema = recordSystemSchema.partial();

export const configSetSchema = z
  .object({
    path: z.string().min(1),
    value: z.unknown(),
  })
  .strict();
