import { z } from 'zod';

export const ArtifactValueSchema = z.object({
  digest: z.record(z.string()).optional(),
  uri: z.string().optional(),
});

export const ArtifactSchema = z.object({
  name: z.string(),
  values: z.array(ArtifactValueSchema).default([]),
  buildOutput: z.boolean().optional(),
});

export const ArtifactsSchema = z.object({
  inputs: z.array(ArtifactSchema).optional(),
  outputs: z.array(ArtifactSchema).optional(),
});
