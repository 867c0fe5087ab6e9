import { z } from 'zod';

export const pluginManifestSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

// Only the [package] table matters; dependencies, lib and the rest pass through.
export const cargoManifestSchema = z.object({
  package: pluginManifestSchema,
});
