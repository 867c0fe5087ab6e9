import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const docsConfigSchema = z.object({
  pluginsDir: z.string().min(1).default('plugins'),
  outputFile: z.string().min(1).default('plugins.md'),
  repositoryUrl: z.string().url().default('https://github.com/triyanox/lla'),
  sortDirectories: z.boolean().default(true),
  readmeLinks: z.boolean().default(false),
  logging: loggingConfigSchema.default({}),
});
