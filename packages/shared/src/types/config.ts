/**
 * Runtime Configuration Schema
 *
 * Settings of the runtime itself, independent of any extension's own
 * configuration (which arrives from the gateway as JSON).
 */

import { z } from 'zod';

// File paths must not escape their directory
const SafePathSchema = z.string()
  .min(1)
  .max(4096)
  .refine(
    (path) => !path.includes('..') && !path.includes('\0'),
    { message: 'Path contains forbidden characters' }
  );

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogOutputSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('file'),
    path: SafePathSchema,
  }),
  z.object({
    type: z.literal('stdout'),
    format: z.enum(['json', 'pretty']).default('json'),
  }),
]);

export type LogOutput = z.infer<typeof LogOutputSchema>;

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  output: z.array(LogOutputSchema).default([{ type: 'stdout', format: 'json' }]),
}).default({});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const RuntimeConfigSchema = z.object({
  logging: LoggingConfigSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export const PartialRuntimeConfigSchema = z.object({
  logging: z.object({
    level: LogLevelSchema.optional(),
    output: z.array(LogOutputSchema).optional(),
  }).optional(),
});

export type PartialRuntimeConfig = z.infer<typeof PartialRuntimeConfigSchema>;
