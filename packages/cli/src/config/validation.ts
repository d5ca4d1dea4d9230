/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { PartialUcibridgeConfig, UcibridgeConfig } from './schema.js';

/**
 * Milliseconds / counts (non-negative integers)
 */
const millisSchema = z.number().int().min(0);

/**
 * Engine depth schema (1-99)
 */
const depthSchema = z.number().int().min(1).max(99);

/**
 * Engine option values may be written as numbers or booleans in config files
 */
const optionValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const stderrModeSchema = z.enum(['inherit', 'ignore']);

export const outputFormatSchema = z.enum(['text', 'json']);

export const engineConfigSchema = z.object({
  path: z.string().min(1).optional(),
  options: z.record(z.string().min(1), optionValueSchema),
  shutdownTimeoutMs: millisSchema,
  stderr: stderrModeSchema,
});

export const timeControlConfigSchema = z
  .object({
    wtime: millisSchema,
    winc: millisSchema,
    btime: millisSchema,
    binc: millisSchema,
  })
  .partial();

export const searchConfigSchema = z.object({
  depth: depthSchema.optional(),
  movetime: z.number().int().min(1).optional(),
  nodes: z.number().int().min(1).optional(),
  timeControl: timeControlConfigSchema.optional(),
});

export const outputConfigSchema = z.object({
  format: outputFormatSchema,
  verbose: z.boolean(),
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  search: searchConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment)
 */
export const partialConfigSchema = z.object({
  engine: engineConfigSchema.partial().optional(),
  search: searchConfigSchema.optional(),
  output: outputConfigSchema.partial().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): UcibridgeConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialUcibridgeConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
