/**
 * Environment schema
 *
 * All environment variables the services layer reads, validated once with zod.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const loggingEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  NODE_ENV: z.string().optional(),
});

export type LoggingEnv = z.infer<typeof loggingEnvSchema>;

export const evmEnvSchema = z.object({
  /** JSON-RPC endpoint used for ERC-20 metadata reads */
  EVM_RPC_URL: z.string().url().optional(),

  /** Chain id of the execution environment (595 = Mandala testnet) */
  EVM_CHAIN_ID: z.coerce.number().int().positive().default(595),
});

export type EvmEnv = z.infer<typeof evmEnvSchema>;

/**
 * Error thrown when environment variables fail validation
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse an environment record against a schema
 *
 * @throws ConfigError listing every invalid variable
 */
export function parseEnv<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  env: Record<string, string | undefined>
): z.infer<TSchema> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${summary}`, result.error.issues);
  }
  return result.data;
}
