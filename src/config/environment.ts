import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvironmentSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  AI_INTENT_ENABLED: booleanFlag,
  AI_RERANK_ENABLED: booleanFlag,
  AI_EXTRACTION_ENABLED: booleanFlag,
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),

  DATABASE_URL: z.string().optional(),
  DB_HOST: z.string().optional(),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_SSL: booleanFlag,
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  MAX_WORKFLOW_DEPTH: z.coerce.number().int().min(1).max(20).default(5),
  MAX_STEPS_PER_TURN: z.coerce.number().int().min(1).default(25),
});

export type Environment = z.output<typeof EnvironmentSchema>;

/**
 * Parse and validate environment variables. Empty strings count as unset.
 */
export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvironmentSchema.safeParse(cleaned);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid environment configuration: ${keys}`);
  }
  return parsed.data;
}

export const ENVIRONMENT: Readonly<Environment> = Object.freeze(loadEnvironment());
