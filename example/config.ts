/**
 * Agent configuration from the environment.
 *
 * Call `loadEnvFiles()` once at startup to read .env and .env.local, then
 * `loadConfig()` to validate. Tests pass an env object directly.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { formatIssues } from '../patterns/06-tool-validation.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z
  .object({
    PROPOSER: z.enum(['rules', 'mock', 'openrouter']).default('mock'),
    MOCK_SCENARIO: z.enum(['gpuRace', 'quickBuy']).default('gpuRace'),
    OPENROUTER_API_KEY: z.string().min(1).optional(),
    OPENROUTER_MODEL: z.string().min(1).optional(),
    STEP_BUDGET: z.coerce.number().int().positive().default(20),
    SIMULATE_RACE: booleanFlag.default('true'),
    VERBOSE: booleanFlag.default('false'),
    EVENT_LOG_PATH: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.PROPOSER === 'openrouter' && !env.OPENROUTER_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENROUTER_API_KEY'],
        message: 'is required when PROPOSER=openrouter',
      });
    }
  });

export interface AgentConfig {
  proposer: 'rules' | 'mock' | 'openrouter';
  mockScenario: 'gpuRace' | 'quickBuy';
  openRouterApiKey?: string;
  openRouterModel?: string;
  stepBudget: number;
  simulateRace: boolean;
  verbose: boolean;
  eventLogPath?: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadEnvFiles(): void {
  loadDotenv();
  loadDotenv({ path: '.env.local' });
}

/**
 * Validate the environment. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  const values = parsed.data;
  return {
    proposer: values.PROPOSER,
    mockScenario: values.MOCK_SCENARIO,
    openRouterApiKey: values.OPENROUTER_API_KEY,
    openRouterModel: values.OPENROUTER_MODEL,
    stepBudget: values.STEP_BUDGET,
    simulateRace: values.SIMULATE_RACE,
    verbose: values.VERBOSE,
    eventLogPath: values.EVENT_LOG_PATH,
  };
}
