import 'dotenv/config';
import { z } from 'zod';
import { generateAccount } from './accounts';
import type { LogLevel } from './logger';
import { account, uint } from './schemas';

const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ENGINE_ACCOUNT: optional(account),
  OWNER_ACCOUNT: optional(account),
  STAKE_ACTIVE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  REWARD_POOL: uint.default('2000000000000000000000'), // 2000 KVS
  WITHDRAWAL_DELAY_SECONDS: uint.default('604800'),
  SEED_STAKER: optional(account),
});

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  engineAccount: string;
  ownerAccount: string;
  stakeActive: boolean;
  rewardPool: bigint;
  withdrawalDelay: bigint;
  seedStaker?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${issues}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    engineAccount: values.ENGINE_ACCOUNT ?? generateAccount(),
    ownerAccount: values.OWNER_ACCOUNT ?? generateAccount(),
    stakeActive: values.STAKE_ACTIVE,
    rewardPool: values.REWARD_POOL,
    withdrawalDelay: values.WITHDRAWAL_DELAY_SECONDS,
    seedStaker: values.SEED_STAKER,
  };
}
