import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { INVITE_DAYS_VALIDITY } from '@tenantry/core';

// Helper to convert empty strings to undefined
const emptyToUndefined = (val: string | undefined) =>
  val === '' || val === undefined ? undefined : val;

const configSchema = z.object({
  databaseUrl: z.string().min(1).default('postgresql://localhost/tenantry'),

  // Base URL used to build invite signup links
  siteUrl: z.string().url().default('http://localhost:8000'),

  inviteDaysValidity: z.coerce.number().int().positive().default(INVITE_DAYS_VALIDITY),

  // cloud: billing is attached per organization; self-hosted: instance licenses only
  billingMode: z.enum(['cloud', 'self-hosted']).default('self-hosted'),

  logLevel: z.enum(['info', 'warn', 'error', 'silent']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = configSchema.safeParse({
    databaseUrl: emptyToUndefined(env.DATABASE_URL),
    siteUrl: emptyToUndefined(env.SITE_URL),
    inviteDaysValidity: emptyToUndefined(env.INVITE_DAYS_VALIDITY),
    billingMode: emptyToUndefined(env.BILLING_MODE),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
  });

  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration error: ${problems}`);
  }

  return result.data;
}

export function loadConfig(): Config {
  loadEnv();
  return parseConfig(process.env);
}
