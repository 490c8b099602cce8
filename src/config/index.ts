/**
 * Configuration Module
 *
 * Reads API credentials, tuning values and feature flags from the environment
 * into one frozen snapshot. Missing credentials are reported as warnings here;
 * the client that needs one fails at construction through requireCredential().
 */

import { z } from 'zod';
import { createLogger, type Logger, type LogLevel } from '../logging/index.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * A required setting is absent or invalid. Fatal for the current run.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Schema
// ============================================================================

export const DEFAULT_DATABASE_PATH = 'content_pipeline.db';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_PERPLEXITY_MODEL = 'sonar-pro';

export const SOCIAL_SEARCH_TYPES = ['Top', 'Latest', 'People', 'Photos', 'Videos'] as const;
export type SocialSearchType = (typeof SOCIAL_SEARCH_TYPES)[number];

export type CredentialName = 'perplexity' | 'anthropic' | 'rapidApi' | 'typefully';

export const CREDENTIAL_ENV_KEYS: Readonly<Record<CredentialName, string>> = {
  perplexity: 'PERPLEXITY_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  rapidApi: 'RAPIDAPI_API_KEY',
  typefully: 'TYPEFULLY_API_KEY',
};

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

function textWithDefault(defaultValue: string) {
  return z.preprocess(blankToUndefined, z.string().trim().min(1).default(defaultValue));
}

function booleanFlag(defaultValue: boolean) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .toLowerCase()
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) return defaultValue;
        if (TRUE_VALUES.has(value)) return true;
        if (FALSE_VALUES.has(value)) return false;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, received "${value}"` });
        return z.NEVER;
      })
  );
}

const EnvSchema = z.object({
  PERPLEXITY_API_KEY: optionalText,
  ANTHROPIC_API_KEY: optionalText,
  RAPIDAPI_API_KEY: optionalText,
  TYPEFULLY_API_KEY: optionalText,
  DATABASE_PATH: textWithDefault(DEFAULT_DATABASE_PATH),
  ANTHROPIC_MODEL: textWithDefault(DEFAULT_ANTHROPIC_MODEL),
  PERPLEXITY_MODEL: textWithDefault(DEFAULT_PERPLEXITY_MODEL),
  SOCIAL_SEARCH_COUNT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(100).default(20)),
  SOCIAL_SEARCH_TYPE: z.preprocess(blankToUndefined, z.enum(SOCIAL_SEARCH_TYPES).default('Top')),
  PRODUCT_FEATURES_PATH: optionalText,
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  ),
  RUN_RESEARCH: booleanFlag(true),
  RUN_SOCIAL_SEARCH: booleanFlag(true),
  REUSE_LATEST_SESSION: booleanFlag(true),
  FORCE_NEW_SESSION: booleanFlag(false),
});

// ============================================================================
// Snapshot
// ============================================================================

export interface FeatureFlags {
  runResearch: boolean;
  runSocialSearch: boolean;
  reuseLatestSession: boolean;
  /** Wins over reuseLatestSession */
  forceNewSession: boolean;
}

export interface AppConfig {
  readonly credentials: Readonly<Record<CredentialName, string | undefined>>;
  readonly databasePath: string;
  readonly models: Readonly<{ anthropic: string; perplexity: string }>;
  readonly socialSearch: Readonly<{ count: number; type: SocialSearchType }>;
  readonly productFeaturesPath: string | undefined;
  readonly flags: Readonly<FeatureFlags>;
  readonly logLevel: LogLevel;
}

/**
 * Validate the environment and return a frozen configuration snapshot.
 *
 * @throws ConfigurationError when a value is present but invalid
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = createLogger('config')
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues[0]?.split(':')[0]);
  }

  const values = parsed.data;
  const credentials: Record<CredentialName, string | undefined> = {
    perplexity: values.PERPLEXITY_API_KEY,
    anthropic: values.ANTHROPIC_API_KEY,
    rapidApi: values.RAPIDAPI_API_KEY,
    typefully: values.TYPEFULLY_API_KEY,
  };

  for (const [name, envKey] of Object.entries(CREDENTIAL_ENV_KEYS)) {
    if (!env[envKey]?.trim()) {
      logger.warn('Credential not set', { credential: name, envKey });
    }
  }

  return Object.freeze({
    credentials: Object.freeze(credentials),
    databasePath: values.DATABASE_PATH,
    models: Object.freeze({ anthropic: values.ANTHROPIC_MODEL, perplexity: values.PERPLEXITY_MODEL }),
    socialSearch: Object.freeze({ count: values.SOCIAL_SEARCH_COUNT, type: values.SOCIAL_SEARCH_TYPE }),
    productFeaturesPath: values.PRODUCT_FEATURES_PATH,
    flags: Object.freeze({
      runResearch: values.RUN_RESEARCH,
      runSocialSearch: values.RUN_SOCIAL_SEARCH,
      reuseLatestSession: values.REUSE_LATEST_SESSION,
      forceNewSession: values.FORCE_NEW_SESSION,
    }),
    logLevel: values.LOG_LEVEL,
  });
}

/**
 * Return a credential or throw. Client factories call this so that a missing
 * key fails the client's construction, not its first request.
 */
export function requireCredential(config: AppConfig, name: CredentialName): string {
  const value = config.credentials[name];
  if (!value) {
    const envKey = CREDENTIAL_ENV_KEYS[name];
    throw new ConfigurationError(`${envKey} is not set`, envKey);
  }
  return value;
}
