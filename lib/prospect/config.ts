import { z } from 'zod';

// =============================================================================
// Validator Configuration Schema
// =============================================================================

export const ValidatorConfigSchema = z.object({
  userAgent: z.string().min(1).default('Mozilla/5.0 (compatible; ProspectValidator/1.0)'),
  acceptEncoding: z.string().default('gzip, deflate, br'),

  // Timeouts per call class
  requestTimeoutMs: z.number().int().min(1000).max(60000).default(15000),
  healthTimeoutMs: z.number().int().min(500).max(60000).default(5000),
  probeTimeoutMs: z.number().int().min(500).max(30000).default(3000),
  contactPageTimeoutMs: z.number().int().min(1000).max(60000).default(10000),
  tlsTimeoutMs: z.number().int().min(500).max(30000).default(5000),
  dnsTimeoutMs: z.number().int().min(500).max(30000).default(5000),
  registrationTimeoutMs: z.number().int().min(1000).max(60000).default(10000),

  maxRedirects: z.number().int().nonnegative().default(10),
  maxBodyBytes: z.number().int().positive().default(512 * 1024),

  // Thresholds
  minWordCount: z.number().int().nonnegative().default(50),
  slowResponseMs: z.number().int().positive().default(3000),
  seoPassScore: z.number().int().min(0).max(100).default(50),
  maturityPassScore: z.number().int().min(0).max(100).default(40),
  overallPassScore: z.number().int().min(0).max(100).default(50),
  maxEmails: z.number().int().positive().default(10),
  maxPhones: z.number().int().positive().default(5),
});

export type ValidatorConfig = Readonly<z.infer<typeof ValidatorConfigSchema>>;
export type ValidatorConfigInput = z.input<typeof ValidatorConfigSchema>;

/**
 * Parse and freeze a configuration. Throws a ZodError on invalid values.
 */
export function loadConfig(input: ValidatorConfigInput = {}): ValidatorConfig {
  return Object.freeze(ValidatorConfigSchema.parse(input));
}

export const DEFAULT_CONFIG: ValidatorConfig = loadConfig();

// Environment variable -> config key
const ENV_KEYS = {
  PROSPECT_USER_AGENT: 'userAgent',
  PROSPECT_REQUEST_TIMEOUT_MS: 'requestTimeoutMs',
  PROSPECT_HEALTH_TIMEOUT_MS: 'healthTimeoutMs',
  PROSPECT_PROBE_TIMEOUT_MS: 'probeTimeoutMs',
  PROSPECT_CONTACT_TIMEOUT_MS: 'contactPageTimeoutMs',
  PROSPECT_TLS_TIMEOUT_MS: 'tlsTimeoutMs',
  PROSPECT_DNS_TIMEOUT_MS: 'dnsTimeoutMs',
  PROSPECT_REGISTRATION_TIMEOUT_MS: 'registrationTimeoutMs',
} as const;

/**
 * Build a configuration from environment variables; unset variables keep defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ValidatorConfig {
  const input: ValidatorConfigInput = {};

  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value === undefined || value.trim() === '') continue;

    if (configKey === 'userAgent') {
      input.userAgent = value.trim();
    } else {
      input[configKey] = Number(value);
    }
  }

  return loadConfig(input);
}
