import { z } from 'zod';

// =============================================================================
// Check Names
// =============================================================================

export const CheckNameSchema = z.enum([
  'health',
  'legitimacy',
  'seo',
  'contactability',
  'maturity',
]);

export type CheckName = z.infer<typeof CheckNameSchema>;

// =============================================================================
// Fetch Outcome
// =============================================================================

export const FetchErrorKindSchema = z.enum([
  'timeout',
  'tls-error',
  'connection-failed',
  'too-many-redirects',
  'other',
]);

export type FetchErrorKind = z.infer<typeof FetchErrorKindSchema>;

export const FetchResponseSchema = z.object({
  kind: z.literal('response'),
  url: z.string(),
  finalUrl: z.string(), // After redirects
  method: z.enum(['GET', 'HEAD']),
  statusCode: z.number().int(),
  elapsedMs: z.number().int().nonnegative(),
  headers: z.record(z.string(), z.string()), // Lower-cased keys
  body: z.string(),
  bodyBytes: z.number().int().nonnegative(),
});

export const FetchFailureSchema = z.object({
  kind: z.literal('error'),
  url: z.string(),
  finalUrl: z.string(),
  method: z.enum(['GET', 'HEAD']),
  elapsedMs: z.number().int().nonnegative(),
  errorKind: FetchErrorKindSchema,
  errorMessage: z.string(),
});

export const FetchOutcomeSchema = z.discriminatedUnion('kind', [
  FetchResponseSchema,
  FetchFailureSchema,
]);

export type FetchResponse = z.infer<typeof FetchResponseSchema>;
export type FetchFailure = z.infer<typeof FetchFailureSchema>;
export type FetchOutcome = z.infer<typeof FetchOutcomeSchema>;

// =============================================================================
// A) Health
// =============================================================================

export const HealthDataSchema = z.object({
  status_code: z.number().int().nullable(),
  response_time_ms: z.number().int().nullable(),
  final_url: z.string().nullable(),
  error_kind: FetchErrorKindSchema.nullable(),
  method: z.enum(['GET', 'HEAD']).nullable(),
});

export type HealthData = z.infer<typeof HealthDataSchema>;

// =============================================================================
// B) Legitimacy
// =============================================================================

export const LegitimacyDataSchema = z.object({
  word_count: z.number().int(),
  content_length: z.number().int(),
  parked: z.boolean(),
  under_construction: z.boolean(),
  placeholder: z.boolean(),
  final_domain: z.string().nullable(),
  redirected_to_other_domain: z.boolean(),
});

export type LegitimacyData = z.infer<typeof LegitimacyDataSchema>;

// =============================================================================
// C) SEO
// =============================================================================

export const SeoDataSchema = z.object({
  title: z.string().nullable(),
  title_length: z.number().int(),
  description: z.string().nullable(),
  description_length: z.number().int(),
  h1_count: z.number().int(),
  h1_text: z.string().nullable(),
  has_title: z.boolean(),
  has_meta_description: z.boolean(),
  has_h1: z.boolean(),
  has_https: z.boolean(),
  has_viewport: z.boolean(),
  has_og_tags: z.boolean(),
  has_canonical: z.boolean(),
  has_structured_data: z.boolean(),
  has_robots_txt: z.boolean(),
  has_sitemap: z.boolean(),
  has_compression: z.boolean(),
  images_with_alt: z.number().int(),
  images_without_alt: z.number().int(),
  response_time_ms: z.number().int().nullable(),
  page_size_kb: z.number().nullable(),
});

export type SeoData = z.infer<typeof SeoDataSchema>;

// =============================================================================
// D) Contactability
// =============================================================================

export const SocialPlatformSchema = z.enum([
  'linkedin',
  'twitter',
  'facebook',
  'instagram',
  'youtube',
  'github',
]);

export type SocialPlatform = z.infer<typeof SocialPlatformSchema>;

export const SocialLinksSchema = z.record(SocialPlatformSchema, z.string());
export type SocialLinks = Partial<Record<SocialPlatform, string>>;

export const ContactabilityDataSchema = z.object({
  emails: z.array(z.string()).max(10),
  phones: z.array(z.string()).max(5),
  social_links: SocialLinksSchema,
  contact_page_url: z.string().nullable(),
  has_contact_page: z.boolean(),
});

export type ContactabilityData = z.infer<typeof ContactabilityDataSchema>;

// =============================================================================
// E) Maturity
// =============================================================================

export const MaturityDataSchema = z.object({
  has_ssl: z.boolean(),
  ssl_issuer: z.string().nullable(),
  ssl_expiry_days: z.number().int().nullable(),
  has_mx_records: z.boolean(),
  mx_records: z.array(z.string()),
  tech_stack: z.array(z.string()),
  business_tools: z.array(z.string()),
  domain_age_days: z.number().int().nullable(), // Informational, not scored
});

export type MaturityData = z.infer<typeof MaturityDataSchema>;

// =============================================================================
// Check Result (uniform per-check record)
// =============================================================================

export interface CheckResult<TData> {
  passed: boolean;
  score: number;
  issues: string[];
  data: TData;
}

export type HealthResult = CheckResult<HealthData>;
export type LegitimacyResult = CheckResult<LegitimacyData>;
export type SeoResult = CheckResult<SeoData>;
export type ContactabilityResult = CheckResult<ContactabilityData>;
export type MaturityResult = CheckResult<MaturityData>;

// =============================================================================
// Composite Result (output of validateProspect)
// =============================================================================

export const CompositeResultSchema = z.object({
  url_checked: z.string().nullable(),

  health_passed: z.boolean(),
  health_score: z.number().int().min(0).max(100),
  health_issues: z.array(z.string()),
  health_data: HealthDataSchema,

  legitimacy_passed: z.boolean(),
  legitimacy_score: z.number().int().min(0).max(100),
  legitimacy_issues: z.array(z.string()),
  legitimacy_data: LegitimacyDataSchema,

  seo_passed: z.boolean(),
  seo_score: z.number().int().min(0).max(100),
  seo_issues: z.array(z.string()),
  seo_data: SeoDataSchema,

  contactability_passed: z.boolean(),
  contactability_score: z.number().int().min(0).max(100),
  contactability_issues: z.array(z.string()),
  contactability_data: ContactabilityDataSchema,

  maturity_passed: z.boolean(),
  maturity_score: z.number().int().min(0).max(100),
  maturity_issues: z.array(z.string()),
  maturity_data: MaturityDataSchema,

  overall_score: z.number().int().min(0).max(100),
  overall_passed: z.boolean(),
});

export type CompositeResult = z.infer<typeof CompositeResultSchema>;

// =============================================================================
// Batch Items
// =============================================================================

export const ProspectItemSchema = z.record(z.string(), z.unknown());
export type ProspectItem = z.infer<typeof ProspectItemSchema>;

export const ProspectItemListSchema = z.array(ProspectItemSchema);
