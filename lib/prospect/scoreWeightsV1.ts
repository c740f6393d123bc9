/**
 * Score Weights V1 - Deterministic scoring weights for prospect validation
 *
 * Every check scores on a 0-100 scale. Health, SEO, Contactability and
 * Maturity add credit for each signal present; Legitimacy starts at 100 and
 * deducts per issue. The overall score is a convex combination of the five.
 */

// =============================================================================
// Health: response-time tiers (first tier whose limit exceeds the latency)
// =============================================================================

export const HEALTH_TIERS = [
  { below_ms: 500, score: 100 },
  { below_ms: 1000, score: 90 },
  { below_ms: 2000, score: 75 },
] as const;

export const HEALTH_SLOW_TIER_SCORE = 50;   // Below config.slowResponseMs
export const HEALTH_SLOWEST_SCORE = 25;     // At or above config.slowResponseMs

// =============================================================================
// Legitimacy
// =============================================================================

export const LEGITIMACY_DEDUCTION_PER_ISSUE = 25;

// =============================================================================
// SEO Weights (sum to 100)
// =============================================================================

export const SEO_WEIGHTS = {
  has_title: 15,
  has_meta_description: 10,
  single_h1: 10,
  has_https: 15,
  has_viewport: 10,
  has_og_tags: 5,
  has_canonical: 5,
  has_structured_data: 10,
  has_robots_txt: 5,
  has_sitemap: 5,
  has_compression: 10,
} as const;

export const IDEAL_TITLE_LENGTH = { min: 30, max: 60 } as const;
export const IDEAL_DESCRIPTION_LENGTH = { min: 120, max: 160 } as const;
export const MAX_IMAGES_WITHOUT_ALT = 3;

// =============================================================================
// Contactability Weights
// =============================================================================

export const CONTACT_WEIGHTS = {
  has_email: 35,
  has_phone: 25,
  per_social_profile: 7,
  max_social: 20,
  linkedin_bonus: 10,
} as const;

// =============================================================================
// Maturity Weights (sum to 100)
// =============================================================================

export const MATURITY_WEIGHTS = {
  has_ssl: 30,
  has_mx_records: 25,
  per_technology: 5,
  max_technology: 25,
  business_tools: 20,
} as const;

// =============================================================================
// Overall Score Formula
// =============================================================================

/**
 * overall = round(0.10 * health + 0.25 * legitimacy + 0.15 * seo
 *               + 0.30 * contactability + 0.20 * maturity)
 */
export const OVERALL_WEIGHTS = {
  health: 0.1,
  legitimacy: 0.25,
  seo: 0.15,
  contactability: 0.3,
  maturity: 0.2,
} as const;
