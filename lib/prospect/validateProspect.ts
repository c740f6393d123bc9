/**
 * Prospect Validator - runs the five checks against one URL and folds
 * them into a single flat CompositeResult.
 *
 * The main page is fetched exactly once. A transport failure or an HTTP
 * error status stops the run after Health; every other check then reports
 * its zero state.
 */

import { fetchPage } from '../fetchLayer';
import { normalizeTarget } from '../utils';
import { loadConfig, type ValidatorConfig, type ValidatorConfigInput } from './config';
import { contactabilityCheck, emptyContactabilityResult } from './contactabilityCheck';
import type { CheckContext, ProspectCheck, ValidatorDeps } from './context';
import { emptyHealthResult, evaluateHealth, healthCheck } from './healthCheck';
import { emptyLegitimacyResult, legitimacyCheck } from './legitimacyCheck';
import { emptyMaturityResult, maturityCheck } from './maturityCheck';
import { lookupMx } from './mxLookup';
import { detectTechnologies } from './patterns';
import { lookupRegistration } from './registrationLookup';
import type {
  CheckResult,
  CompositeResult,
  ContactabilityResult,
  HealthResult,
  LegitimacyResult,
  MaturityResult,
  SeoResult,
} from './schemas';
import { OVERALL_WEIGHTS } from './scoreWeightsV1';
import { emptySeoResult, seoCheck } from './seoCheck';
import { probeTls } from './tlsProbe';

export interface QuickHealthResult {
  url_checked: string | null;
  health: HealthResult;
}

export interface ProspectValidator {
  config: ValidatorConfig;
  validate(raw: string | null | undefined): Promise<Readonly<CompositeResult>>;
  quickHealthCheck(raw: string | null | undefined): Promise<QuickHealthResult>;
}

interface CheckResults {
  health: HealthResult;
  legitimacy: LegitimacyResult;
  seo: SeoResult;
  contactability: ContactabilityResult;
  maturity: MaturityResult;
}

const DEFAULT_DEPS: ValidatorDeps = {
  fetchPage,
  probeTls,
  lookupMx,
  lookupRegistration,
  now: () => new Date(),
};

const INVALID_INPUT_ISSUES = {
  empty: 'No URL provided',
  unparsable: 'Invalid URL',
} as const;

// =============================================================================
// Composite Assembly
// =============================================================================

export function computeOverallScore(results: CheckResults): number {
  const weighted =
    OVERALL_WEIGHTS.health * results.health.score +
    OVERALL_WEIGHTS.legitimacy * results.legitimacy.score +
    OVERALL_WEIGHTS.seo * results.seo.score +
    OVERALL_WEIGHTS.contactability * results.contactability.score +
    OVERALL_WEIGHTS.maturity * results.maturity.score;

  return Math.max(0, Math.min(100, Math.round(weighted)));
}

function buildComposite(
  urlChecked: string | null,
  results: CheckResults,
  overallPassScore: number
): Readonly<CompositeResult> {
  const overallScore = computeOverallScore(results);

  return Object.freeze({
    url_checked: urlChecked,

    health_passed: results.health.passed,
    health_score: results.health.score,
    health_issues: results.health.issues,
    health_data: results.health.data,

    legitimacy_passed: results.legitimacy.passed,
    legitimacy_score: results.legitimacy.score,
    legitimacy_issues: results.legitimacy.issues,
    legitimacy_data: results.legitimacy.data,

    seo_passed: results.seo.passed,
    seo_score: results.seo.score,
    seo_issues: results.seo.issues,
    seo_data: results.seo.data,

    contactability_passed: results.contactability.passed,
    contactability_score: results.contactability.score,
    contactability_issues: results.contactability.issues,
    contactability_data: results.contactability.data,

    maturity_passed: results.maturity.passed,
    maturity_score: results.maturity.score,
    maturity_issues: results.maturity.issues,
    maturity_data: results.maturity.data,

    overall_score: overallScore,
    overall_passed:
      results.health.passed &&
      results.legitimacy.passed &&
      results.contactability.passed &&
      overallScore >= overallPassScore,
  });
}

function zeroResults(health: HealthResult): CheckResults {
  return {
    health,
    legitimacy: emptyLegitimacyResult(),
    seo: emptySeoResult(),
    contactability: emptyContactabilityResult(),
    maturity: emptyMaturityResult(),
  };
}

/**
 * Run one check, turning an unexpected fault into an issue on that check only.
 */
async function runCheckSafely<TData>(
  check: ProspectCheck<TData>,
  context: CheckContext,
  fallback: () => CheckResult<TData>
): Promise<CheckResult<TData>> {
  try {
    return await check.run(context);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`[Validator] ${check.label} check failed for ${context.target.url}: ${message}`);

    const result = fallback();
    return { ...result, issues: [...result.issues, `Check failed: ${message}`] };
  }
}

// =============================================================================
// Validator Factory
// =============================================================================

export function createProspectValidator(
  configInput: ValidatorConfigInput = {},
  deps: Partial<ValidatorDeps> = {}
): ProspectValidator {
  const config = loadConfig(configInput);
  const resolvedDeps: ValidatorDeps = { ...DEFAULT_DEPS, ...deps };

  async function validate(raw: string | null | undefined): Promise<Readonly<CompositeResult>> {
    const target = normalizeTarget(raw);

    if (!target.valid) {
      return buildComposite(
        target.url,
        zeroResults(emptyHealthResult([INVALID_INPUT_ISSUES[target.reason]])),
        config.overallPassScore
      );
    }

    console.error(`[Validator] Validating ${target.url}`);

    const outcome = await resolvedDeps.fetchPage(target.url, {
      method: 'GET',
      timeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
      acceptEncoding: config.acceptEncoding,
      maxRedirects: config.maxRedirects,
      maxBodyBytes: config.maxBodyBytes,
    });

    const context: CheckContext = {
      outcome: Object.freeze(outcome),
      target,
      config,
      deps: resolvedDeps,
      technologies: outcome.kind === 'response'
        ? Object.freeze(detectTechnologies(outcome.headers, outcome.body))
        : undefined,
    };

    const health = await runCheckSafely(healthCheck, context, () => emptyHealthResult());

    if (outcome.kind === 'error' || outcome.statusCode >= 400) {
      console.error(`[Validator] ${target.url} unreachable (${health.issues.join(', ')}), skipping content checks`);
      return buildComposite(target.url, zeroResults(health), config.overallPassScore);
    }

    // Sequential: each check may issue its own requests
    const legitimacy = await runCheckSafely(legitimacyCheck, context, emptyLegitimacyResult);
    const seo = await runCheckSafely(seoCheck, context, emptySeoResult);
    const contactability = await runCheckSafely(contactabilityCheck, context, emptyContactabilityResult);
    const maturity = await runCheckSafely(maturityCheck, context, emptyMaturityResult);

    const composite = buildComposite(
      target.url,
      { health, legitimacy, seo, contactability, maturity },
      config.overallPassScore
    );

    console.error(`[Validator] ${target.url}: overall ${composite.overall_score} (${composite.overall_passed ? 'passed' : 'failed'})`);
    return composite;
  }

  /**
   * Reachability only: HEAD with a GET fallback on 405, short timeout.
   */
  async function quickHealthCheck(raw: string | null | undefined): Promise<QuickHealthResult> {
    const target = normalizeTarget(raw);

    if (!target.valid) {
      return {
        url_checked: target.url,
        health: emptyHealthResult([INVALID_INPUT_ISSUES[target.reason]]),
      };
    }

    const outcome = await resolvedDeps.fetchPage(target.url, {
      method: 'HEAD',
      fallbackToGet: true,
      timeoutMs: config.healthTimeoutMs,
      userAgent: config.userAgent,
      acceptEncoding: config.acceptEncoding,
      maxRedirects: config.maxRedirects,
      maxBodyBytes: config.maxBodyBytes,
    });

    return { url_checked: target.url, health: evaluateHealth(outcome, config) };
  }

  return { config, validate, quickHealthCheck };
}

const defaultValidator = createProspectValidator();

/**
 * Validate one prospect URL with the default configuration.
 */
export function validateProspect(raw: string | null | undefined): Promise<Readonly<CompositeResult>> {
  return defaultValidator.validate(raw);
}
