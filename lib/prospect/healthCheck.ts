import type { ValidatorConfig } from './config';
import type { ProspectCheck } from './context';
import type { FetchErrorKind, FetchOutcome, HealthData, HealthResult } from './schemas';
import { HEALTH_SLOWEST_SCORE, HEALTH_SLOW_TIER_SCORE, HEALTH_TIERS } from './scoreWeightsV1';

const ERROR_ISSUES: Record<FetchErrorKind, string> = {
  'timeout': 'Request timeout',
  'tls-error': 'SSL error',
  'connection-failed': 'Connection failed',
  'too-many-redirects': 'Too many redirects',
  'other': 'Error',
};

export function describeFetchError(kind: FetchErrorKind, message: string): string {
  return kind === 'other' ? `${ERROR_ISSUES.other}: ${message}` : ERROR_ISSUES[kind];
}

export function emptyHealthData(): HealthData {
  return {
    status_code: null,
    response_time_ms: null,
    final_url: null,
    error_kind: null,
    method: null,
  };
}

export function emptyHealthResult(issues: string[] = []): HealthResult {
  return { passed: false, score: 0, issues, data: emptyHealthData() };
}

function scoreResponseTime(elapsedMs: number, config: ValidatorConfig): number {
  for (const tier of HEALTH_TIERS) {
    if (elapsedMs < tier.below_ms) return tier.score;
  }
  return elapsedMs < config.slowResponseMs ? HEALTH_SLOW_TIER_SCORE : HEALTH_SLOWEST_SCORE;
}

/**
 * Reachability from status code and elapsed time only.
 */
export function evaluateHealth(outcome: FetchOutcome, config: ValidatorConfig): HealthResult {
  if (outcome.kind === 'error') {
    return {
      passed: false,
      score: 0,
      issues: [describeFetchError(outcome.errorKind, outcome.errorMessage)],
      data: {
        ...emptyHealthData(),
        response_time_ms: outcome.elapsedMs,
        final_url: outcome.finalUrl,
        error_kind: outcome.errorKind,
        method: outcome.method,
      },
    };
  }

  const data: HealthData = {
    status_code: outcome.statusCode,
    response_time_ms: outcome.elapsedMs,
    final_url: outcome.finalUrl,
    error_kind: null,
    method: outcome.method,
  };

  if (outcome.statusCode >= 400) {
    return { passed: false, score: 0, issues: [`HTTP ${outcome.statusCode}`], data };
  }

  const issues: string[] = [];
  if (outcome.elapsedMs >= config.slowResponseMs) {
    issues.push(`Slow response: ${outcome.elapsedMs}ms`);
  }

  return {
    passed: data.status_code !== null && data.status_code < 400,
    score: scoreResponseTime(outcome.elapsedMs, config),
    issues,
    data,
  };
}

export const healthCheck: ProspectCheck<HealthData> = {
  id: 'health',
  label: 'URL Health',
  run: async ({ outcome, config }) => evaluateHealth(outcome, config),
};
