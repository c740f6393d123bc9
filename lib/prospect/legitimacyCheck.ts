import { extractDomain, normalizeForComparison, type NormalizedTarget } from '../utils';
import type { ValidatorConfig } from './config';
import type { ProspectCheck } from './context';
import { classify, countWords, stripHtml } from './patterns';
import type { FetchResponse, LegitimacyData, LegitimacyResult } from './schemas';
import { LEGITIMACY_DEDUCTION_PER_ISSUE } from './scoreWeightsV1';

export function emptyLegitimacyData(): LegitimacyData {
  return {
    word_count: 0,
    content_length: 0,
    parked: false,
    under_construction: false,
    placeholder: false,
    final_domain: null,
    redirected_to_other_domain: false,
  };
}

export function emptyLegitimacyResult(): LegitimacyResult {
  return { passed: false, score: 0, issues: [], data: emptyLegitimacyData() };
}

/**
 * Parked, under-construction and placeholder pages, thin content and
 * redirects that land on another domain.
 */
export function evaluateLegitimacy(
  response: FetchResponse,
  target: NormalizedTarget,
  config: ValidatorConfig
): LegitimacyResult {
  const content = response.body.toLowerCase();
  const wordCount = countWords(stripHtml(response.body));

  const parked = classify(content, 'parked');
  const construction = classify(content, 'construction');
  const placeholder = classify(content, 'placeholder');

  // Only the final hop is compared; www. differences are not a redirect
  const finalDomain = extractDomain(response.finalUrl) || null;
  const redirected = finalDomain !== null
    && normalizeForComparison(finalDomain) !== normalizeForComparison(target.domain.toLowerCase());

  const issues: string[] = [];
  if (redirected) issues.push(`Redirects to different domain: ${finalDomain}`);
  if (parked) issues.push(parked);
  if (construction) issues.push(construction);
  if (placeholder) issues.push(placeholder);
  if (wordCount < config.minWordCount) issues.push('Low word count');

  return {
    passed: issues.length === 0,
    score: Math.max(0, 100 - issues.length * LEGITIMACY_DEDUCTION_PER_ISSUE),
    issues,
    data: {
      word_count: wordCount,
      content_length: response.body.length,
      parked: parked !== null,
      under_construction: construction !== null,
      placeholder: placeholder !== null,
      final_domain: finalDomain,
      redirected_to_other_domain: redirected,
    },
  };
}

export const legitimacyCheck: ProspectCheck<LegitimacyData> = {
  id: 'legitimacy',
  label: 'Business Legitimacy',
  run: async ({ outcome, target, config }) =>
    outcome.kind === 'response'
      ? evaluateLegitimacy(outcome, target, config)
      : emptyLegitimacyResult(),
};
