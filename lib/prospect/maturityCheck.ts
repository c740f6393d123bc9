import { differenceInDays } from 'date-fns';
import type { CheckContext, ProspectCheck } from './context';
import { BUSINESS_TOOLS, detectTechnologies } from './patterns';
import type { MaturityData, MaturityResult } from './schemas';
import { MATURITY_WEIGHTS } from './scoreWeightsV1';
import type { TlsCertificateInfo } from './tlsProbe';

export function emptyMaturityData(): MaturityData {
  return {
    has_ssl: false,
    ssl_issuer: null,
    ssl_expiry_days: null,
    has_mx_records: false,
    mx_records: [],
    tech_stack: [],
    business_tools: [],
    domain_age_days: null,
  };
}

export function emptyMaturityResult(): MaturityResult {
  return { passed: false, score: 0, issues: [], data: emptyMaturityData() };
}

export function scoreMaturity(data: MaturityData): number {
  let score = 0;

  if (data.has_ssl) score += MATURITY_WEIGHTS.has_ssl;
  if (data.has_mx_records) score += MATURITY_WEIGHTS.has_mx_records;
  score += Math.min(MATURITY_WEIGHTS.max_technology, data.tech_stack.length * MATURITY_WEIGHTS.per_technology);
  if (data.business_tools.length > 0) score += MATURITY_WEIGHTS.business_tools;

  return Math.min(100, score);
}

function expiryDays(validTo: string | null, now: Date): number | null {
  if (!validTo) return null;
  const expiry = new Date(validTo);
  return Number.isNaN(expiry.getTime()) ? null : differenceInDays(expiry, now);
}

function ageDays(registrationDate: string | null, now: Date): number | null {
  if (!registrationDate) return null;
  const registered = new Date(registrationDate);
  return Number.isNaN(registered.getTime()) ? null : differenceInDays(now, registered);
}

/**
 * Infrastructure signals: certificate, mail exchangers and detected technology.
 * Domain age is reported alongside but does not count towards the score.
 */
export function evaluateMaturity(
  certificate: TlsCertificateInfo | null,
  mxRecords: string[],
  technologies: readonly string[],
  passScore: number,
  now: Date,
  registrationDate: string | null = null
): MaturityResult {
  const data: MaturityData = {
    has_ssl: certificate?.authorized ?? false,
    ssl_issuer: certificate?.issuer ?? null,
    ssl_expiry_days: certificate ? expiryDays(certificate.validTo, now) : null,
    has_mx_records: mxRecords.length > 0,
    mx_records: mxRecords,
    tech_stack: [...technologies],
    business_tools: technologies.filter((tech) => BUSINESS_TOOLS.has(tech)),
    domain_age_days: ageDays(registrationDate, now),
  };

  const issues: string[] = [];
  if (!data.has_ssl) issues.push('No SSL certificate');
  if (!data.has_mx_records) issues.push('No MX records');
  if (data.tech_stack.length === 0) issues.push('No technology detected');

  const score = scoreMaturity(data);

  return {
    passed: score >= passScore && data.has_ssl,
    score,
    issues,
    data,
  };
}

async function readCertificate(context: CheckContext): Promise<TlsCertificateInfo | null> {
  const host = context.target.domain;
  try {
    return await context.deps.probeTls(host, context.config.tlsTimeoutMs);
  } catch (error) {
    console.warn(`[Maturity] TLS probe failed for ${host}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return null;
  }
}

async function readMxRecords(context: CheckContext): Promise<string[]> {
  const domain = context.target.domain;
  try {
    return await context.deps.lookupMx(domain, context.config.dnsTimeoutMs);
  } catch (error) {
    console.warn(`[Maturity] MX lookup failed for ${domain}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return [];
  }
}

async function readRegistrationDate(context: CheckContext): Promise<string | null> {
  const domain = context.target.domain;
  try {
    const registration = await context.deps.lookupRegistration(domain, context.config.registrationTimeoutMs);
    return registration.registrationDate;
  } catch (error) {
    console.warn(`[Maturity] Registration lookup failed for ${domain}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    return null;
  }
}

export const maturityCheck: ProspectCheck<MaturityData> = {
  id: 'maturity',
  label: 'Business Maturity',
  run: async (context) => {
    const { outcome } = context;
    if (outcome.kind !== 'response') return emptyMaturityResult();

    const certificate = await readCertificate(context);
    const mxRecords = await readMxRecords(context);
    const registrationDate = await readRegistrationDate(context);
    const technologies = context.technologies ?? detectTechnologies(outcome.headers, outcome.body);

    return evaluateMaturity(
      certificate,
      mxRecords,
      technologies,
      context.config.maturityPassScore,
      context.deps.now(),
      registrationDate
    );
  },
};
