export {
  createProspectValidator,
  computeOverallScore,
  validateProspect,
  type ProspectValidator,
  type QuickHealthResult,
} from './validateProspect';
export { getUrlFromItem, validateItems, URL_FIELDS, type ValidatedItem } from './validateBatch';
export {
  DEFAULT_CONFIG,
  ValidatorConfigSchema,
  loadConfig,
  loadConfigFromEnv,
  type ValidatorConfig,
  type ValidatorConfigInput,
} from './config';
export type { CheckContext, ProspectCheck, ValidatorDeps } from './context';
export { healthCheck } from './healthCheck';
export { legitimacyCheck } from './legitimacyCheck';
export { seoCheck } from './seoCheck';
export { contactabilityCheck } from './contactabilityCheck';
export { maturityCheck } from './maturityCheck';
export { lookupRegistration, type RegistrationInfo, type RegistrationLookupFn } from './registrationLookup';
export * from './patterns';
export * from './schemas';
export { fetchPage, probeStatus, type FetchPageFn, type FetchPageOptions } from '../fetchLayer';
export { normalizeTarget, type NormalizedTarget, type InvalidTarget } from '../utils';
