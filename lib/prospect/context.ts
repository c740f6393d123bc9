import type { FetchPageFn } from '../fetchLayer';
import type { NormalizedTarget } from '../utils';
import type { ValidatorConfig } from './config';
import type { MxLookupFn } from './mxLookup';
import type { RegistrationLookupFn } from './registrationLookup';
import type { CheckName, CheckResult, FetchOutcome } from './schemas';
import type { TlsProbeFn } from './tlsProbe';

/**
 * Everything that reaches outside the process, injectable for tests.
 */
export interface ValidatorDeps {
  fetchPage: FetchPageFn;
  probeTls: TlsProbeFn;
  lookupMx: MxLookupFn;
  lookupRegistration: RegistrationLookupFn;
  now: () => Date;
}

export interface CheckContext {
  outcome: Readonly<FetchOutcome>;
  target: NormalizedTarget;
  config: ValidatorConfig;
  deps: ValidatorDeps;
  // Computed once from the main fetch; checks recompute when absent
  technologies?: readonly string[];
}

export interface ProspectCheck<TData> {
  id: CheckName;
  label: string;
  run(context: CheckContext): Promise<CheckResult<TData>>;
}
