/**
 * Intake workflow public API
 */

export {
  DecisionPoller,
  createRecordDecisionSource,
  resolveAccountId,
  type DecisionPollerOptions,
  type DecisionSource,
  type PollOutcome,
  type PollState,
  type TargetIdSource,
} from './intake/decision-poller';
export { createTerminalityPredicate, isTerminalDecision, type TerminalityPredicate } from './intake/terminality';
export { startCreditDecisionStep, type CreditDecisionResult, type CreditDecisionStepOptions } from './intake/credit-decision-step';
export { triggerCreditCheck, type CreditCheckGateway, type CreditCheckResult } from './intake/credit-check';
export { ConsentSession, type ConsentGateway, type ConsentRecord, type ConsentTemplate } from './intake/consent';
export { loadApplicantTypeOptions, validateApplicantType, type PicklistOption, type PicklistSource } from './intake/applicant-type';
export {
  ThirdPartyApplicationService,
  buildThirdPartyAccount,
  thirdPartyApplicantSchema,
  type ThirdPartyAccountGateway,
  type ThirdPartyAccountPayload,
  type ThirdPartySubmitResult,
} from './intake/third-party-application';
export { resolveSigningUrl, type SigningUrlResult, type SigningUrlSource } from './intake/signing-url';
export {
  createSupabaseApplicantTypeSource,
  createSupabaseConsentGateway,
  createSupabaseCreditCheckGateway,
  createSupabaseSigningUrlSource,
  createSupabaseThirdPartyGateway,
} from './intake/supabase-gateways';

export { buildSignature, normalizeServerSignature, type ConflictScore } from './conflicts/signature';
export { SessionSignatureCache } from './conflicts/session-signature-cache';
export {
  ConflictAlertTracker,
  DEFAULT_CONFLICT_MESSAGE,
  type AlertResult,
  type ConflictAlertPresenter,
  type ConflictAlertState,
  type ConflictEvaluation,
  type PresentedAlert,
} from './conflicts/conflict-alert-tracker';
export { watchConflictAlert } from './conflicts/watch-conflict-alert';
export {
  createSupabaseConflictMatchSource,
  findPotentialMatches,
  toPotentialMatches,
  type ConflictMatchSource,
  type PotentialMatch,
} from './conflicts/potential-matches';

export {
  describeRetainer,
  reducedAmountDisplay,
  standardAmountDisplay,
  type RetainerInput,
  type RetainerSummary,
} from './retainer/retainer-calculator';
export { RETAINER_TIERS, getRetainerDiscount, isRetainerTier, type RetainerTier } from './config/retainer-tiers';

export type { CancelHandle, RecordStore } from './records/record-store';
export { SupabaseRecordStore } from './records/supabase-record-store';
export { getServiceSupabase } from './supabase/admin';

export { createLoggingToastSignal, showToast, type Toast, type ToastSignal } from './notifications/toast';
export { getPollerConfig, getPendingDecisionValues, parsePollerConfig, type PollerConfig } from './config/intake-config';
export { checkEnvironment, type EnvCheckResult } from './utils/env-check';
export {
  IntakeConfigError,
  PollerStateError,
  RecordFetchError,
  RecordPersistenceError,
  getErrorMessage,
} from './errors';
export {
  CONFLICT_ALERT_FIELDS,
  DECISION_FIELDS,
  toConflictAlertFields,
  toDecisionSnapshot,
  type AccountField,
  type AccountFields,
  type AccountSnapshot,
  type AccountUpdate,
  type ConflictAlertFields,
  type DecisionSnapshot,
} from '../types/intake';
