// /lib/intake/credit-decision-step.ts
// "Waiting for credit result" step: polls the account's decision and advances
// the intake workflow with the retainer summary once polling ends.

import type { PollerConfig } from '@/lib/config/intake-config';
import { errorToast, showToast, type ToastSignal } from '@/lib/notifications/toast';
import type { CancelHandle, RecordStore } from '@/lib/records/record-store';
import { describeRetainer, type RetainerSummary } from '@/lib/retainer/retainer-calculator';

import { createRecordDecisionSource, DecisionPoller, type PollOutcome, type TargetIdSource } from './decision-poller';
import type { TerminalityPredicate } from './terminality';

export interface CreditDecisionResult {
  reason: PollOutcome['reason'];
  attempts: number;
  /** Null when no read succeeded before polling ended */
  retainer: RetainerSummary | null;
}

export interface CreditDecisionStepOptions {
  store: Pick<RecordStore, 'fetch' | 'notifyChanged'>;
  targetId: TargetIdSource;
  toasts: ToastSignal;
  onAdvance: (result: CreditDecisionResult) => void;
  config?: PollerConfig;
  isTerminal?: TerminalityPredicate;
}

export function startCreditDecisionStep(options: CreditDecisionStepOptions): CancelHandle {
  const poller = new DecisionPoller({
    source: createRecordDecisionSource(options.store),
    store: options.store,
    isTerminal: options.isTerminal,
    onComplete: (outcome) => {
      options.onAdvance({
        reason: outcome.reason,
        attempts: outcome.attempts,
        retainer: outcome.snapshot ? describeRetainer(outcome.snapshot) : null,
      });
    },
    onFailure: (error) => {
      showToast(options.toasts, errorToast('Failed to load credit decision', error.message));
    },
  });

  poller.start(options.targetId, options.config);
  return () => poller.stop();
}
