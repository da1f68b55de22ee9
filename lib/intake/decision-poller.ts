/**
 * Credit Decision Poller
 *
 * Waits for the bureau decision on an intake account. After the initial
 * delay it reads the account every `intervalMs` until the decision is
 * terminal or `maxAttempts` counted reads have been made, then fires the
 * completion callback exactly once so the caller can advance the workflow.
 *
 * Ticks are chained timeouts: the next tick is scheduled only after the
 * previous read settles, so ticks never overlap.
 *
 * Lifecycle:
 *   idle → polling → completed   (decision found / attempts exhausted)
 *                  → failed      (read error; no completion signal)
 *                  → stopped     (stop() from the owner)
 */

import { getPollerConfig, getPendingDecisionValues, parsePollerConfig, type PollerConfig } from '@/lib/config/intake-config';
import { getErrorMessage, PollerStateError, RecordFetchError } from '@/lib/errors';
import type { RecordStore } from '@/lib/records/record-store';
import { createLogger } from '@/lib/security/logger';
import { DECISION_FIELDS, toDecisionSnapshot, type DecisionSnapshot } from '@/types/intake';

import { createTerminalityPredicate, type TerminalityPredicate } from './terminality';

const log = createLogger('decision-poller');

const UNRESOLVED_TARGET = '(unresolved)';

// ============================================================================
// TYPES
// ============================================================================

export interface PollState {
  attemptCount: number;
  maxAttempts: number;
  intervalMs: number;
  initialDelayMs: number;
  hasCompleted: boolean;
  targetId?: string;
}

/** Read at every tick; an empty result skips the tick without counting it */
export type TargetIdSource = () => string | null | undefined;

export type DecisionSource = (accountId: string) => Promise<DecisionSnapshot>;

export type PollOutcome =
  | { reason: 'decision_found'; snapshot: DecisionSnapshot; attempts: number }
  | { reason: 'max_attempts'; snapshot: DecisionSnapshot | null; attempts: number };

export interface DecisionPollerOptions {
  source: DecisionSource;
  onComplete: (outcome: PollOutcome) => void;
  onFailure?: (error: RecordFetchError) => void;
  /** Receives the best-effort change hint for the polled account */
  store?: Pick<RecordStore, 'notifyChanged'>;
  isTerminal?: TerminalityPredicate;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Prefer the parent account id, fall back to the record id.
 */
export function resolveAccountId(
  parentAccountId: string | null | undefined,
  recordId: string | null | undefined
): string | null {
  return parentAccountId || recordId || null;
}

/**
 * Decision source backed by the account record.
 */
export function createRecordDecisionSource(store: Pick<RecordStore, 'fetch'>): DecisionSource {
  return async (accountId) => toDecisionSnapshot(await store.fetch(accountId, DECISION_FIELDS));
}

// ============================================================================
// POLLER
// ============================================================================

export class DecisionPoller {
  private readonly options: DecisionPollerOptions;
  private readonly isTerminal: TerminalityPredicate;
  private state: PollState | null = null;
  private targetIdSource: TargetIdSource = () => null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;
  private failed = false;
  private lastSnapshot: DecisionSnapshot | null = null;

  constructor(options: DecisionPollerOptions) {
    this.options = options;
    this.isTerminal = options.isTerminal ?? createTerminalityPredicate(getPendingDecisionValues());
  }

  /**
   * Begin polling. The first tick fires after `initialDelayMs`.
   *
   * @throws PollerStateError if the poller was already started
   * @throws IntakeConfigError if `config` is out of range
   */
  start(targetIdSource: TargetIdSource, config: PollerConfig = getPollerConfig()): void {
    if (this.state) {
      throw new PollerStateError('Decision poller already started');
    }

    const { maxAttempts, intervalMs, initialDelayMs } = parsePollerConfig(config);
    this.targetIdSource = targetIdSource;
    this.state = {
      attemptCount: 0,
      maxAttempts,
      intervalMs,
      initialDelayMs,
      hasCompleted: false,
    };

    log.info('Polling scheduled', { maxAttempts, intervalMs, initialDelayMs });
    this.schedule(initialDelayMs);
  }

  /**
   * Cancel the schedule. Nothing observable happens after this returns,
   * including for a read that is already in flight.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.clearTimer();
    log.info('Polling stopped', { attempts: this.state?.attemptCount ?? 0 });
  }

  getState(): PollState | null {
    return this.state ? { ...this.state } : null;
  }

  get isActive(): boolean {
    return this.state !== null && !this.isHalted();
  }

  private isHalted(): boolean {
    return this.stopped || this.failed || (this.state?.hasCompleted ?? false);
  }

  private schedule(delayMs: number): void {
    if (this.isHalted()) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      // A throwing target source or predicate ends the poller like a failed read
      this.tick().catch((error: unknown) => {
        this.fail(this.state?.targetId, error);
      });
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async tick(): Promise<void> {
    const state = this.state;
    if (!state || this.isHalted()) return;

    const targetId = this.targetIdSource();
    if (!targetId) {
      log.debug('Poll tick skipped - no account id yet');
      this.schedule(state.intervalMs);
      return;
    }

    state.targetId = targetId;
    state.attemptCount += 1;
    const attempt = state.attemptCount;
    log.debug('Poll attempt', { accountId: targetId, attempt, maxAttempts: state.maxAttempts });

    this.hintChanged(targetId);

    let snapshot: DecisionSnapshot;
    try {
      snapshot = await this.options.source(targetId);
    } catch (error) {
      this.fail(targetId, error);
      return;
    }

    if (this.isHalted()) return;
    this.lastSnapshot = snapshot;

    // A terminal decision wins over exhaustion on the same tick
    if (this.isTerminal(snapshot.decisionLabel)) {
      this.complete({ reason: 'decision_found', snapshot, attempts: attempt });
      return;
    }

    if (attempt >= state.maxAttempts) {
      this.complete({ reason: 'max_attempts', snapshot: this.lastSnapshot, attempts: attempt });
      return;
    }

    this.schedule(state.intervalMs);
  }

  private hintChanged(targetId: string): void {
    try {
      this.options.store?.notifyChanged(targetId);
    } catch (error) {
      log.warn('Change notification failed', { accountId: targetId, error: getErrorMessage(error) });
    }
  }

  private complete(outcome: PollOutcome): void {
    const state = this.state;
    if (!state || state.hasCompleted) return;

    state.hasCompleted = true;
    this.clearTimer();

    log.info(
      outcome.reason === 'decision_found' ? 'Decision found' : 'Max attempts reached',
      { accountId: state.targetId, attempts: outcome.attempts }
    );

    try {
      this.options.onComplete(outcome);
    } catch (error) {
      log.error('Completion handler threw', { error: getErrorMessage(error) });
    }
  }

  private fail(targetId: string | undefined, error: unknown): void {
    if (this.isHalted()) return;
    this.failed = true;
    this.clearTimer();

    const failure = error instanceof RecordFetchError
      ? error
      : new RecordFetchError(targetId ?? UNRESOLVED_TARGET, getErrorMessage(error), { cause: error });

    log.error('Decision read failed - polling halted', {
      accountId: targetId,
      attempts: this.state?.attemptCount ?? 0,
      error: failure.message,
    });

    try {
      this.options.onFailure?.(failure);
    } catch (handlerError) {
      log.error('Failure handler threw', { error: getErrorMessage(handlerError) });
    }
  }
}
