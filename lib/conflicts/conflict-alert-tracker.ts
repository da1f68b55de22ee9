/**
 * Conflict Alert Tracker
 *
 * Decides, on every refresh of an intake account, whether the
 * conflict-of-interest alert should be shown, stay dismissed, or be re-armed
 * because the conflict score moved since the user dismissed it.
 *
 * At most one alert is open per tracker. An evaluation that arrives while an
 * alert is open (or is being re-armed) is suppressed.
 */

import { getErrorMessage } from '@/lib/errors';
import { errorToast, showToast, successToast, type ToastSignal } from '@/lib/notifications/toast';
import type { RecordStore } from '@/lib/records/record-store';
import { createLogger, type Logger } from '@/lib/security/logger';
import { sanitizeError } from '@/lib/utils/sanitize-error';
import type { ConflictAlertFields } from '@/types/intake';

import { SessionSignatureCache } from './session-signature-cache';
import { buildSignature, normalizeServerSignature, type ConflictScore } from './signature';

// ============================================================================
// TYPES
// ============================================================================

export const DEFAULT_CONFLICT_MESSAGE = 'Potential conflict detected. Please review.';

export type AlertResult = 'dismiss' | 'close';

export interface PresentedAlert {
  recordId: string;
  message: string;
  score: ConflictScore;
}

/** Opens the alert and resolves with the user's choice once it closes */
export interface ConflictAlertPresenter {
  open(alert: PresentedAlert): Promise<AlertResult>;
}

export type ConflictEvaluation =
  | 'shown'
  | 'rearmed'
  | 'suppressed'
  | 'remain_dismissed'
  | 'inactive';

export interface ConflictAlertState {
  alertOn: boolean;
  dismissed: boolean;
  message: string;
  score: ConflictScore;
  modalOpen: boolean;
  inlineAlertVisible: boolean;
}

export interface ConflictAlertTrackerOptions {
  recordId: string;
  store: Pick<RecordStore, 'update' | 'notifyChanged' | 'refresh'>;
  presenter: ConflictAlertPresenter;
  toasts: ToastSignal;
  sessionCache: SessionSignatureCache;
}

// ============================================================================
// TRACKER
// ============================================================================

export class ConflictAlertTracker {
  readonly recordId: string;
  private readonly store: ConflictAlertTrackerOptions['store'];
  private readonly presenter: ConflictAlertPresenter;
  private readonly toasts: ToastSignal;
  private readonly sessionCache: SessionSignatureCache;
  private readonly log: Logger;

  private state: ConflictAlertState = {
    alertOn: false,
    dismissed: false,
    message: '',
    score: null,
    modalOpen: false,
    inlineAlertVisible: false,
  };
  private refreshedOnce = false;
  private presentation: Promise<void> | null = null;

  constructor(options: ConflictAlertTrackerOptions) {
    this.recordId = options.recordId;
    this.store = options.store;
    this.presenter = options.presenter;
    this.toasts = options.toasts;
    this.sessionCache = options.sessionCache;
    this.log = createLogger('conflict-alert', { recordId: options.recordId });
  }

  getState(): ConflictAlertState {
    return { ...this.state };
  }

  /** Resolves once the current alert (if any) has closed and its dismissal settled */
  settled(): Promise<void> {
    return this.presentation ?? Promise.resolve();
  }

  /**
   * Evaluate freshly loaded alert fields.
   * Resolves once the decision is taken and, when showing, the alert is handed
   * to the presenter; it does not wait for the user.
   */
  async evaluate(fields: ConflictAlertFields): Promise<ConflictEvaluation> {
    if (this.state.modalOpen) return 'suppressed';

    const alertOn = fields.alertOn === true;
    const dismissed = fields.dismissed === true;
    const message = fields.message || DEFAULT_CONFLICT_MESSAGE;
    const score = fields.score ?? null;
    const currentSignature = buildSignature(score);

    if (alertOn && dismissed) {
      const serverSignature = normalizeServerSignature(fields.serverSignature);
      const sessionSignature = this.sessionCache.get(this.recordId);

      const changedVsServer = serverSignature !== '' && serverSignature !== currentSignature;
      const changedVsSession =
        serverSignature === '' && !!sessionSignature && sessionSignature !== currentSignature;

      this.state = { ...this.state, alertOn, dismissed };
      if (changedVsServer || changedVsSession) {
        await this.rearm({ recordId: this.recordId, message, score }, currentSignature);
        return 'rearmed';
      }
      return 'remain_dismissed';
    }

    if (alertOn) {
      this.state = { ...this.state, alertOn, dismissed };
      this.show({ recordId: this.recordId, message, score }, currentSignature);
      this.refreshOnce();
      return 'shown';
    }

    return 'inactive';
  }

  /**
   * Persist a dismissal and close the alert. The session cache and local
   * state move forward whether or not the write lands; a failed write
   * resurfaces on the next evaluation as a signature mismatch.
   */
  async dismiss(signature: string): Promise<boolean> {
    try {
      await this.store.update(this.recordId, {
        conflictAlertDismissed: true,
        conflictAlertSignature: signature,
      });
    } catch (error) {
      this.handleError('Failed to dismiss conflict alert', error);
      return false;
    } finally {
      this.sessionCache.set(this.recordId, signature);
      this.state = { ...this.state, dismissed: true };
      this.closeAlert();
    }

    this.hintChanged();
    showToast(this.toasts, successToast('Conflict alert dismissed successfully'));
    return true;
  }

  /** Dismiss from the inline fallback alert */
  dismissInline(): Promise<boolean> {
    return this.dismiss(buildSignature(this.state.score));
  }

  closeAlert(): void {
    this.state = { ...this.state, modalOpen: false, inlineAlertVisible: false };
  }

  /** Surface a failure to load the monitored account */
  reportLoadFailure(error: unknown): void {
    this.handleError('Failed to load account data', error);
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async rearm(alert: PresentedAlert, signature: string): Promise<void> {
    // Claim the alert slot before the write so a refresh racing it is suppressed
    this.state = { ...this.state, modalOpen: true };

    try {
      await this.store.update(this.recordId, {
        conflictAlertDismissed: false,
        conflictAlertSignature: signature,
      });
      this.hintChanged();
    } catch (error) {
      this.handleError('Failed to undismiss conflict alert', error);
    }

    this.sessionCache.set(this.recordId, signature);
    this.state = { ...this.state, dismissed: false };
    this.log.info('Conflict alert re-armed', { signature });
    this.open(alert, signature);
  }

  private show(alert: PresentedAlert, signature: string): boolean {
    if (this.state.modalOpen) return false;
    this.state = { ...this.state, modalOpen: true };
    this.open(alert, signature);
    return true;
  }

  private open(alert: PresentedAlert, signature: string): void {
    this.state = { ...this.state, message: alert.message, score: alert.score };
    this.presentation = this.present(alert, signature);
  }

  private async present(alert: PresentedAlert, signature: string): Promise<void> {
    let result: AlertResult;
    try {
      result = await this.presenter.open(alert);
    } catch (error) {
      this.state = { ...this.state, inlineAlertVisible: true };
      this.handleError('Modal failed to open, using inline alert', error);
      return;
    }

    if (result === 'dismiss') {
      await this.dismiss(signature);
    } else {
      this.closeAlert();
    }
  }

  private refreshOnce(): void {
    if (this.refreshedOnce) return;
    this.refreshedOnce = true;
    this.store.refresh(this.recordId).catch((error: unknown) => {
      this.handleError('Failed to refresh data', error);
    });
  }

  /** Best-effort; a failed hint never changes the outcome of the write */
  private hintChanged(): void {
    try {
      this.store.notifyChanged(this.recordId);
    } catch (error) {
      this.log.warn('Change notification failed', { error: sanitizeError(error) });
    }
  }

  private handleError(title: string, error: unknown): void {
    this.log.error(title, { error: sanitizeError(error) });
    showToast(this.toasts, errorToast(title, getErrorMessage(error)));
  }
}
