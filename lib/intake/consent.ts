/**
 * Consent Capture
 *
 * Records the applicant's acceptance of the disclosures, terms of
 * engagement and the FCRA credit-report authorization, together with a
 * snapshot of the consent template they were shown.
 */

import { getErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/security/logger';

const log = createLogger('consent');

export interface ConsentTemplate {
  version: string | number | null;
  body: string | null;
}

export interface ConsentRecord {
  accountId: string;
  version: string;
  htmlSnapshot: string;
  acceptedDisclosures: boolean;
  acceptedTerms: boolean;
  acceptedFCRA: boolean;
  thirdPartyAccountId: string | null;
}

export interface ConsentGateway {
  getActiveTemplate(): Promise<ConsentTemplate | null>;
  saveConsentWithSnapshot(record: ConsentRecord): Promise<void>;
  /** Canonical account id for a possibly abbreviated one */
  normalizeAccountId(recordId: string): Promise<string | null>;
}

export interface ConsentSessionOptions {
  gateway: ConsentGateway;
  accountId?: string | null;
  parentAccountId?: string | null;
  thirdPartyAccountId?: string | null;
  /** Fired after the consent is saved */
  onAdvance: () => void;
  onValidityChange?: (isValid: boolean) => void;
}

export class ConsentSession {
  disclosuresAccepted = false;
  termsAccepted = false;
  creditConsentAccepted = false;
  isSaving = false;
  errorMsg = '';
  templateVersion: string | null = null;
  templateHtml = '';

  private accountId: string | null;
  private readonly options: ConsentSessionOptions;

  constructor(options: ConsentSessionOptions) {
    this.options = options;
    this.accountId = options.accountId ?? null;
  }

  get resolvedAccountId(): string | null {
    return this.accountId;
  }

  get isConsentValid(): boolean {
    return this.disclosuresAccepted && this.termsAccepted && this.creditConsentAccepted;
  }

  get buttonDisabled(): boolean {
    return this.isSaving || !this.isConsentValid;
  }

  /**
   * Resolve the account id and load the active template.
   * Returns false and sets errorMsg when the screen cannot be used.
   */
  async init(): Promise<boolean> {
    try {
      if (!this.accountId && this.options.parentAccountId) {
        this.accountId = await this.options.gateway.normalizeAccountId(this.options.parentAccountId);
      }

      const template = await this.options.gateway.getActiveTemplate();
      if (!template || !template.body || template.version === null || template.version === '') {
        this.errorMsg = 'Active Consent Template is not configured.';
        return false;
      }

      this.templateVersion = String(template.version);
      this.templateHtml = template.body;
      return true;
    } catch (error) {
      log.error('Consent init failed', { error: getErrorMessage(error) });
      this.errorMsg = 'Failed to initialize consent screen.';
      return false;
    }
  }

  setDisclosuresAccepted(value: boolean): void {
    this.disclosuresAccepted = value;
    this.syncValidity();
  }

  setTermsAccepted(value: boolean): void {
    this.termsAccepted = value;
    this.syncValidity();
  }

  setCreditConsentAccepted(value: boolean): void {
    this.creditConsentAccepted = value;
    this.syncValidity();
  }

  /**
   * Save the consent snapshot and advance. Returns whether it advanced.
   */
  async agree(): Promise<boolean> {
    this.errorMsg = '';
    if (!this.isConsentValid || this.isSaving) return false;
    if (!this.accountId) {
      this.errorMsg = 'Account Id is missing.';
      return false;
    }
    if (!this.templateVersion) {
      this.errorMsg = 'Consent template not available.';
      return false;
    }

    this.isSaving = true;
    try {
      await this.options.gateway.saveConsentWithSnapshot({
        accountId: this.accountId,
        version: this.templateVersion,
        htmlSnapshot: this.templateHtml,
        acceptedDisclosures: this.disclosuresAccepted,
        acceptedTerms: this.termsAccepted,
        acceptedFCRA: this.creditConsentAccepted,
        thirdPartyAccountId: this.options.thirdPartyAccountId ?? null,
      });
      log.info('Consent saved', { accountId: this.accountId, version: this.templateVersion });
    } catch (error) {
      log.error('Consent save failed', { accountId: this.accountId, error: getErrorMessage(error) });
      this.errorMsg = 'Could not save consent. Please try again.';
      return false;
    } finally {
      this.isSaving = false;
    }

    this.options.onAdvance();
    return true;
  }

  private syncValidity(): void {
    this.options.onValidityChange?.(this.isConsentValid);
  }
}
