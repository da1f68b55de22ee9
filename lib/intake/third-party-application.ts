/**
 * Third-Party Application
 *
 * A third party (e.g. a relative paying the retainer) applies alongside the
 * client. The form is validated, mapped onto a new third-party account and
 * linked back to the client's parent account id.
 */

import { z } from 'zod';

import { getErrorMessage } from '@/lib/errors';
import { errorToast, showToast, successToast, type ToastSignal } from '@/lib/notifications/toast';
import { createLogger } from '@/lib/security/logger';

const log = createLogger('third-party-application');

// ============================================================================
// FORM
// ============================================================================

const optionalText = z.string().trim().optional().default('');

export const thirdPartyApplicantSchema = z.object({
  firstName: optionalText,
  middleName: optionalText,
  lastName: z.string().trim().min(1, 'Last name is required'),
  birthdate: z
    .string()
    .trim()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Birthdate must be YYYY-MM-DD')
    .or(z.literal(''))
    .optional()
    .default(''),
  socialSecurityNumber: z
    .string()
    .trim()
    .regex(/^\d{3}-?\d{2}-?\d{4}$/, 'Social Security Number must have 9 digits')
    .or(z.literal(''))
    .optional()
    .default(''),
  mobilePhone: optionalText,
  email: z.string().trim().email('Email is invalid').or(z.literal('')).optional().default(''),
  street: optionalText,
  city: optionalText,
  state: optionalText,
  postalCode: optionalText,
  annualIncome: optionalText,
});

export type ThirdPartyApplicantInput = z.input<typeof thirdPartyApplicantSchema>;
export type ThirdPartyApplicant = z.output<typeof thirdPartyApplicantSchema>;

export interface ThirdPartyAccountPayload {
  firstName: string;
  middleName: string;
  lastName: string;
  birthdate: string | null;
  socialSecurityNumber: string | null;
  mobilePhone: string;
  email: string;
  mailingStreet: string;
  mailingCity: string;
  mailingState: string;
  mailingPostalCode: string;
  annualHouseholdIncome: string;
  recordTypeId: string | null;
  type: 'Third Party';
}

export function buildThirdPartyAccount(
  applicant: ThirdPartyApplicant,
  recordTypeId: string | null | undefined
): ThirdPartyAccountPayload {
  return {
    firstName: applicant.firstName,
    middleName: applicant.middleName,
    lastName: applicant.lastName,
    birthdate: applicant.birthdate || null,
    socialSecurityNumber: applicant.socialSecurityNumber || null,
    mobilePhone: applicant.mobilePhone,
    email: applicant.email,
    mailingStreet: applicant.street,
    mailingCity: applicant.city,
    mailingState: applicant.state,
    mailingPostalCode: applicant.postalCode,
    annualHouseholdIncome: applicant.annualIncome,
    recordTypeId: recordTypeId || null,
    type: 'Third Party',
  };
}

// ============================================================================
// SERVICE
// ============================================================================

export interface ThirdPartyAccountGateway {
  /** Canonical account id for a possibly abbreviated one */
  normalizeAccountId(recordId: string): Promise<string | null>;
  createThirdPartyAccount(payload: ThirdPartyAccountPayload): Promise<string>;
}

export interface ThirdPartySubmission {
  recordId: string | null | undefined;
  recordTypeId: string | null | undefined;
  form: ThirdPartyApplicantInput;
}

export type ThirdPartySubmitResult =
  | { success: true; thirdPartyId: string; parentAccountId: string | null }
  | { success: false; error: string };

export class ThirdPartyApplicationService {
  private readonly gateway: ThirdPartyAccountGateway;
  private readonly toasts: ToastSignal;
  private submitting = false;

  constructor(gateway: ThirdPartyAccountGateway, toasts: ToastSignal) {
    this.gateway = gateway;
    this.toasts = toasts;
  }

  get isSubmitting(): boolean {
    return this.submitting;
  }

  /**
   * Falls back to the raw id when normalization fails or returns nothing.
   */
  async resolveParentAccountId(recordId: string | null | undefined): Promise<string | null> {
    if (!recordId) return null;
    try {
      return (await this.gateway.normalizeAccountId(recordId)) || recordId;
    } catch (error) {
      log.warn('Failed to normalize parent id, using original', { error: getErrorMessage(error) });
      return recordId;
    }
  }

  async submit(submission: ThirdPartySubmission): Promise<ThirdPartySubmitResult> {
    if (this.submitting) {
      return { success: false, error: 'Submission already in progress.' };
    }

    const parsed = thirdPartyApplicantSchema.safeParse(submission.form);
    if (!parsed.success) {
      const error = parsed.error.issues[0]?.message ?? 'The application form is invalid.';
      showToast(this.toasts, errorToast('Error', error));
      return { success: false, error };
    }

    this.submitting = true;
    try {
      const parentAccountId = await this.resolveParentAccountId(submission.recordId);
      const thirdPartyId = await this.gateway.createThirdPartyAccount(
        buildThirdPartyAccount(parsed.data, submission.recordTypeId)
      );

      log.info('Third-party account created', { thirdPartyId, parentAccountId });
      showToast(this.toasts, successToast('Application submitted successfully!'));
      return { success: true, thirdPartyId, parentAccountId };
    } catch (error) {
      const message = getErrorMessage(error, 'An error occurred while saving the form.');
      log.error('Third-party account creation failed', { error: message });
      showToast(this.toasts, errorToast('Error', message));
      return { success: false, error: message };
    } finally {
      this.submitting = false;
    }
  }
}
