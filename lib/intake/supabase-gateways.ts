/**
 * Supabase-backed intake gateways
 *
 * Credit bureau launch, consent storage, account creation and e-signature
 * lookups are database functions owned by the backend; these adapters only
 * call them and translate errors.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { getAccountsTable } from '@/lib/config/intake-config';

import type { ConsentGateway, ConsentRecord, ConsentTemplate } from './consent';
import type { CreditCheckGateway } from './credit-check';
import type { PicklistSource } from './applicant-type';
import type { SigningUrlSource } from './signing-url';
import type { ThirdPartyAccountGateway, ThirdPartyAccountPayload } from './third-party-application';

const templateRowSchema = z.object({
  version: z.union([z.string(), z.number()]).nullable(),
  body: z.string().nullable(),
});

const idSchema = z.string().min(1);

const picklistSchema = z.array(z.object({ label: z.string(), value: z.string() }));

async function callFunction(
  client: SupabaseClient,
  fn: string,
  args: Record<string, unknown>
): Promise<unknown> {
  const { data, error } = await client.rpc(fn, args);
  if (error) {
    throw new Error(error.message);
  }
  return data;
}

export function createSupabaseCreditCheckGateway(client: SupabaseClient): CreditCheckGateway {
  return {
    async launch(accountId) {
      await callFunction(client, 'launch_credit_check', { account_id: accountId });
    },
  };
}

async function normalizeAccountId(client: SupabaseClient, recordId: string): Promise<string | null> {
  const data = await callFunction(client, 'get_parent_account_id', { record_id: recordId });
  const parsed = idSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export function createSupabaseConsentGateway(client: SupabaseClient): ConsentGateway {
  return {
    async getActiveTemplate(): Promise<ConsentTemplate | null> {
      const { data, error } = await client
        .from('consent_templates')
        .select('version,body')
        .eq('is_active', true)
        .order('version', { ascending: false })
        .limit(1)
        .maybeSingle();

      if (error) throw new Error(error.message);
      if (!data) return null;

      const parsed = templateRowSchema.safeParse(data);
      return parsed.success ? parsed.data : null;
    },

    async saveConsentWithSnapshot(record: ConsentRecord): Promise<void> {
      await callFunction(client, 'save_consent_with_snapshot', {
        account_id: record.accountId,
        version: record.version,
        html_snapshot: record.htmlSnapshot,
        accepted_disclosures: record.acceptedDisclosures,
        accepted_terms: record.acceptedTerms,
        accepted_fcra: record.acceptedFCRA,
        third_party_account_id: record.thirdPartyAccountId,
      });
    },

    normalizeAccountId: (recordId) => normalizeAccountId(client, recordId),
  };
}

export function createSupabaseThirdPartyGateway(
  client: SupabaseClient,
  table: string = getAccountsTable()
): ThirdPartyAccountGateway {
  return {
    normalizeAccountId: (recordId) => normalizeAccountId(client, recordId),

    async createThirdPartyAccount(payload: ThirdPartyAccountPayload): Promise<string> {
      const { data, error } = await client
        .from(table)
        .insert({
          first_name: payload.firstName,
          middle_name: payload.middleName,
          last_name: payload.lastName,
          birthdate: payload.birthdate,
          social_security_number: payload.socialSecurityNumber,
          mobile_phone: payload.mobilePhone,
          email: payload.email,
          mailing_street: payload.mailingStreet,
          mailing_city: payload.mailingCity,
          mailing_state: payload.mailingState,
          mailing_postal_code: payload.mailingPostalCode,
          annual_household_income: payload.annualHouseholdIncome,
          record_type_id: payload.recordTypeId,
          type: payload.type,
        })
        .select('id')
        .single();

      if (error) throw new Error(error.message);

      const parsed = z.object({ id: idSchema }).safeParse(data);
      if (!parsed.success) throw new Error('Account was created without an id');
      return parsed.data.id;
    },
  };
}

export function createSupabaseApplicantTypeSource(client: SupabaseClient): PicklistSource {
  return async () => picklistSchema.parse(await callFunction(client, 'get_applicant_types', {}));
}

export function createSupabaseSigningUrlSource(client: SupabaseClient): SigningUrlSource {
  return async (agreementId) =>
    idSchema.parse(await callFunction(client, 'get_signing_url', { agreement_id: agreementId }));
}
