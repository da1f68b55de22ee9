// /lib/records/account-row.ts
// Column mapping and row validation for the intake accounts table

import { z } from 'zod';
import type { AccountField, AccountSnapshot, AccountUpdate } from '@/types/intake';

export const ACCOUNT_COLUMNS: Record<AccountField, string> = {
  name: 'name',
  creditDecision: 'credit_decision',
  quotedRetainer: 'quoted_retainer',
  quotedRetainerAmount: 'quoted_retainer_amount',
  conflictAlert: 'conflict_alert',
  conflictAlertMessage: 'conflict_alert_message',
  conflictScore: 'conflict_score',
  conflictAlertDismissed: 'conflict_alert_dismissed',
  conflictAlertSignature: 'conflict_alert_signature',
};

const ACCOUNT_FIELD_NAMES = Object.keys(ACCOUNT_COLUMNS).filter(
  (key): key is AccountField => key in ACCOUNT_COLUMNS
);

// PostgREST serialises numeric columns as strings when they exceed float precision
const amount = z.union([z.number(), z.string().trim().min(1).transform(Number)]).pipe(z.number().finite());

const accountRowSchema = z
  .object({
    name: z.string().nullable(),
    credit_decision: z.string().nullable(),
    quoted_retainer: amount.nullable(),
    quoted_retainer_amount: amount.nullable(),
    conflict_alert: z.boolean().nullable(),
    conflict_alert_message: z.string().nullable(),
    conflict_score: z.union([z.number(), z.string()]).nullable(),
    conflict_alert_dismissed: z.boolean().nullable(),
    conflict_alert_signature: z.string().nullable(),
  })
  .partial()
  .extend({ id: z.string().min(1) });

export type AccountRow = z.infer<typeof accountRowSchema>;

export type AccountRowResult =
  | { success: true; snapshot: AccountSnapshot }
  | { success: false; error: string };

/**
 * Validate a raw row and map it to a typed snapshot.
 * Columns missing from the row stay undefined on the snapshot.
 */
export function parseAccountRow(row: unknown): AccountRowResult {
  const result = accountRowSchema.safeParse(row);
  if (!result.success) {
    return {
      success: false,
      error: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
    };
  }

  const r = result.data;
  return {
    success: true,
    snapshot: {
      id: r.id,
      name: r.name,
      creditDecision: r.credit_decision,
      quotedRetainer: r.quoted_retainer,
      quotedRetainerAmount: r.quoted_retainer_amount,
      conflictAlert: r.conflict_alert,
      conflictAlertMessage: r.conflict_alert_message,
      conflictScore: r.conflict_score,
      conflictAlertDismissed: r.conflict_alert_dismissed,
      conflictAlertSignature: r.conflict_alert_signature,
    },
  };
}

export function selectColumns(fields: readonly AccountField[]): string {
  const columns = new Set(['id', ...fields.map(field => ACCOUNT_COLUMNS[field])]);
  return [...columns].join(',');
}

export function toAccountColumns(values: AccountUpdate): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  for (const field of ACCOUNT_FIELD_NAMES) {
    if (values[field] !== undefined) {
      row[ACCOUNT_COLUMNS[field]] = values[field];
    }
  }
  return row;
}
