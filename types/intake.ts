// /types/intake.ts
// Intake account record and the views the workflow reads from it

/**
 * Account fields the intake workflow reads or writes.
 * Values are null when the column is empty in the record store.
 */
export interface AccountFields {
  name: string | null;
  creditDecision: string | null;
  quotedRetainer: number | null;
  quotedRetainerAmount: number | null;
  conflictAlert: boolean | null;
  conflictAlertMessage: string | null;
  conflictScore: number | string | null;
  conflictAlertDismissed: boolean | null;
  conflictAlertSignature: string | null;
}

export type AccountField = keyof AccountFields;

/**
 * A read of one account. Only the requested fields are populated.
 */
export type AccountSnapshot = { id: string } & Partial<AccountFields>;

export type AccountUpdate = Partial<AccountFields>;

export const DECISION_FIELDS = [
  'creditDecision',
  'quotedRetainer',
  'quotedRetainerAmount',
  'name',
] as const satisfies readonly AccountField[];

export const CONFLICT_ALERT_FIELDS = [
  'conflictAlert',
  'conflictAlertMessage',
  'conflictScore',
  'conflictAlertDismissed',
  'conflictAlertSignature',
] as const satisfies readonly AccountField[];

/**
 * Credit decision state produced by each poll tick.
 */
export interface DecisionSnapshot {
  decisionLabel?: string;
  quotedAmount?: number;
  reducedAmount?: number;
  accountName?: string;
}

export interface ConflictAlertFields {
  alertOn: boolean;
  dismissed: boolean;
  message?: string | null;
  score?: number | string | null;
  serverSignature?: string | null;
}

export function toDecisionSnapshot(snapshot: AccountSnapshot): DecisionSnapshot {
  return {
    decisionLabel: snapshot.creditDecision ?? undefined,
    quotedAmount: snapshot.quotedRetainer ?? undefined,
    reducedAmount: snapshot.quotedRetainerAmount ?? undefined,
    accountName: snapshot.name ?? undefined,
  };
}

export function toConflictAlertFields(snapshot: AccountSnapshot): ConflictAlertFields {
  return {
    alertOn: snapshot.conflictAlert === true,
    dismissed: snapshot.conflictAlertDismissed === true,
    message: snapshot.conflictAlertMessage,
    score: snapshot.conflictScore,
    serverSignature: snapshot.conflictAlertSignature,
  };
}
