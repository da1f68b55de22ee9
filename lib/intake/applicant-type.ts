// /lib/intake/applicant-type.ts
// Client vs. third-party applicant selection

export interface PicklistOption {
  label: string;
  value: string;
}

export type PicklistSource = () => Promise<ReadonlyArray<PicklistOption>>;

export type ValidationResult =
  | { isValid: true }
  | { isValid: false; errorMessage: string };

export async function loadApplicantTypeOptions(source: PicklistSource): Promise<PicklistOption[]> {
  const values = await source();
  return values.map(v => ({ label: v.label, value: v.value }));
}

/**
 * Blocks the workflow from advancing until an applicant type is chosen.
 */
export function validateApplicantType(value: string | null | undefined): ValidationResult {
  if (!value) {
    return { isValid: false, errorMessage: 'Please select Client or Third Party.' };
  }
  return { isValid: true };
}
