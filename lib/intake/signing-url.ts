// /lib/intake/signing-url.ts
// Resolves the e-signature URL for a retainer agreement

import { getErrorMessage } from '@/lib/errors';

export type SigningUrlSource = (agreementId: string) => Promise<string>;

export type SigningUrlResult = { signingUrl: string } | { error: string };

export async function resolveSigningUrl(
  source: SigningUrlSource,
  agreementId: string | null | undefined
): Promise<SigningUrlResult> {
  if (!agreementId) {
    return { error: 'Agreement Id is missing.' };
  }

  try {
    return { signingUrl: await source(agreementId) };
  } catch (error) {
    return { error: getErrorMessage(error) };
  }
}
