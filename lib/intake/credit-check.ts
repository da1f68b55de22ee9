// /lib/intake/credit-check.ts
// Starts the asynchronous credit bureau check for an intake account

import { getErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/security/logger';

const log = createLogger('credit-check');

export interface CreditCheckGateway {
  launch(accountId: string): Promise<void>;
}

export interface CreditCheckResult {
  success: boolean;
  message: string;
}

export async function triggerCreditCheck(
  gateway: CreditCheckGateway,
  accountId: string | null | undefined
): Promise<CreditCheckResult> {
  if (!accountId) {
    return { success: false, message: 'Error: Account Id is missing.' };
  }

  try {
    await gateway.launch(accountId);
    log.info('Credit check launched', { accountId });
    return { success: true, message: 'Credit check started successfully.' };
  } catch (error) {
    log.error('Credit check launch failed', { accountId, error: getErrorMessage(error) });
    return { success: false, message: `Error: ${getErrorMessage(error, 'Unknown error')}` };
  }
}
