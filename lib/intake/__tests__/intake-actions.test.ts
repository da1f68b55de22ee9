import { describe, expect, it, vi } from 'vitest';

import { loadApplicantTypeOptions, validateApplicantType } from '../applicant-type';
import { triggerCreditCheck } from '../credit-check';
import { resolveSigningUrl } from '../signing-url';

describe('triggerCreditCheck', () => {
  it('launches the check for the account', async () => {
    const gateway = { launch: vi.fn(async (_accountId: string) => {}) };

    await expect(triggerCreditCheck(gateway, 'acct-1')).resolves.toEqual({
      success: true,
      message: 'Credit check started successfully.',
    });
    expect(gateway.launch).toHaveBeenCalledWith('acct-1');
  });

  it('refuses to launch without an account id', async () => {
    const gateway = { launch: vi.fn(async (_accountId: string) => {}) };

    await expect(triggerCreditCheck(gateway, '')).resolves.toEqual({
      success: false,
      message: 'Error: Account Id is missing.',
    });
    expect(gateway.launch).not.toHaveBeenCalled();
  });

  it('reports the gateway error message', async () => {
    const gateway = {
      launch: vi.fn(async (_accountId: string) => {
        throw Object.assign(new Error('wrapped'), { body: { message: 'Bureau unavailable' } });
      }),
    };

    await expect(triggerCreditCheck(gateway, 'acct-1')).resolves.toEqual({
      success: false,
      message: 'Error: Bureau unavailable',
    });
  });

  it('falls back to a generic message', async () => {
    const gateway = {
      launch: vi.fn(async (_accountId: string) => {
        throw {};
      }),
    };

    await expect(triggerCreditCheck(gateway, 'acct-1')).resolves.toEqual({
      success: false,
      message: 'Error: Unknown error',
    });
  });
});

describe('applicant type', () => {
  it('loads the picklist options', async () => {
    const options = await loadApplicantTypeOptions(async () => [
      { label: 'Client', value: 'Client' },
      { label: 'Third Party', value: 'Third Party' },
    ]);

    expect(options).toEqual([
      { label: 'Client', value: 'Client' },
      { label: 'Third Party', value: 'Third Party' },
    ]);
  });

  it('requires a selection before advancing', () => {
    expect(validateApplicantType('')).toEqual({
      isValid: false,
      errorMessage: 'Please select Client or Third Party.',
    });
    expect(validateApplicantType(null)).toEqual({
      isValid: false,
      errorMessage: 'Please select Client or Third Party.',
    });
    expect(validateApplicantType('Client')).toEqual({ isValid: true });
  });
});

describe('resolveSigningUrl', () => {
  it('returns the signing url', async () => {
    const source = vi.fn(async (_agreementId: string) => 'https://sign.example.test/a-1');

    await expect(resolveSigningUrl(source, 'agr-1')).resolves.toEqual({
      signingUrl: 'https://sign.example.test/a-1',
    });
    expect(source).toHaveBeenCalledWith('agr-1');
  });

  it('reports a missing agreement id', async () => {
    const source = vi.fn(async (_agreementId: string) => '');

    await expect(resolveSigningUrl(source, undefined)).resolves.toEqual({ error: 'Agreement Id is missing.' });
    expect(source).not.toHaveBeenCalled();
  });

  it('reports a lookup failure', async () => {
    const source = vi.fn(async (_agreementId: string): Promise<string> => {
      throw new Error('Agreement not sent');
    });

    await expect(resolveSigningUrl(source, 'agr-1')).resolves.toEqual({ error: 'Agreement not sent' });
  });
});
