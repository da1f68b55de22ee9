/**
 * Consent Capture Tests
 *
 * Run: npx vitest run lib/intake/__tests__/consent.test.ts
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { ConsentSession, type ConsentGateway, type ConsentRecord, type ConsentTemplate } from '../consent';

function createGateway(template: ConsentTemplate | null = { version: 3, body: '<p>Terms</p>' }) {
  return {
    getActiveTemplate: vi.fn(async (): Promise<ConsentTemplate | null> => template),
    saveConsentWithSnapshot: vi.fn(async (_record: ConsentRecord) => {}),
    normalizeAccountId: vi.fn(async (recordId: string): Promise<string | null> => `${recordId}-full`),
  } satisfies ConsentGateway;
}

function acceptAll(session: ConsentSession) {
  session.setDisclosuresAccepted(true);
  session.setTermsAccepted(true);
  session.setCreditConsentAccepted(true);
}

describe('ConsentSession', () => {
  let gateway: ReturnType<typeof createGateway>;
  let onAdvance: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    gateway = createGateway();
    onAdvance = vi.fn();
  });

  // ================================================================
  // INIT
  // ================================================================

  it('loads the active template', async () => {
    const session = new ConsentSession({ gateway, accountId: 'acct-1', onAdvance });

    await expect(session.init()).resolves.toBe(true);
    expect(session.templateVersion).toBe('3');
    expect(session.templateHtml).toBe('<p>Terms</p>');
    expect(gateway.normalizeAccountId).not.toHaveBeenCalled();
  });

  it('resolves the account id from the parent account', async () => {
    const session = new ConsentSession({ gateway, parentAccountId: 'acct-9', onAdvance });

    await session.init();

    expect(gateway.normalizeAccountId).toHaveBeenCalledWith('acct-9');
    expect(session.resolvedAccountId).toBe('acct-9-full');
  });

  it('reports a missing template', async () => {
    const session = new ConsentSession({ gateway: createGateway(null), accountId: 'acct-1', onAdvance });

    await expect(session.init()).resolves.toBe(false);
    expect(session.errorMsg).toBe('Active Consent Template is not configured.');
  });

  it('reports a template without a version', async () => {
    const session = new ConsentSession({
      gateway: createGateway({ version: null, body: '<p>Terms</p>' }),
      accountId: 'acct-1',
      onAdvance,
    });

    await expect(session.init()).resolves.toBe(false);
    expect(session.errorMsg).toBe('Active Consent Template is not configured.');
  });

  it('reports a failed template load', async () => {
    gateway.getActiveTemplate.mockRejectedValueOnce(new Error('timeout'));
    const session = new ConsentSession({ gateway, accountId: 'acct-1', onAdvance });

    await expect(session.init()).resolves.toBe(false);
    expect(session.errorMsg).toBe('Failed to initialize consent screen.');
  });

  // ================================================================
  // VALIDITY
  // ================================================================

  it('is valid only once all three consents are given', () => {
    const onValidityChange = vi.fn();
    const session = new ConsentSession({ gateway, accountId: 'acct-1', onAdvance, onValidityChange });

    expect(session.buttonDisabled).toBe(true);
    acceptAll(session);

    expect(onValidityChange.mock.calls).toEqual([[false], [false], [true]]);
    expect(session.isConsentValid).toBe(true);
    expect(session.buttonDisabled).toBe(false);

    session.setTermsAccepted(false);
    expect(session.isConsentValid).toBe(false);
  });

  // ================================================================
  // AGREE
  // ================================================================

  it('saves the consent snapshot and advances', async () => {
    const session = new ConsentSession({
      gateway,
      accountId: 'acct-1',
      thirdPartyAccountId: 'tp-1',
      onAdvance,
    });
    await session.init();
    acceptAll(session);

    await expect(session.agree()).resolves.toBe(true);

    expect(gateway.saveConsentWithSnapshot).toHaveBeenCalledWith({
      accountId: 'acct-1',
      version: '3',
      htmlSnapshot: '<p>Terms</p>',
      acceptedDisclosures: true,
      acceptedTerms: true,
      acceptedFCRA: true,
      thirdPartyAccountId: 'tp-1',
    });
    expect(onAdvance).toHaveBeenCalledTimes(1);
    expect(session.isSaving).toBe(false);
  });

  it('does nothing until every consent is given', async () => {
    const session = new ConsentSession({ gateway, accountId: 'acct-1', onAdvance });
    await session.init();
    session.setDisclosuresAccepted(true);

    await expect(session.agree()).resolves.toBe(false);
    expect(gateway.saveConsentWithSnapshot).not.toHaveBeenCalled();
  });

  it('requires an account id', async () => {
    const session = new ConsentSession({ gateway, onAdvance });
    await session.init();
    acceptAll(session);

    await expect(session.agree()).resolves.toBe(false);
    expect(session.errorMsg).toBe('Account Id is missing.');
  });

  it('requires a loaded template', async () => {
    const session = new ConsentSession({ gateway, accountId: 'acct-1', onAdvance });
    acceptAll(session);

    await expect(session.agree()).resolves.toBe(false);
    expect(session.errorMsg).toBe('Consent template not available.');
  });

  it('keeps the user on the screen when the save fails', async () => {
    gateway.saveConsentWithSnapshot.mockRejectedValueOnce(new Error('constraint violation'));
    const session = new ConsentSession({ gateway, accountId: 'acct-1', onAdvance });
    await session.init();
    acceptAll(session);

    await expect(session.agree()).resolves.toBe(false);

    expect(session.errorMsg).toBe('Could not save consent. Please try again.');
    expect(session.isSaving).toBe(false);
    expect(onAdvance).not.toHaveBeenCalled();
  });
});
