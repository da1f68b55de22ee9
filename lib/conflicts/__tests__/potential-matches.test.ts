import { describe, expect, it, vi } from 'vitest';

import { findPotentialMatches, toPotentialMatches } from '../potential-matches';

describe('toPotentialMatches', () => {
  it('maps rows with phone, then email, as the subtitle', () => {
    expect(
      toPotentialMatches([
        { id: 'a1', name: 'Alex Sample', phone: '555-010-0001', email: 'alex@example.test' },
        { id: 'a2', name: null, phone: '', email: 'blake@example.test' },
        { id: 'a3' },
      ])
    ).toEqual([
      { id: 'a1', name: 'Alex Sample', subtitle: '555-010-0001', url: '/a1' },
      { id: 'a2', name: '', subtitle: 'blake@example.test', url: '/a2' },
      { id: 'a3', name: '', subtitle: '', url: '/a3' },
    ]);
  });

  it('drops rows without an id', () => {
    expect(toPotentialMatches([{ name: 'No Id' }, { id: 'a1', name: 'Alex Sample' }])).toEqual([
      { id: 'a1', name: 'Alex Sample', subtitle: '', url: '/a1' },
    ]);
  });

  it('returns nothing for a non-list result', () => {
    expect(toPotentialMatches(null)).toEqual([]);
    expect(toPotentialMatches({ id: 'a1' })).toEqual([]);
  });
});

describe('findPotentialMatches', () => {
  it('loads matches for the account', async () => {
    const source = vi.fn(async (_accountId: string): Promise<unknown> => [{ id: 'a1', name: 'Alex Sample' }]);
    const toasts = { show: vi.fn() };

    await expect(findPotentialMatches(source, 'acct-1', toasts)).resolves.toEqual([
      { id: 'a1', name: 'Alex Sample', subtitle: '', url: '/a1' },
    ]);
    expect(source).toHaveBeenCalledWith('acct-1');
    expect(toasts.show).not.toHaveBeenCalled();
  });

  it('returns an empty list and raises a toast on failure', async () => {
    const source = vi.fn(async (_accountId: string): Promise<unknown> => {
      throw new Error('function not found');
    });
    const toasts = { show: vi.fn() };

    await expect(findPotentialMatches(source, 'acct-1', toasts)).resolves.toEqual([]);
    expect(toasts.show).toHaveBeenCalledWith({
      title: 'Failed to load potential matches',
      message: 'function not found',
      variant: 'error',
      mode: 'dismissable',
    });
  });
});
