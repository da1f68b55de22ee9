// /lib/config/retainer-tiers.ts
// Credit decision labels and the retainer fraction each tier pays

export const RETAINER_TIERS = {
  'Gold - 0% Retainer': 0,
  'Silver - 50% Retainer': 0.5,
  'Bronze - 80% Retainer': 0.8,
} as const;

export type RetainerTier = keyof typeof RETAINER_TIERS;

export const FULL_RETAINER_DECISION = 'Full Retainer';
export const CREDIT_FROZEN_DECISION = 'Credit Frozen';
export const CREDIT_FAILED_DECISION = 'Failed- Follow up with PC';

export function isRetainerTier(label: string | null | undefined): label is RetainerTier {
  return typeof label === 'string' && Object.prototype.hasOwnProperty.call(RETAINER_TIERS, label);
}

/**
 * Discount fraction for a decision label.
 * Returns null for labels outside the tier table; that is "unknown", not 0.
 */
export function getRetainerDiscount(label: string | null | undefined): number | null {
  return isRetainerTier(label) ? RETAINER_TIERS[label] : null;
}
