/**
 * Retainer Calculator
 *
 * Maps a credit decision to the retainer amounts shown to the applicant.
 * Pure functions; no rounding is applied.
 *
 * A tier's discount is the fraction of the standard retainer the client
 * pays. "No known discount" (null) and a discount of exactly 0 are separate
 * cases throughout.
 */

import {
  CREDIT_FAILED_DECISION,
  CREDIT_FROZEN_DECISION,
  FULL_RETAINER_DECISION,
  getRetainerDiscount,
  isRetainerTier,
} from '@/lib/config/retainer-tiers';
import type { DecisionSnapshot } from '@/types/intake';

export interface RetainerInput {
  decisionLabel?: string | null;
  /** Standard retainer as quoted by the server */
  quotedAmount?: number | null;
  /** Discounted retainer as quoted by the server */
  reducedAmount?: number | null;
}

export interface RetainerSummary {
  accountName: string;
  decisionLabel: string | null;
  discount: number | null;
  standardAmount: number;
  reducedAmount: number;
  isQualified: boolean;
  showFull: boolean;
  showFrozen: boolean;
  showFailed: boolean;
}

function isZeroDiscountTier(label: string | null | undefined): boolean {
  return getRetainerDiscount(label) === 0;
}

/**
 * Standard (full) retainer: the server quote when present, otherwise
 * inferred as reduced / discount for a known non-zero discount.
 */
export function standardAmountDisplay(input: RetainerInput): number {
  if (input.quotedAmount != null) return input.quotedAmount;

  const discount = getRetainerDiscount(input.decisionLabel);
  if (discount !== null && discount !== 0 && input.reducedAmount != null) {
    return input.reducedAmount / discount;
  }
  return 0;
}

/**
 * Discounted retainer. The zero-discount tier is always 0, even if the
 * server says otherwise.
 */
export function reducedAmountDisplay(input: RetainerInput): number {
  if (isZeroDiscountTier(input.decisionLabel)) return 0;
  if (input.reducedAmount != null) return input.reducedAmount;

  const discount = getRetainerDiscount(input.decisionLabel);
  if (discount !== null && input.quotedAmount != null) {
    return input.quotedAmount * discount;
  }
  return 0;
}

export function describeRetainer(snapshot: DecisionSnapshot): RetainerSummary {
  const input: RetainerInput = {
    decisionLabel: snapshot.decisionLabel,
    quotedAmount: snapshot.quotedAmount,
    reducedAmount: snapshot.reducedAmount,
  };
  const label = snapshot.decisionLabel ?? null;
  const isQualified = isRetainerTier(label);
  const showFrozen = label === CREDIT_FROZEN_DECISION;

  return {
    accountName: snapshot.accountName ?? '',
    decisionLabel: label,
    discount: getRetainerDiscount(label),
    standardAmount: standardAmountDisplay(input),
    reducedAmount: reducedAmountDisplay(input),
    isQualified,
    // Anything that is neither a tier nor frozen gets the full-retainer view
    showFull: label === FULL_RETAINER_DECISION || (!isQualified && !showFrozen),
    showFrozen,
    showFailed: label === CREDIT_FAILED_DECISION,
  };
}
