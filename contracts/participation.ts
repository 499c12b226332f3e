import { PanicCode, PanicError } from "./errors.js";

/**
 * Per-(raffle, participant) record packed into one word:
 *
 *   bits  0..63  totalSpent      (smallest currency unit)
 *   bits 64..95  totalPurchased  (ticket count)
 *   bit  96      refunded
 */
export interface Participation {
  totalSpent: bigint;
  totalPurchased: bigint;
  refunded: boolean;
}

export const MAX_TOTAL_SPENT = (1n << 64n) - 1n;
export const MAX_TOTAL_PURCHASED = (1n << 32n) - 1n;

const PURCHASED_OFFSET = 64n;
const REFUNDED_BIT = 1n << 96n;

export const EMPTY_PARTICIPATION = 0n;

export function packParticipation({ totalSpent, totalPurchased, refunded }: Participation): bigint {
  checkRange("totalSpent", totalSpent, MAX_TOTAL_SPENT);
  checkRange("totalPurchased", totalPurchased, MAX_TOTAL_PURCHASED);
  return totalSpent | (totalPurchased << PURCHASED_OFFSET) | (refunded ? REFUNDED_BIT : 0n);
}

export function unpackParticipation(packed: bigint): Participation {
  return {
    totalSpent: packed & MAX_TOTAL_SPENT,
    totalPurchased: (packed >> PURCHASED_OFFSET) & MAX_TOTAL_PURCHASED,
    refunded: (packed & REFUNDED_BIT) !== 0n,
  };
}

/** Adds a purchase; overflowing either field is a fatal arithmetic fault. */
export function recordPurchase(packed: bigint, spent: bigint, tickets: bigint): bigint {
  const current = unpackParticipation(packed);
  return packParticipation({
    totalSpent: current.totalSpent + spent,
    totalPurchased: current.totalPurchased + tickets,
    refunded: current.refunded,
  });
}

export function markRefunded(packed: bigint): bigint {
  return packed | REFUNDED_BIT;
}

function checkRange(field: string, value: bigint, max: bigint): void {
  if (value < 0n || value > max) {
    throw new PanicError(PanicCode.ARITHMETIC_OVERFLOW, `${field} out of range: ${value}`);
  }
}
