// Status and kind values shared by both ledgers. Numeric values are part of
// the external interface and match the on-chain enums.

export const RaffleType = {
  NONE: 0,
  NFT: 1,
  ETH: 2,
  TOKEN: 3,
} as const;

export type RaffleType = typeof RaffleType[keyof typeof RaffleType];

export const PrizeStatus = {
  NONE: 0,
  CLAIMED: 1,
  CANCELED: 2,
} as const;

export type PrizeStatus = typeof PrizeStatus[keyof typeof PrizeStatus];

export const RaffleStatus = {
  NONE: 0,
  PRIZE_LOCKED: 1,
  IDLE: 2,
  REQUESTED: 3,
  FULFILLED: 4,
  PROPAGATED: 5,
  CLAIMED: 6,
  CANCELED: 7,
} as const;

export type RaffleStatus = typeof RaffleStatus[keyof typeof RaffleStatus];

/** Seconds a raffle must stay open, measured from its start and from creation. */
export const MIN_RAFFLE_DURATION = 60n;
