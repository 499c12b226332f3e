import { type BaseWallet, getAddress, getBytes, solidityPackedKeccak256 } from "ethers";

/** Price coupon authorising one ticket purchase. */
export interface TicketCoupon {
  buyer: string;
  nonce: bigint;
  raffleId: bigint;
  ticketCount: number;
  // last block at which the coupon is accepted
  blockNumber: bigint;
  value: bigint;
}

export function ticketCouponHash(coupon: TicketCoupon): string {
  return solidityPackedKeccak256(
    ["address", "uint256", "uint256", "uint16", "uint256", "uint256"],
    [getAddress(coupon.buyer), coupon.nonce, coupon.raffleId, coupon.ticketCount, coupon.blockNumber, coupon.value],
  );
}

/** EIP-191 signature over the coupon hash bytes, as produced by the pricing API. */
export function signTicketCoupon(signer: BaseWallet, coupon: TicketCoupon): string {
  return signer.signMessageSync(getBytes(ticketCouponHash(coupon)));
}
