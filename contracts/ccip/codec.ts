import { dataLength, dataSlice, getAddress, isBytesLike, solidityPacked, toBigInt, zeroPadValue } from "ethers";
import { ContractError, PanicCode, PanicError } from "../errors.js";

/**
 * Wire format of the messages exchanged between the two managers.
 *
 *   prize locked  (prize -> ticket):  uint256 raffleId                  32 bytes
 *   cancel        (ticket -> prize):  uint8 0 | uint256 raffleId        33 bytes
 *   winner drawn  (ticket -> prize):  uint8 1 | uint256 raffleId | addr 53 bytes
 */

export const CCIPMessageType = {
  RAFFLE_CANCELED: 0,
  WINNER_DRAWN: 1,
} as const;

export type CCIPMessageType = typeof CCIPMessageType[keyof typeof CCIPMessageType];

export type PrizeManagerMessage =
  | { type: typeof CCIPMessageType.RAFFLE_CANCELED; raffleId: bigint }
  | { type: typeof CCIPMessageType.WINNER_DRAWN; raffleId: bigint; winner: string };

const RAFFLE_ID_LENGTH = 32;
const CANCEL_LENGTH = 1 + RAFFLE_ID_LENGTH;
const WINNER_LENGTH = 1 + RAFFLE_ID_LENGTH + 20;

export function encodePrizeLocked(raffleId: bigint): string {
  return solidityPacked(["uint256"], [raffleId]);
}

export function encodeRaffleCanceled(raffleId: bigint): string {
  return solidityPacked(["uint8", "uint256"], [CCIPMessageType.RAFFLE_CANCELED, raffleId]);
}

export function encodeWinnerDrawn(raffleId: bigint, winner: string): string {
  return solidityPacked(["uint8", "uint256", "address"], [CCIPMessageType.WINNER_DRAWN, raffleId, winner]);
}

export function decodePrizeLocked(data: string): bigint {
  expectLength(data, RAFFLE_ID_LENGTH);
  return toBigInt(data);
}

/**
 * Decodes a message addressed to the prize manager. An opcode outside the
 * known set is a fatal fault rather than a recoverable revert.
 */
export function decodePrizeManagerMessage(data: string): PrizeManagerMessage {
  if (!isBytesLike(data) || dataLength(data) === 0) {
    throw new ContractError("MalformedMessage", { length: 0 });
  }
  const opcode = Number(toBigInt(dataSlice(data, 0, 1)));
  switch (opcode) {
    case CCIPMessageType.RAFFLE_CANCELED:
      expectLength(data, CANCEL_LENGTH);
      return {
        type: CCIPMessageType.RAFFLE_CANCELED,
        raffleId: toBigInt(dataSlice(data, 1, CANCEL_LENGTH)),
      };
    case CCIPMessageType.WINNER_DRAWN:
      expectLength(data, WINNER_LENGTH);
      return {
        type: CCIPMessageType.WINNER_DRAWN,
        raffleId: toBigInt(dataSlice(data, 1, CANCEL_LENGTH)),
        winner: getAddress(dataSlice(data, CANCEL_LENGTH, WINNER_LENGTH)),
      };
    default:
      throw new PanicError(PanicCode.ENUM_CONVERSION, `unknown CCIP message type ${opcode}`);
  }
}

/** ABI encoding of an address, as carried in the sender/receiver fields. */
export function encodeAddress(address: string): string {
  return zeroPadValue(getAddress(address), 32);
}

export function decodeAddress(data: string): string {
  expectLength(data, 32);
  if (toBigInt(dataSlice(data, 0, 12)) !== 0n) {
    throw new ContractError("MalformedMessage", { reason: "dirty address padding" });
  }
  return getAddress(dataSlice(data, 12, 32));
}

function expectLength(data: string, length: number): void {
  const actual = isBytesLike(data) ? dataLength(data) : -1;
  if (actual !== length) {
    throw new ContractError("MalformedMessage", { expected: length, actual });
  }
}
