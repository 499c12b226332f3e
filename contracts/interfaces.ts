import type { Account, Overrides, TransactionReceipt } from "./Environment.js";

// ERC-165 identifiers of the collaborator interfaces.
export const INTERFACE_IDS = {
  ERC165: "0x01ffc9a7",
  ERC20: "0x36372b07",
  ERC721: "0x80ac58cd",
  ERC1155: "0xd9b67a26",
  TICKET: "0xefa07c25",
  CCIP_RECEIVER: "0x85572ffb",
  VRF_CONSUMER: "0x1fe543e3",
} as const;

export interface IERC20 extends Account {
  balanceOf(owner: string): bigint;
  allowance(owner: string, spender: string): bigint;
  transfer(to: string, amount: bigint, overrides: Overrides): TransactionReceipt;
  approve(spender: string, amount: bigint, overrides: Overrides): TransactionReceipt;
  transferFrom(from: string, to: string, amount: bigint, overrides: Overrides): TransactionReceipt;
}

export interface IERC721 extends Account {
  ownerOf(tokenId: bigint): string;
  transferFrom(from: string, to: string, tokenId: bigint, overrides: Overrides): TransactionReceipt;
}

export interface ITicket extends Account {
  mint(to: string, raffleId: bigint, amount: number, overrides: Overrides): TransactionReceipt;
  ownerOf(raffleId: bigint, ticketNumber: bigint): string;
  supplyOf(raffleId: bigint): bigint;
  balanceOf(account: string, raffleId: bigint): bigint;
}

export interface EVMTokenAmount {
  token: string;
  amount: bigint;
}

/** Message as handed to a receiver by the destination router. */
export interface Any2EVMMessage {
  messageId: string;
  sourceChainSelector: bigint;
  sender: string;
  data: string;
  destTokenAmounts: EVMTokenAmount[];
}

/** Message as submitted to the source router. */
export interface EVM2AnyMessage {
  receiver: string;
  data: string;
  tokenAmounts: EVMTokenAmount[];
  extraArgs: string;
  feeToken: string;
}

export interface ICCIPReceiver extends Account {
  ccipReceive(message: Any2EVMMessage, overrides: Overrides): TransactionReceipt;
}

export interface IRouterClient extends Account {
  getFee(destinationChainSelector: bigint, message: EVM2AnyMessage): bigint;
  ccipSend(
    destinationChainSelector: bigint,
    message: EVM2AnyMessage,
    overrides: Overrides,
  ): TransactionReceipt<string>;
}

export interface IVRFCoordinator extends Account {
  requestRandomWords(
    keyHash: string,
    subscriptionId: bigint,
    minimumRequestConfirmations: number,
    callbackGasLimit: number,
    numWords: number,
    overrides: Overrides,
  ): TransactionReceipt<bigint>;
}

export interface IVRFConsumer extends Account {
  rawFulfillRandomWords(requestId: bigint, randomWords: bigint[], overrides: Overrides): TransactionReceipt;
}

export function isERC20(account: Account | undefined): account is IERC20 {
  return account?.supportsInterface(INTERFACE_IDS.ERC20) === true;
}

export function isERC721(account: Account | undefined): account is IERC721 {
  return account?.supportsInterface(INTERFACE_IDS.ERC721) === true;
}

export function isTicket(account: Account | undefined): account is ITicket {
  return account?.supportsInterface(INTERFACE_IDS.TICKET) === true;
}

export function isCCIPReceiver(account: Account | undefined): account is ICCIPReceiver {
  return account?.supportsInterface(INTERFACE_IDS.CCIP_RECEIVER) === true;
}

export function isVRFConsumer(account: Account | undefined): account is IVRFConsumer {
  return account?.supportsInterface(INTERFACE_IDS.VRF_CONSUMER) === true;
}
