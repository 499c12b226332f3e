import { dataLength, getAddress, solidityPackedKeccak256 } from "ethers";
import { Contract } from "../Contract.js";
import type { Environment, Overrides, TransactionReceipt } from "../Environment.js";
import { ContractError } from "../errors.js";
import {
  type Any2EVMMessage,
  type EVM2AnyMessage,
  type IERC20,
  type IRouterClient,
  isCCIPReceiver,
} from "../interfaces.js";
import { decodeAddress, encodeAddress } from "../ccip/codec.js";

export interface SentMessage {
  messageId: string;
  sequenceNumber: bigint;
  sourceChainSelector: bigint;
  destinationChainSelector: bigint;
  sender: string;
  receiver: string;
  data: string;
  extraArgs: string;
  fee: bigint;
}

export interface FeeSchedule {
  baseFee: bigint;
  feePerByte: bigint;
}

interface RouterState {
  sequenceNumber: bigint;
  sent: SentMessage[];
}

/**
 * Local end of the cross-chain channel. Outbound messages are charged in the
 * fee token and queued until a {@link CCIPRelay} carries them over; inbound
 * messages are handed to the receiver with the router as caller.
 */
export class CCIPRouterMock extends Contract<RouterState> implements IRouterClient {
  constructor(
    env: Environment,
    deployer: string,
    readonly feeToken: IERC20,
    readonly fees: FeeSchedule,
  ) {
    super(env, deployer, { sequenceNumber: 0n, sent: [] });
  }

  get chainSelector(): bigint {
    return this.env.chainSelector;
  }

  getFee(_destinationChainSelector: bigint, message: EVM2AnyMessage): bigint {
    return this.fees.baseFee + this.fees.feePerByte * BigInt(dataLength(message.data));
  }

  ccipSend(
    destinationChainSelector: bigint,
    message: EVM2AnyMessage,
    overrides: Overrides,
  ): TransactionReceipt<string> {
    return this.execute(overrides, (msg) => {
      if (getAddress(message.feeToken) !== this.feeToken.address) {
        throw new ContractError("UnsupportedFeeToken", { token: message.feeToken });
      }
      const fee = this.getFee(destinationChainSelector, message);
      this.feeToken.transferFrom(msg.sender, this.address, fee, { from: this.address });

      const sequenceNumber = this.state.sequenceNumber + 1n;
      this.state.sequenceNumber = sequenceNumber;
      const messageId = solidityPackedKeccak256(
        ["uint64", "uint64", "address", "uint64"],
        [this.chainSelector, destinationChainSelector, msg.sender, sequenceNumber],
      );
      this.state.sent.push({
        messageId,
        sequenceNumber,
        sourceChainSelector: this.chainSelector,
        destinationChainSelector,
        sender: msg.sender,
        receiver: message.receiver,
        data: message.data,
        extraArgs: message.extraArgs,
        fee,
      });
      this.emit("CCIPMessage", {
        messageId,
        chain: destinationChainSelector,
        receiver: message.receiver,
        data: message.data,
      });
      return messageId;
    });
  }

  /** Messages accepted by this router, oldest first. */
  sentMessages(): SentMessage[] {
    return structuredClone(this.state.sent);
  }

  /** Delivers an inbound message to its receiver on this chain. */
  routeMessage(message: Any2EVMMessage, receiver: string, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, () => {
      const target = this.env.getContract(receiver);
      if (!isCCIPReceiver(target)) {
        throw new ContractError("InvalidReceiver", { receiver: getAddress(receiver) });
      }
      target.ccipReceive(message, { from: this.address });
    });
  }

  static receiverAddress(message: SentMessage): string {
    return decodeAddress(message.receiver);
  }

  static encodeSender(sender: string): string {
    return encodeAddress(sender);
  }
}
