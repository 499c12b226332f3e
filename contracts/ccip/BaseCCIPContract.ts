import { ZeroAddress, getAddress, isBytesLike, solidityPacked } from "ethers";
import type { Environment, Overrides, TransactionReceipt } from "../Environment.js";
import { ContractError } from "../errors.js";
import {
  type Any2EVMMessage,
  type EVM2AnyMessage,
  type ICCIPReceiver,
  type IERC20,
  INTERFACE_IDS,
  type IRouterClient,
} from "../interfaces.js";
import { Role, Roles, type RolesState } from "../Roles.js";
import { decodeAddress, encodeAddress } from "./codec.js";

export interface CCIPState extends RolesState {
  // packed (chainSelector, address) identities allowed to talk to this contract
  counterparts: Set<string>;
  extraArgs: string;
}

export interface CCIPDependencies {
  router: IRouterClient;
  link: IERC20;
}

/**
 * Shared sender/receiver plumbing: router authentication, the counterpart
 * allow-list and fee-checked outbound sends.
 */
export abstract class BaseCCIPContract<S extends CCIPState> extends Roles<S> implements ICCIPReceiver {
  readonly router: IRouterClient;
  readonly link: IERC20;

  protected constructor(env: Environment, deployer: string, deps: CCIPDependencies, initialState: S) {
    super(env, deployer, initialState);
    this.router = deps.router;
    this.link = deps.link;
  }

  override supportsInterface(interfaceId: string): boolean {
    return interfaceId === INTERFACE_IDS.CCIP_RECEIVER || super.supportsInterface(interfaceId);
  }

  setCCIPCounterpart(contractAddress: string, chainSelector: bigint, enabled: boolean, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const key = counterpartKey(contractAddress, chainSelector);
      if (enabled) this.state.counterparts.add(key);
      else this.state.counterparts.delete(key);
      this.emit("CCIPCounterpartUpdated", {
        contractAddress: getAddress(contractAddress),
        chainSelector,
        enabled,
      });
    });
  }

  isCCIPCounterpart(contractAddress: string, chainSelector: bigint): boolean {
    return this.state.counterparts.has(counterpartKey(contractAddress, chainSelector));
  }

  setCCIPExtraArgs(extraArgs: string, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      if (!isBytesLike(extraArgs)) throw new ContractError("InvalidExtraArgs");
      this.state.extraArgs = extraArgs;
    });
  }

  get ccipExtraArgs(): string {
    return this.state.extraArgs;
  }

  ccipReceive(message: Any2EVMMessage, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      if (msg.sender !== this.router.address) {
        throw new ContractError("InvalidRouter", { router: msg.sender });
      }
      const sender = decodeAddress(message.sender);
      if (!this.isCCIPCounterpart(sender, message.sourceChainSelector)) {
        throw new ContractError("UnauthorizedCCIPSender", {
          sender,
          chainSelector: message.sourceChainSelector,
        });
      }
      this.handleCCIPMessage(message, sender);
    });
  }

  protected abstract handleCCIPMessage(message: Any2EVMMessage, sender: string): void;

  /** Sends `data` to `receiver` paying the router fee in LINK; returns the message id. */
  protected sendCCIPMessage(receiver: string, chainSelector: bigint, data: string): string {
    if (getAddress(receiver) === ZeroAddress || chainSelector === 0n) {
      throw new ContractError("MissingCCIPParams");
    }
    const message: EVM2AnyMessage = {
      receiver: encodeAddress(receiver),
      data,
      tokenAmounts: [],
      extraArgs: this.state.extraArgs,
      feeToken: this.link.address,
    };
    const fee = this.router.getFee(chainSelector, message);
    const balance = this.link.balanceOf(this.address);
    if (balance < fee) {
      throw new ContractError("InsufficientLinkBalance", { balance, required: fee });
    }
    this.link.approve(this.router.address, fee, { from: this.address });
    return this.router.ccipSend(chainSelector, message, { from: this.address }).result;
  }
}

function counterpartKey(contractAddress: string, chainSelector: bigint): string {
  return solidityPacked(["uint64", "address"], [chainSelector, getAddress(contractAddress)]);
}
