import { ZeroAddress, getAddress } from "ethers";
import { Contract } from "../Contract.js";
import type { Environment, Overrides, TransactionReceipt } from "../Environment.js";
import { ContractError } from "../errors.js";
import { INTERFACE_IDS, type IERC721 } from "../interfaces.js";

interface ERC721State {
  nextTokenId: bigint;
  owners: Map<bigint, string>;
  approvals: Map<bigint, string>;
}

/** Sequentially minted NFT collection; token ids start at 1. */
export class ERC721Mock extends Contract<ERC721State> implements IERC721 {
  constructor(
    env: Environment,
    deployer: string,
    readonly name: string,
    readonly symbol: string,
  ) {
    super(env, deployer, { nextTokenId: 1n, owners: new Map(), approvals: new Map() });
  }

  override supportsInterface(interfaceId: string): boolean {
    return interfaceId === INTERFACE_IDS.ERC721 || super.supportsInterface(interfaceId);
  }

  ownerOf(tokenId: bigint): string {
    const owner = this.state.owners.get(tokenId);
    if (owner === undefined) throw new ContractError("ERC721NonexistentToken", { tokenId });
    return owner;
  }

  getApproved(tokenId: bigint): string {
    this.ownerOf(tokenId);
    return this.state.approvals.get(tokenId) ?? ZeroAddress;
  }

  mint(to: string, overrides: Overrides): TransactionReceipt<bigint> {
    return this.execute(overrides, () => {
      const tokenId = this.state.nextTokenId;
      this.state.nextTokenId = tokenId + 1n;
      this.state.owners.set(tokenId, getAddress(to));
      this.emit("Transfer", { from: ZeroAddress, to: getAddress(to), tokenId });
      return tokenId;
    });
  }

  approve(spender: string, tokenId: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      const owner = this.ownerOf(tokenId);
      if (owner !== msg.sender) throw new ContractError("ERC721InvalidApprover", { approver: msg.sender });
      this.state.approvals.set(tokenId, getAddress(spender));
      this.emit("Approval", { owner, approved: getAddress(spender), tokenId });
    });
  }

  transferFrom(from: string, to: string, tokenId: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      const owner = this.ownerOf(tokenId);
      if (owner !== getAddress(from)) {
        throw new ContractError("ERC721IncorrectOwner", { sender: getAddress(from), tokenId, owner });
      }
      if (msg.sender !== owner && this.state.approvals.get(tokenId) !== msg.sender) {
        throw new ContractError("ERC721InsufficientApproval", { operator: msg.sender, tokenId });
      }
      this.state.approvals.delete(tokenId);
      this.state.owners.set(tokenId, getAddress(to));
      this.emit("Transfer", { from: owner, to: getAddress(to), tokenId });
    });
  }
}
