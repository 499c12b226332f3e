import { ZeroAddress, getAddress } from "ethers";
import type { Environment, Overrides, PayableOverrides, TransactionReceipt } from "./Environment.js";
import { ContractError } from "./errors.js";
import { type Any2EVMMessage, type IERC20, type IERC721, isERC20, isERC721 } from "./interfaces.js";
import { Role } from "./Roles.js";
import { BaseCCIPContract, type CCIPDependencies, type CCIPState } from "./ccip/BaseCCIPContract.js";
import { CCIPMessageType, decodePrizeManagerMessage, encodePrizeLocked } from "./ccip/codec.js";
import { PrizeStatus, RaffleType } from "./types.js";

export type LockedPrize =
  | { raffleType: typeof RaffleType.NFT; contractAddress: string; tokenId: bigint }
  | { raffleType: typeof RaffleType.ETH; amount: bigint }
  | { raffleType: typeof RaffleType.TOKEN; tokenAddress: string; amount: bigint };

interface RafflePrize {
  prize: LockedPrize;
  status: PrizeStatus;
  winner: string;
}

export interface RafflePrizeView {
  raffleType: RaffleType;
  status: PrizeStatus;
  winner: string;
}

interface PrizeManagerState extends CCIPState {
  prizes: Map<bigint, RafflePrize>;
  ethLocked: bigint;
  tokensLocked: Map<string, bigint>;
  nftLocked: Set<string>;
}

/**
 * Prize-chain side of the protocol: custody of prizes, translation of remote
 * raffle events (cancel, winner drawn) into unlocks and payouts.
 *
 * The locked-total accumulators always equal the sum of the active prizes
 * referencing each asset; admin withdrawals only reach what lies above them.
 */
export class PrizeManager extends BaseCCIPContract<PrizeManagerState> {
  constructor(env: Environment, deployer: string, deps: CCIPDependencies) {
    super(env, deployer, deps, {
      roles: new Map(),
      counterparts: new Set(),
      extraArgs: "0x",
      prizes: new Map(),
      ethLocked: 0n,
      tokensLocked: new Map(),
      nftLocked: new Set(),
    });
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  getRaffle(raffleId: bigint): RafflePrizeView {
    const record = this.state.prizes.get(raffleId);
    if (record === undefined) {
      return { raffleType: RaffleType.NONE, status: PrizeStatus.NONE, winner: ZeroAddress };
    }
    return { raffleType: record.prize.raffleType, status: record.status, winner: record.winner };
  }

  getNFTRaffle(raffleId: bigint): { contractAddress: string; tokenId: bigint } {
    const prize = this.state.prizes.get(raffleId)?.prize;
    if (prize === undefined || prize.raffleType !== RaffleType.NFT) throw new ContractError("InvalidRaffle", { raffleId });
    return { contractAddress: prize.contractAddress, tokenId: prize.tokenId };
  }

  getETHRaffle(raffleId: bigint): bigint {
    const prize = this.state.prizes.get(raffleId)?.prize;
    if (prize === undefined || prize.raffleType !== RaffleType.ETH) throw new ContractError("InvalidRaffle", { raffleId });
    return prize.amount;
  }

  getTokenRaffle(raffleId: bigint): { tokenAddress: string; amount: bigint } {
    const prize = this.state.prizes.get(raffleId)?.prize;
    if (prize === undefined || prize.raffleType !== RaffleType.TOKEN) throw new ContractError("InvalidRaffle", { raffleId });
    return { tokenAddress: prize.tokenAddress, amount: prize.amount };
  }

  /**
   * Winner propagated for `raffleId`. A canceled raffle never has one
   * (`InvalidRaffle`); a raffle still waiting for its draw reverts with
   * `RaffleNotFulfilled`.
   */
  getWinner(raffleId: bigint): string {
    const record = this.state.prizes.get(raffleId);
    if (record === undefined || record.status === PrizeStatus.CANCELED) {
      throw new ContractError("InvalidRaffle", { raffleId });
    }
    if (record.winner === ZeroAddress) throw new ContractError("RaffleNotFulfilled", { raffleId });
    return record.winner;
  }

  getLockedETH(): bigint {
    return this.state.ethLocked;
  }

  getLockedTokens(token: string): bigint {
    return this.state.tokensLocked.get(getAddress(token)) ?? 0n;
  }

  isNFTLocked(nft: string, tokenId: bigint): boolean {
    return this.state.nftLocked.has(nftKey(nft, tokenId));
  }

  // ---------------------------------------------------------------------------
  // Prize locking
  // ---------------------------------------------------------------------------

  lockNFT(
    ticketManager: string,
    chainSelector: bigint,
    raffleId: bigint,
    nft: string,
    tokenId: bigint,
    overrides: Overrides,
  ): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      this.checkNewRaffle(raffleId);
      const collection = this.env.getContract(nft);
      if (!isERC721(collection)) throw new ContractError("InvalidPrize");
      if (collection.ownerOf(tokenId) !== this.address) throw new ContractError("InvalidPrize");
      const key = nftKey(collection.address, tokenId);
      if (this.state.nftLocked.has(key)) throw new ContractError("InvalidPrize");

      this.state.nftLocked.add(key);
      this.state.prizes.set(raffleId, newPrize({ raffleType: RaffleType.NFT, contractAddress: collection.address, tokenId }));
      this.sendCCIPMessage(ticketManager, chainSelector, encodePrizeLocked(raffleId));
      this.emit("NFTPrizeLocked", { raffleId, contractAddress: collection.address, tokenId });
    });
  }

  lockETH(
    ticketManager: string,
    chainSelector: bigint,
    raffleId: bigint,
    amount: bigint,
    overrides: PayableOverrides,
  ): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      this.checkNewRaffle(raffleId);
      if (amount <= 0n || this.balance < this.state.ethLocked + amount) {
        throw new ContractError("InvalidPrize");
      }

      this.state.ethLocked += amount;
      this.state.prizes.set(raffleId, newPrize({ raffleType: RaffleType.ETH, amount }));
      this.sendCCIPMessage(ticketManager, chainSelector, encodePrizeLocked(raffleId));
      this.emit("ETHPrizeLocked", { raffleId, amount });
    });
  }

  lockTokens(
    ticketManager: string,
    chainSelector: bigint,
    raffleId: bigint,
    token: string,
    amount: bigint,
    overrides: Overrides,
  ): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      this.checkNewRaffle(raffleId);
      if (getAddress(token) === this.link.address) throw new ContractError("LINKTokenNotPermitted");
      const erc20 = this.env.getContract(token);
      if (!isERC20(erc20) || amount <= 0n) throw new ContractError("InvalidPrize");
      const locked = this.getLockedTokens(erc20.address);
      if (erc20.balanceOf(this.address) < locked + amount) throw new ContractError("InvalidPrize");

      this.state.tokensLocked.set(erc20.address, locked + amount);
      this.state.prizes.set(raffleId, newPrize({ raffleType: RaffleType.TOKEN, tokenAddress: erc20.address, amount }));
      this.sendCCIPMessage(ticketManager, chainSelector, encodePrizeLocked(raffleId));
      this.emit("TokenPrizeLocked", { raffleId, contractAddress: erc20.address, amount });
    });
  }

  // ---------------------------------------------------------------------------
  // Admin withdrawals of unlocked assets
  // ---------------------------------------------------------------------------

  withdrawToken(token: string, amount: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const erc20 = this.requireERC20(token);
      const available = erc20.balanceOf(this.address) - this.getLockedTokens(erc20.address);
      if (amount > available) throw new ContractError("InsufficientBalance", { available, requested: amount });
      erc20.transfer(msg.sender, amount, { from: this.address });
    });
  }

  withdrawETH(amount: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const available = this.balance - this.state.ethLocked;
      if (amount > available) throw new ContractError("InsufficientBalance", { available, requested: amount });
      this.sendETH(msg.sender, amount);
    });
  }

  withdrawNFT(nft: string, tokenId: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const collection = this.env.getContract(nft);
      if (!isERC721(collection)) throw new ContractError("NotAnNFT");
      if (this.state.nftLocked.has(nftKey(collection.address, tokenId))) throw new ContractError("NFTLocked");
      collection.transferFrom(this.address, msg.sender, tokenId, { from: this.address });
    });
  }

  // ---------------------------------------------------------------------------
  // Claims
  // ---------------------------------------------------------------------------

  /**
   * Pays the prize out to the recorded winner. The record is marked claimed
   * and the accumulators released before any asset leaves the contract.
   */
  claimPrize(raffleId: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      const record = this.state.prizes.get(raffleId);
      if (record === undefined || record.status === PrizeStatus.CANCELED) {
        throw new ContractError("InvalidRaffle", { raffleId });
      }
      if (record.status === PrizeStatus.CLAIMED) throw new ContractError("AlreadyClaimed", { raffleId });
      if (msg.sender !== record.winner) throw new ContractError("UnauthorizedToClaim", { raffleId, caller: msg.sender });

      record.status = PrizeStatus.CLAIMED;
      this.release(record.prize);

      const prize = record.prize;
      switch (prize.raffleType) {
        case RaffleType.NFT:
          this.requireERC721(prize.contractAddress).transferFrom(this.address, msg.sender, prize.tokenId, {
            from: this.address,
          });
          break;
        case RaffleType.ETH:
          this.sendETH(msg.sender, prize.amount);
          break;
        case RaffleType.TOKEN:
          this.requireERC20(prize.tokenAddress).transfer(msg.sender, prize.amount, { from: this.address });
          break;
      }
      this.emit("PrizeClaimed", { raffleId, winner: msg.sender });
    });
  }

  // ---------------------------------------------------------------------------
  // Inbound messages
  // ---------------------------------------------------------------------------

  protected handleCCIPMessage(message: Any2EVMMessage): void {
    const decoded = decodePrizeManagerMessage(message.data);
    switch (decoded.type) {
      case CCIPMessageType.RAFFLE_CANCELED:
        this.cancelRaffle(decoded.raffleId);
        break;
      case CCIPMessageType.WINNER_DRAWN:
        this.recordWinner(decoded.raffleId, decoded.winner);
        break;
    }
  }

  private cancelRaffle(raffleId: bigint): void {
    const record = this.state.prizes.get(raffleId);
    if (record === undefined || record.status !== PrizeStatus.NONE) {
      throw new ContractError("InvalidRaffle", { raffleId });
    }
    record.status = PrizeStatus.CANCELED;
    this.release(record.prize);
    this.emit("PrizeUnlocked", { raffleId });
  }

  // Re-delivery of a winner message overwrites; only one is expected per id.
  private recordWinner(raffleId: bigint, winner: string): void {
    const record = this.state.prizes.get(raffleId);
    if (record === undefined || record.status === PrizeStatus.CANCELED) {
      throw new ContractError("InvalidRaffle", { raffleId });
    }
    if (record.status === PrizeStatus.CLAIMED) throw new ContractError("AlreadyClaimed", { raffleId });
    record.winner = winner;
    this.emit("WinnerPropagated", { raffleId, winner });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private checkNewRaffle(raffleId: bigint): void {
    if (raffleId <= 0n) throw new ContractError("IllegalRaffleId", { raffleId });
    if (this.state.prizes.has(raffleId)) throw new ContractError("InvalidRaffleId", { raffleId });
  }

  private release(prize: LockedPrize): void {
    switch (prize.raffleType) {
      case RaffleType.NFT:
        this.state.nftLocked.delete(nftKey(prize.contractAddress, prize.tokenId));
        break;
      case RaffleType.ETH:
        this.state.ethLocked -= prize.amount;
        break;
      case RaffleType.TOKEN:
        this.state.tokensLocked.set(prize.tokenAddress, this.getLockedTokens(prize.tokenAddress) - prize.amount);
        break;
    }
  }

  private sendETH(to: string, amount: bigint): void {
    const result = this.sendValue(to, amount);
    if (!result.success) {
      throw new ContractError("ETHTransferFail", { to: getAddress(to), amount }, { cause: result.error });
    }
  }

  private requireERC20(token: string): IERC20 {
    const erc20 = this.env.getContract(token);
    if (!isERC20(erc20)) throw new ContractError("NotAToken", { token: getAddress(token) });
    return erc20;
  }

  private requireERC721(nft: string): IERC721 {
    const collection = this.env.getContract(nft);
    if (!isERC721(collection)) throw new ContractError("NotAnNFT");
    return collection;
  }
}

function newPrize(prize: LockedPrize): RafflePrize {
  return { prize, status: PrizeStatus.NONE, winner: ZeroAddress };
}

function nftKey(nft: string, tokenId: bigint): string {
  return `${getAddress(nft)}:${tokenId}`;
}
