import { getAddress, getBytes, verifyMessage } from "ethers";
import { ticketCouponHash } from "./coupon.js";
import type { Environment, Overrides, PayableOverrides, TransactionReceipt } from "./Environment.js";
import { ContractError } from "./errors.js";
import {
  type Any2EVMMessage,
  INTERFACE_IDS,
  type ITicket,
  type IVRFConsumer,
  type IVRFCoordinator,
  isERC20,
} from "./interfaces.js";
import { EMPTY_PARTICIPATION, type Participation, markRefunded, recordPurchase, unpackParticipation } from "./participation.js";
import { Role } from "./Roles.js";
import { BaseCCIPContract, type CCIPDependencies, type CCIPState } from "./ccip/BaseCCIPContract.js";
import { decodePrizeLocked, encodeRaffleCanceled, encodeWinnerDrawn } from "./ccip/codec.js";
import { MIN_RAFFLE_DURATION, RaffleStatus } from "./types.js";

const MAX_TICKETS_PER_PURCHASE = 0xffff;

export interface VRFSettings {
  keyHash: string;
  subscriptionId: bigint;
  requestConfirmations: number;
  callbackGasLimit: number;
}

export interface TicketManagerDependencies extends CCIPDependencies {
  ticket: ITicket;
  coordinator: IVRFCoordinator;
  vrf: VRFSettings;
}

export interface RaffleParams {
  startsAt: bigint;
  endsAt: bigint;
  minTicketsThreshold: bigint;
  maxTicketSupply: bigint;
  maxHoldings: bigint;
}

export interface RaffleView extends RaffleParams {
  status: RaffleStatus;
  totalRaised: bigint;
  requestId: bigint;
}

interface RaffleRecord extends RaffleView {
  // participant -> packed participation word
  participations: Map<string, bigint>;
}

export interface RandomnessRequest {
  raffleId: bigint;
  fulfilled: boolean;
  randomWord: bigint;
}

interface TicketManagerState extends CCIPState {
  raffles: Map<bigint, RaffleRecord>;
  requests: Map<bigint, RandomnessRequest>;
  nonces: Map<string, bigint>;
  lockedETH: bigint;
}

/**
 * Ticket-chain side of the protocol: raffle lifecycle, signed ticket sales,
 * randomness-backed draws, winner propagation, cancellation and refunds.
 *
 * Status only moves forward:
 * NONE → PRIZE_LOCKED → IDLE → REQUESTED → FULFILLED → PROPAGATED, with
 * CANCELED reachable from PRIZE_LOCKED and IDLE.
 */
export class TicketManager extends BaseCCIPContract<TicketManagerState> implements IVRFConsumer {
  readonly ticket: ITicket;
  readonly coordinator: IVRFCoordinator;
  private readonly vrf: VRFSettings;

  constructor(env: Environment, deployer: string, deps: TicketManagerDependencies) {
    super(env, deployer, deps, {
      roles: new Map(),
      counterparts: new Set(),
      extraArgs: "0x",
      raffles: new Map(),
      requests: new Map(),
      nonces: new Map(),
      lockedETH: 0n,
    });
    this.ticket = deps.ticket;
    this.coordinator = deps.coordinator;
    this.vrf = { ...deps.vrf };
  }

  override supportsInterface(interfaceId: string): boolean {
    return interfaceId === INTERFACE_IDS.VRF_CONSUMER || super.supportsInterface(interfaceId);
  }

  receiveEther(): void {
    // plain deposits are accepted and become withdrawable surplus
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  getRaffle(raffleId: bigint): RaffleView {
    const raffle = this.state.raffles.get(raffleId);
    if (raffle === undefined) {
      return {
        status: RaffleStatus.NONE,
        startsAt: 0n,
        endsAt: 0n,
        minTicketsThreshold: 0n,
        maxTicketSupply: 0n,
        maxHoldings: 0n,
        totalRaised: 0n,
        requestId: 0n,
      };
    }
    const { participations: _participations, ...view } = raffle;
    return view;
  }

  getParticipation(raffleId: bigint, participant: string): Participation {
    const packed = this.state.raffles.get(raffleId)?.participations.get(getAddress(participant));
    return unpackParticipation(packed ?? EMPTY_PARTICIPATION);
  }

  getRequestStatus(requestId: bigint): RandomnessRequest | undefined {
    const request = this.state.requests.get(requestId);
    return request === undefined ? undefined : { ...request };
  }

  getNonce(buyer: string): bigint {
    return this.state.nonces.get(getAddress(buyer)) ?? 0n;
  }

  getLockedETH(): bigint {
    return this.state.lockedETH;
  }

  /** True when `drawWinner` would go through at the latest block. */
  shouldDrawRaffle(raffleId: bigint): boolean {
    const raffle = this.state.raffles.get(raffleId);
    if (raffle === undefined || raffle.status !== RaffleStatus.IDLE) return false;
    const supply = this.ticket.supplyOf(raffleId);
    if (supply === 0n || supply < raffle.minTicketsThreshold) return false;
    return this.now >= raffle.endsAt || isSoldOut(raffle, supply);
  }

  /** True when a closed raffle fell short of its threshold and can be canceled. */
  shouldCancelRaffle(raffleId: bigint): boolean {
    const raffle = this.state.raffles.get(raffleId);
    if (raffle === undefined || raffle.status !== RaffleStatus.IDLE) return false;
    return this.now > raffle.endsAt && this.ticket.supplyOf(raffleId) <= raffle.minTicketsThreshold;
  }

  /** Owner of ticket `randomWord mod supply`; recomputed on every call. */
  getWinner(raffleId: bigint): string {
    const raffle = this.state.raffles.get(raffleId);
    const drawn = raffle?.status === RaffleStatus.FULFILLED || raffle?.status === RaffleStatus.PROPAGATED;
    if (raffle === undefined || !drawn) {
      throw new ContractError("RaffleNotFulfilled", { raffleId });
    }
    const request = this.state.requests.get(raffle.requestId);
    if (request === undefined || !request.fulfilled) throw new ContractError("RaffleNotFulfilled", { raffleId });
    const supply = this.ticket.supplyOf(raffleId);
    return this.ticket.ownerOf(raffleId, request.randomWord % supply);
  }

  // ---------------------------------------------------------------------------
  // Raffle lifecycle
  // ---------------------------------------------------------------------------

  createRaffle(raffleId: bigint, params: RaffleParams, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const raffle = this.state.raffles.get(raffleId);
      if (raffle === undefined || raffle.status !== RaffleStatus.PRIZE_LOCKED) {
        throw new ContractError("PrizeNotLocked", { raffleId });
      }
      if (params.startsAt === 0n) throw new ContractError("RaffleNeedsStartTime");
      if (params.endsAt < params.startsAt + MIN_RAFFLE_DURATION || params.endsAt < this.now + MIN_RAFFLE_DURATION) {
        throw new ContractError("RaffleClosingTooSoon", { endsAt: params.endsAt });
      }

      raffle.status = RaffleStatus.IDLE;
      raffle.startsAt = params.startsAt;
      raffle.endsAt = params.endsAt;
      raffle.minTicketsThreshold = params.minTicketsThreshold;
      raffle.maxTicketSupply = params.maxTicketSupply;
      raffle.maxHoldings = params.maxHoldings;
      this.emit("NewRaffle", { id: raffleId });
    });
  }

  /**
   * Sells `ticketCount` tickets against a price coupon: an EIP-191 signature
   * by an API-role signer over buyer, nonce, raffle, count, expiry block and
   * the exact value sent.
   */
  buyTickets(
    raffleId: bigint,
    ticketCount: number,
    blockNumber: bigint,
    signature: string,
    overrides: PayableOverrides,
  ): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      if (!Number.isInteger(ticketCount) || ticketCount <= 0 || ticketCount > MAX_TICKETS_PER_PURCHASE) {
        throw new ContractError("InvalidTicketCount", { ticketCount });
      }
      const raffle = this.state.raffles.get(raffleId);
      if (raffle === undefined || raffle.startsAt > this.now) {
        throw new ContractError("RaffleHasNotStarted", { raffleId });
      }
      if (raffle.status !== RaffleStatus.IDLE || this.now > raffle.endsAt) {
        throw new ContractError("RaffleHasEnded", { raffleId });
      }

      const count = BigInt(ticketCount);
      const holdings = this.ticket.balanceOf(msg.sender, raffleId);
      const supply = this.ticket.supplyOf(raffleId);
      if (
        (raffle.maxHoldings > 0n && holdings + count > raffle.maxHoldings) ||
        (raffle.maxTicketSupply > 0n && supply + count > raffle.maxTicketSupply)
      ) {
        throw new ContractError("TooManyTickets", { raffleId });
      }
      if (BigInt(this.env.block.number) > blockNumber) throw new ContractError("ExpiredCoupon", { blockNumber });

      const nonce = this.getNonce(msg.sender);
      const hash = ticketCouponHash({ buyer: msg.sender, nonce, raffleId, ticketCount, blockNumber, value: msg.value });
      this.checkCoupon(hash, signature);

      this.state.nonces.set(msg.sender, nonce + 1n);
      const packed = raffle.participations.get(msg.sender) ?? EMPTY_PARTICIPATION;
      raffle.participations.set(msg.sender, recordPurchase(packed, msg.value, count));
      raffle.totalRaised += msg.value;
      this.state.lockedETH += msg.value;
      this.ticket.mint(msg.sender, raffleId, ticketCount, { from: this.address });
    });
  }

  /** Closes a raffle and asks the coordinator for one random word. */
  drawWinner(raffleId: bigint, overrides: Overrides): TransactionReceipt<bigint> {
    return this.execute(overrides, () => {
      const raffle = this.state.raffles.get(raffleId);
      if (raffle === undefined || raffle.status !== RaffleStatus.IDLE) {
        throw new ContractError("InvalidRaffle", { raffleId });
      }
      const supply = this.ticket.supplyOf(raffleId);
      if (supply === 0n) throw new ContractError("NoParticipants", { raffleId });
      if (this.now < raffle.endsAt && !isSoldOut(raffle, supply)) {
        throw new ContractError("RaffleIsStillOpen", { raffleId });
      }
      if (supply < raffle.minTicketsThreshold) throw new ContractError("TargetTicketsNotReached", { raffleId });

      const { keyHash, subscriptionId, requestConfirmations, callbackGasLimit } = this.vrf;
      const requestId = this.coordinator.requestRandomWords(
        keyHash,
        subscriptionId,
        requestConfirmations,
        callbackGasLimit,
        1,
        { from: this.address },
      ).result;

      this.state.requests.set(requestId, { raffleId, fulfilled: false, randomWord: 0n });
      raffle.requestId = requestId;
      raffle.status = RaffleStatus.REQUESTED;
      this.emit("RequestSent", { requestId, raffleId });
      return requestId;
    });
  }

  rawFulfillRandomWords(requestId: bigint, randomWords: bigint[], overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      if (msg.sender !== this.coordinator.address) {
        throw new ContractError("OnlyCoordinatorCanFulfill", { have: msg.sender, want: this.coordinator.address });
      }
      const request = this.state.requests.get(requestId);
      if (request === undefined || request.fulfilled) throw new ContractError("RequestNotFound", { requestId });
      const raffle = this.state.raffles.get(request.raffleId);
      if (raffle === undefined || raffle.status !== RaffleStatus.REQUESTED) {
        throw new ContractError("InvalidRaffle", { raffleId: request.raffleId });
      }
      if (randomWords.length === 0) throw new ContractError("MissingRandomWords", { requestId });

      request.fulfilled = true;
      request.randomWord = randomWords[0];
      raffle.status = RaffleStatus.FULFILLED;
      this.emit("WinnerDrawn", { requestId });
    });
  }

  /** Sends the winner to the prize side and releases the raffle's proceeds. */
  propagateRaffleWinner(
    prizeManager: string,
    chainSelector: bigint,
    raffleId: bigint,
    overrides: Overrides,
  ): TransactionReceipt<string> {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const raffle = this.state.raffles.get(raffleId);
      if (raffle === undefined || raffle.status !== RaffleStatus.FULFILLED) {
        throw new ContractError("InvalidRaffleStatus", { raffleId });
      }
      const winner = this.getWinner(raffleId);
      raffle.status = RaffleStatus.PROPAGATED;
      this.state.lockedETH -= raffle.totalRaised;
      const messageId = this.sendCCIPMessage(prizeManager, chainSelector, encodeWinnerDrawn(raffleId, winner));
      this.emit("WinnerPropagated", { raffleId, winner });
      return messageId;
    });
  }

  cancelRaffle(prizeManager: string, chainSelector: bigint, raffleId: bigint, overrides: Overrides): TransactionReceipt<string> {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const raffle = this.state.raffles.get(raffleId);
      if (raffle === undefined) throw new ContractError("InvalidRaffle", { raffleId });
      if (raffle.status === RaffleStatus.IDLE) {
        if (this.now <= raffle.endsAt) throw new ContractError("RaffleIsStillOpen", { raffleId });
        if (this.ticket.supplyOf(raffleId) > raffle.minTicketsThreshold) {
          throw new ContractError("TargetTicketsReached", { raffleId });
        }
      } else if (raffle.status !== RaffleStatus.PRIZE_LOCKED) {
        throw new ContractError("InvalidRaffle", { raffleId });
      }

      raffle.status = RaffleStatus.CANCELED;
      const messageId = this.sendCCIPMessage(prizeManager, chainSelector, encodeRaffleCanceled(raffleId));
      this.emit("RaffleCanceled", { raffleId });
      return messageId;
    });
  }

  /**
   * Returns each player's total spend on a canceled raffle. The batch is
   * all-or-nothing: one refunded or empty participant reverts every refund.
   */
  refundPlayers(raffleId: bigint, players: string[], overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, () => {
      const raffle = this.state.raffles.get(raffleId);
      if (raffle === undefined || raffle.status !== RaffleStatus.CANCELED) {
        throw new ContractError("InvalidRaffle", { raffleId });
      }

      for (const player of players.map((p) => getAddress(p))) {
        const packed = raffle.participations.get(player) ?? EMPTY_PARTICIPATION;
        const participation = unpackParticipation(packed);
        if (participation.refunded) throw new ContractError("PlayerAlreadyRefunded", { player });
        if (participation.totalSpent === 0n) throw new ContractError("NothingToSend", { player });

        raffle.participations.set(player, markRefunded(packed));
        this.state.lockedETH -= participation.totalSpent;
        this.sendETH(player, participation.totalSpent);
        this.emit("PlayerRefund", { raffleId, player, participation: { ...participation, refunded: true } });
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Admin withdrawals
  // ---------------------------------------------------------------------------

  withdrawTokens(token: string, amount: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const erc20 = this.env.getContract(token);
      if (!isERC20(erc20)) throw new ContractError("NotAToken", { token: getAddress(token) });
      erc20.transfer(msg.sender, amount, { from: this.address });
    });
  }

  /** Withdraws every wei not backing an open raffle. */
  withdrawETH(overrides: Overrides): TransactionReceipt<bigint> {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      const amount = this.balance - this.state.lockedETH;
      if (amount <= 0n) throw new ContractError("NothingToSend", { player: msg.sender });
      this.sendETH(msg.sender, amount);
      return amount;
    });
  }

  // ---------------------------------------------------------------------------
  // Inbound messages
  // ---------------------------------------------------------------------------

  protected handleCCIPMessage(message: Any2EVMMessage): void {
    const raffleId = decodePrizeLocked(message.data);
    const status = this.state.raffles.get(raffleId)?.status ?? RaffleStatus.NONE;
    if (status !== RaffleStatus.NONE) throw new ContractError("InvalidRaffleStatus", { raffleId, status });

    this.state.raffles.set(raffleId, {
      status: RaffleStatus.PRIZE_LOCKED,
      startsAt: 0n,
      endsAt: 0n,
      minTicketsThreshold: 0n,
      maxTicketSupply: 0n,
      maxHoldings: 0n,
      totalRaised: 0n,
      requestId: 0n,
      participations: new Map(),
    });
    this.emit("RafflePrizeLocked", {
      messageId: message.messageId,
      sourceChainSelector: message.sourceChainSelector,
      raffleId,
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private checkCoupon(hash: string, signature: string): void {
    let signer: string;
    try {
      signer = verifyMessage(getBytes(hash), signature);
    } catch (err) {
      throw new ContractError("Unauthorized", {}, { cause: err });
    }
    if (!this.hasRole(signer, Role.API)) throw new ContractError("Unauthorized");
  }

  private sendETH(to: string, amount: bigint): void {
    const result = this.sendValue(to, amount);
    if (!result.success) {
      throw new ContractError("ETHTransferFail", { to, amount }, { cause: result.error });
    }
  }
}

function isSoldOut(raffle: RaffleParams, supply: bigint): boolean {
  return raffle.maxTicketSupply > 0n && supply >= raffle.maxTicketSupply;
}
