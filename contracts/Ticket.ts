import { ZeroAddress, getAddress } from "ethers";
import { Contract } from "./Contract.js";
import type { Environment, Overrides, TransactionReceipt } from "./Environment.js";
import { ContractError } from "./errors.js";
import { INTERFACE_IDS, type ITicket } from "./interfaces.js";

interface TicketRange {
  start: bigint;
  owner: string;
}

interface TicketState {
  owner: string;
  manager: string | undefined;
  supplies: Map<bigint, bigint>;
  // raffleId -> contiguous ranges in mint order; range i covers [start_i, start_{i+1})
  ranges: Map<bigint, TicketRange[]>;
  balances: Map<string, bigint>;
}

/**
 * Raffle tickets. Each raffle id is a token id; every mint allocates the next
 * contiguous block of ticket numbers so ownership by number is a binary
 * search over the mint ranges. Tickets are not transferable.
 */
export class Ticket extends Contract<TicketState> implements ITicket {
  constructor(env: Environment, deployer: string) {
    super(env, deployer, {
      owner: getAddress(deployer),
      manager: undefined,
      supplies: new Map(),
      ranges: new Map(),
      balances: new Map(),
    });
  }

  override supportsInterface(interfaceId: string): boolean {
    return (
      interfaceId === INTERFACE_IDS.TICKET ||
      interfaceId === INTERFACE_IDS.ERC1155 ||
      super.supportsInterface(interfaceId)
    );
  }

  get owner(): string {
    return this.state.owner;
  }

  get manager(): string | undefined {
    return this.state.manager;
  }

  /** Binds the one manager allowed to mint. */
  initializeManager(manager: string, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      if (msg.sender !== this.state.owner) throw new ContractError("NotOwner", { caller: msg.sender });
      if (this.state.manager !== undefined) throw new ContractError("AlreadyInitialized");
      this.state.manager = getAddress(manager);
      this.emit("TicketManagerInitialized", { manager: this.state.manager });
    });
  }

  mint(to: string, raffleId: bigint, amount: number, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      if (msg.sender !== this.state.manager) throw new ContractError("NotTicketManager");
      if (!Number.isInteger(amount) || amount <= 0) throw new ContractError("InvalidAmount", { amount });
      const recipient = getAddress(to);
      const startId = this.supplyOf(raffleId);
      const count = BigInt(amount);

      this.state.supplies.set(raffleId, startId + count);
      const ranges = this.state.ranges.get(raffleId) ?? [];
      ranges.push({ start: startId, owner: recipient });
      this.state.ranges.set(raffleId, ranges);
      const key = balanceKey(recipient, raffleId);
      this.state.balances.set(key, (this.state.balances.get(key) ?? 0n) + count);

      this.emit("NewTicket", { id: raffleId, startId, amount: count });
      this.emit("TransferSingle", { operator: msg.sender, from: ZeroAddress, to: recipient, id: raffleId, value: count });
    });
  }

  supplyOf(raffleId: bigint): bigint {
    return this.state.supplies.get(raffleId) ?? 0n;
  }

  balanceOf(account: string, raffleId: bigint): bigint {
    return this.state.balances.get(balanceKey(getAddress(account), raffleId)) ?? 0n;
  }

  ownerOf(raffleId: bigint, ticketNumber: bigint): string {
    if (ticketNumber < 0n || ticketNumber >= this.supplyOf(raffleId)) {
      throw new ContractError("InexistentTicket", { raffleId, ticketNumber });
    }
    const ranges = this.state.ranges.get(raffleId) ?? [];
    let low = 0;
    let high = ranges.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (ranges[mid].start <= ticketNumber) low = mid;
      else high = mid - 1;
    }
    return ranges[low].owner;
  }
}

function balanceKey(account: string, raffleId: bigint): string {
  return `${raffleId}:${account}`;
}
