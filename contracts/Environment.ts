import { getAddress, getCreateAddress } from "ethers";
import { ContractError } from "./errors.js";

/**
 * An in-process chain: block production, native balances, deployed contracts
 * and the event log.
 *
 * Every mutating contract call runs inside a frame opened by {@link execute}.
 * A frame snapshots all contract state, the balance ledger, deployments and
 * the log; a thrown error restores the snapshot so no call ever has a partial
 * effect.
 * Frames nest, which gives contract-to-contract calls the same revert scope
 * they have on an EVM chain.
 */

export type EventArgs = Readonly<Record<string, unknown>>;

export interface Log {
  address: string;
  name: string;
  args: EventArgs;
}

export interface Msg {
  sender: string;
  value: bigint;
}

export interface Block {
  number: number;
  timestamp: bigint;
}

export interface TransactionReceipt<T = void> {
  blockNumber: number;
  timestamp: bigint;
  from: string;
  to: string;
  events: Log[];
  result: T;
}

export interface Overrides {
  from: string;
}

export interface PayableOverrides extends Overrides {
  value?: bigint;
}

export type CallResult = { success: true } | { success: false; error: unknown };

export interface Account {
  readonly address: string;
  checkpoint(): () => void;
  supportsInterface(interfaceId: string): boolean;
  receiveEther?(msg: Msg): void;
}

export interface EnvironmentOptions {
  chainSelector: bigint;
  name?: string;
  genesisTimestamp?: bigint;
}

const DEFAULT_GENESIS_TIMESTAMP = 1_700_000_000n;

export class Environment {
  readonly chainSelector: bigint;
  readonly name: string;
  readonly time: TimeHelpers;

  private blockNumber = 0;
  private timestamp: bigint;
  private nextTimestamp: bigint | undefined;
  private balances = new Map<string, bigint>();
  private deployNonces = new Map<string, number>();
  private accounts = new Map<string, Account>();
  private logs: Log[] = [];
  private depth = 0;

  constructor(options: EnvironmentOptions) {
    this.chainSelector = options.chainSelector;
    this.name = options.name ?? `chain-${options.chainSelector}`;
    this.timestamp = options.genesisTimestamp ?? DEFAULT_GENESIS_TIMESTAMP;
    this.time = new TimeHelpers(this);
  }

  get block(): Block {
    return { number: this.blockNumber, timestamp: this.timestamp };
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  // ---------------------------------------------------------------------------
  // Accounts
  // ---------------------------------------------------------------------------

  allocateAddress(deployer: string): string {
    const from = getAddress(deployer);
    const nonce = this.deployNonces.get(from) ?? 0;
    this.deployNonces.set(from, nonce + 1);
    return getCreateAddress({ from, nonce });
  }

  register(account: Account): void {
    if (this.accounts.has(account.address)) {
      throw new Error(`Address already in use: ${account.address}`);
    }
    this.accounts.set(account.address, account);
  }

  getContract(address: string): Account | undefined {
    return this.accounts.get(getAddress(address));
  }

  isContract(address: string): boolean {
    return this.accounts.has(getAddress(address));
  }

  getBalance(address: string): bigint {
    return this.balances.get(getAddress(address)) ?? 0n;
  }

  setBalance(address: string, amount: bigint): void {
    if (amount < 0n) throw new RangeError("Balance cannot be negative");
    this.balances.set(getAddress(address), amount);
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  /**
   * Runs `body` as a call from `overrides.from` to `to`, forwarding
   * `overrides.value` first. A top-level call mines a new block.
   */
  execute<T>(to: string, overrides: PayableOverrides, body: (msg: Msg) => T): TransactionReceipt<T> {
    const from = getAddress(overrides.from);
    const target = getAddress(to);
    const value = overrides.value ?? 0n;
    if (value < 0n) throw new RangeError("Call value cannot be negative");

    const restore = this.checkpoint();
    const firstLog = this.logs.length;
    if (this.depth === 0) this.mine();

    this.depth++;
    try {
      if (value > 0n) this.moveBalance(from, target, value);
      const result = body({ sender: from, value });
      return {
        blockNumber: this.blockNumber,
        timestamp: this.timestamp,
        from,
        to: target,
        events: this.logs.slice(firstLog),
        result,
      };
    } catch (err) {
      restore();
      throw err;
    } finally {
      this.depth--;
    }
  }

  /**
   * Low-level value transfer. Contracts without a receive hook reject the
   * transfer; a rejecting or reverting receiver yields `success: false` and
   * leaves no trace of the inner frame.
   */
  sendValue(from: string, to: string, amount: bigint): CallResult {
    try {
      this.execute(to, { from, value: amount }, (msg) => {
        const receiver = this.accounts.get(getAddress(to));
        if (receiver === undefined) return;
        if (receiver.receiveEther === undefined) {
          throw new ContractError("NonPayableReceiver", { receiver: receiver.address });
        }
        receiver.receiveEther(msg);
      });
      return { success: true };
    } catch (error) {
      return { success: false, error };
    }
  }

  log(entry: Log): void {
    if (this.depth === 0) {
      throw new Error(`Event ${entry.name} emitted outside of a transaction`);
    }
    this.logs.push(entry);
  }

  getLogs(filter: { address?: string; name?: string } = {}): Log[] {
    const address = filter.address === undefined ? undefined : getAddress(filter.address);
    return this.logs.filter(
      (entry) =>
        (address === undefined || entry.address === address) &&
        (filter.name === undefined || entry.name === filter.name),
    );
  }

  // ---------------------------------------------------------------------------
  // Blocks
  // ---------------------------------------------------------------------------

  mine(): Block {
    this.blockNumber += 1;
    this.timestamp = this.nextTimestamp ?? this.timestamp + 1n;
    this.nextTimestamp = undefined;
    return this.block;
  }

  setNextBlockTimestamp(timestamp: bigint): void {
    if (timestamp <= this.timestamp) {
      throw new RangeError(`Timestamp ${timestamp} is not after latest block ${this.timestamp}`);
    }
    this.nextTimestamp = timestamp;
  }

  private moveBalance(from: string, to: string, amount: bigint): void {
    const available = this.balances.get(from) ?? 0n;
    if (available < amount) {
      throw new ContractError("InsufficientFunds", { account: from, balance: available, needed: amount });
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
  }

  private checkpoint(): () => void {
    const blockNumber = this.blockNumber;
    const timestamp = this.timestamp;
    const nextTimestamp = this.nextTimestamp;
    const balances = new Map(this.balances);
    const deployNonces = new Map(this.deployNonces);
    const accounts = new Map(this.accounts);
    const logCount = this.logs.length;
    const restorers = [...this.accounts.values()].map((account) => account.checkpoint());

    return () => {
      this.blockNumber = blockNumber;
      this.timestamp = timestamp;
      this.nextTimestamp = nextTimestamp;
      this.balances = balances;
      this.deployNonces = deployNonces;
      this.accounts = accounts;
      this.logs.length = logCount;
      for (const restore of restorers) restore();
    };
  }
}

/**
 * Clock controls in the shape of the hardhat network helpers.
 */
export class TimeHelpers {
  constructor(private readonly env: Environment) {}

  latest(): bigint {
    return this.env.block.timestamp;
  }

  latestBlock(): number {
    return this.env.block.number;
  }

  /** Mines an empty block `seconds` after the latest one. */
  increase(seconds: bigint | number): bigint {
    const delta = BigInt(seconds);
    if (delta <= 0n) throw new RangeError("Time can only move forward");
    this.env.setNextBlockTimestamp(this.env.block.timestamp + delta);
    return this.env.mine().timestamp;
  }

  increaseTo(timestamp: bigint): bigint {
    this.env.setNextBlockTimestamp(timestamp);
    return this.env.mine().timestamp;
  }

  mineBlocks(count: number): number {
    for (let i = 0; i < count; i++) this.env.mine();
    return this.env.block.number;
  }
}
