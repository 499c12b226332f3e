import type {
  Account,
  CallResult,
  Environment,
  EventArgs,
  Msg,
  PayableOverrides,
  TransactionReceipt,
} from "./Environment.js";
import { INTERFACE_IDS } from "./interfaces.js";

/**
 * Base class for every deployed contract.
 *
 * Persistent storage lives in `state` and must stay structured-clonable
 * (plain objects, Maps, Sets, bigints); the environment snapshots it before
 * each call frame and puts it back when the frame reverts.
 */
export abstract class Contract<S extends object> implements Account {
  readonly address: string;
  protected readonly state: S;

  protected constructor(
    readonly env: Environment,
    deployer: string,
    initialState: S,
  ) {
    this.address = env.allocateAddress(deployer);
    this.state = initialState;
    env.register(this);
  }

  /**
   * Snapshot of `state`. Restoring writes the snapshot back into the live
   * objects, so references an outer frame still holds stay attached.
   */
  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    return () => {
      restoreInto(this.state, saved);
    };
  }

  supportsInterface(interfaceId: string): boolean {
    return interfaceId === INTERFACE_IDS.ERC165;
  }

  /** Native balance held by this contract. */
  get balance(): bigint {
    return this.env.getBalance(this.address);
  }

  protected execute<T>(overrides: PayableOverrides, body: (msg: Msg) => T): TransactionReceipt<T> {
    return this.env.execute(this.address, overrides, body);
  }

  protected emit(name: string, args: EventArgs = {}): void {
    this.env.log({ address: this.address, name, args });
  }

  protected sendValue(to: string, amount: bigint): CallResult {
    return this.env.sendValue(this.address, to, amount);
  }

  protected get now(): bigint {
    return this.env.block.timestamp;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set)
  );
}

/** Refills `live` from `saved` when both are the same kind of container; otherwise yields `saved`. */
function restoreInto(live: unknown, saved: unknown): unknown {
  if (live instanceof Map && saved instanceof Map) {
    for (const key of [...live.keys()]) {
      if (!saved.has(key)) live.delete(key);
    }
    for (const [key, value] of saved) live.set(key, restoreInto(live.get(key), value));
    return live;
  }
  if (live instanceof Set && saved instanceof Set) {
    live.clear();
    for (const value of saved) live.add(value);
    return live;
  }
  if (Array.isArray(live) && Array.isArray(saved)) {
    live.length = saved.length;
    saved.forEach((value, index) => {
      live[index] = restoreInto(live[index], value);
    });
    return live;
  }
  if (isRecord(live) && isRecord(saved)) {
    for (const key of Object.keys(live)) {
      if (!(key in saved)) delete live[key];
    }
    for (const [key, value] of Object.entries(saved)) live[key] = restoreInto(live[key], value);
    return live;
  }
  return saved;
}
