import { ZeroAddress, getAddress } from "ethers";
import { Contract } from "../Contract.js";
import type { Environment, Overrides, TransactionReceipt } from "../Environment.js";
import { ContractError } from "../errors.js";
import { INTERFACE_IDS, type IERC20 } from "../interfaces.js";

interface ERC20State {
  totalSupply: bigint;
  balances: Map<string, bigint>;
  allowances: Map<string, bigint>;
}

/**
 * Freely mintable fungible token used for prizes and as the fee currency.
 */
export class ERC20Mock extends Contract<ERC20State> implements IERC20 {
  constructor(
    env: Environment,
    deployer: string,
    readonly name: string,
    readonly symbol: string,
    readonly decimals = 18,
  ) {
    super(env, deployer, { totalSupply: 0n, balances: new Map(), allowances: new Map() });
  }

  override supportsInterface(interfaceId: string): boolean {
    return interfaceId === INTERFACE_IDS.ERC20 || super.supportsInterface(interfaceId);
  }

  get totalSupply(): bigint {
    return this.state.totalSupply;
  }

  balanceOf(owner: string): bigint {
    return this.state.balances.get(getAddress(owner)) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  mint(to: string, amount: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, () => {
      this.state.totalSupply += amount;
      this.credit(getAddress(to), amount);
      this.emit("Transfer", { from: ZeroAddress, to: getAddress(to), value: amount });
    });
  }

  transfer(to: string, amount: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.move(msg.sender, getAddress(to), amount);
    });
  }

  approve(spender: string, amount: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.state.allowances.set(allowanceKey(msg.sender, spender), amount);
      this.emit("Approval", { owner: msg.sender, spender: getAddress(spender), value: amount });
    });
  }

  transferFrom(from: string, to: string, amount: bigint, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      const key = allowanceKey(from, msg.sender);
      const allowed = this.state.allowances.get(key) ?? 0n;
      if (allowed < amount) {
        throw new ContractError("ERC20InsufficientAllowance", { spender: msg.sender, allowance: allowed, needed: amount });
      }
      this.state.allowances.set(key, allowed - amount);
      this.move(getAddress(from), getAddress(to), amount);
    });
  }

  private move(from: string, to: string, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new ContractError("ERC20InsufficientBalance", { sender: from, balance, needed: amount });
    }
    this.state.balances.set(from, balance - amount);
    this.credit(to, amount);
    this.emit("Transfer", { from, to, value: amount });
  }

  private credit(account: string, amount: bigint): void {
    this.state.balances.set(account, this.balanceOf(account) + amount);
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${getAddress(owner)}:${getAddress(spender)}`;
}
