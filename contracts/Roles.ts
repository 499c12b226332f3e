import { getAddress, toBeHex } from "ethers";
import { Contract } from "./Contract.js";
import type { Environment, Overrides, TransactionReceipt } from "./Environment.js";
import { ContractError } from "./errors.js";

export const Role = {
  ADMIN: 0,
  API: 1,
} as const;

export type Role = typeof Role[keyof typeof Role];

export interface RolesState {
  // address -> bitfield, bit n set when the address holds role n
  roles: Map<string, bigint>;
}

/**
 * Capability table keyed by address. The deployer starts as admin; only
 * admins grant or revoke roles.
 */
export abstract class Roles<S extends RolesState> extends Contract<S> {
  protected constructor(env: Environment, deployer: string, initialState: S) {
    super(env, deployer, initialState);
    this.state.roles.set(getAddress(deployer), 1n << BigInt(Role.ADMIN));
  }

  setRole(user: string, role: number, status: boolean, overrides: Overrides): TransactionReceipt {
    return this.execute(overrides, (msg) => {
      this.checkRole(msg.sender, Role.ADMIN);
      if (!Number.isInteger(role) || role < 0 || role > 255) {
        throw new ContractError("InvalidRole", { role });
      }
      const account = getAddress(user);
      const bit = 1n << BigInt(role);
      const current = this.state.roles.get(account) ?? 0n;
      this.state.roles.set(account, status ? current | bit : current & ~bit);
      this.emit("RoleUpdated", { user: account, role, status });
    });
  }

  /** Role bitfield as a 32-byte hex word. */
  getRoles(user: string): string {
    return toBeHex(this.state.roles.get(getAddress(user)) ?? 0n, 32);
  }

  hasRole(user: string, role: number): boolean {
    const bits = this.state.roles.get(getAddress(user)) ?? 0n;
    return (bits & (1n << BigInt(role))) !== 0n;
  }

  protected checkRole(user: string, role: number): void {
    if (!this.hasRole(user, role)) {
      throw new ContractError("MissingRole", { user: getAddress(user), role });
    }
  }
}
