import { isAddress, isHexString } from "ethers";
import type { FeeSchedule } from "./mocks/CCIPRouterMock.js";
import type { VRFSettings } from "./TicketManager.js";

export type Env = Readonly<Record<string, string | undefined>>;

export interface ChainConfig {
  name: string;
  chainSelector: bigint;
}

export interface CCIPConfig extends FeeSchedule {
  extraArgs: string;
}

export interface RaffleConfig {
  prizeChain: ChainConfig;
  ticketChain: ChainConfig;
  ccip: CCIPConfig;
  vrf: VRFSettings;
  // address granted the admin role when set; otherwise the deployer keeps it alone
  admin: string | undefined;
}

export interface RaffleUserConfig {
  prizeChain?: Partial<ChainConfig>;
  ticketChain?: Partial<ChainConfig>;
  ccip?: Partial<CCIPConfig>;
  vrf?: Partial<VRFSettings>;
  admin?: string;
}

// Chain selectors of the public test networks the protocol was first run on.
const DEFAULT_PRIZE_CHAIN_SELECTOR = 16015286601757825753n;
const DEFAULT_TICKET_CHAIN_SELECTOR = 3478487238524512106n;
const MAX_UINT64 = (1n << 64n) - 1n;
const MAX_CALLBACK_GAS_LIMIT = 2_500_000;

export function requireEnv(name: string, env: Env = process.env): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function optionalEnv(name: string, env: Env): string | undefined {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : undefined;
}

function parseBigInt(name: string, raw: string, min: bigint, max: bigint): bigint {
  let value: bigint;
  try {
    value = BigInt(raw);
  } catch (err) {
    throw new Error(`${name} must be an integer (got ${raw})`, { cause: err });
  }
  if (value < min || value > max) {
    throw new Error(`${name} must be between ${min} and ${max} (got ${raw})`);
  }
  return value;
}

function parseInteger(name: string, raw: string, min: number, max: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max} (got ${raw})`);
  }
  return value;
}

function parseBytes32(name: string, raw: string): string {
  if (!isHexString(raw, 32)) {
    throw new Error(`${name} must be a 32-byte hex string (got ${raw})`);
  }
  return raw;
}

/** Reads the protocol settings from the environment, falling back to defaults. */
export function loadConfig(env: Env = process.env): RaffleConfig {
  const extraArgs = optionalEnv("CCIP_EXTRA_ARGS", env) ?? "0x";
  if (!isHexString(extraArgs)) {
    throw new Error(`CCIP_EXTRA_ARGS must be a hex string (got ${extraArgs})`);
  }

  const admin = optionalEnv("ADMIN_ADDRESS", env);
  if (admin !== undefined && !isAddress(admin)) {
    throw new Error(`ADMIN_ADDRESS is not a valid address: ${admin}`);
  }

  return {
    prizeChain: {
      name: optionalEnv("PRIZE_CHAIN_NAME", env) ?? "prize-chain",
      chainSelector: parseBigInt(
        "PRIZE_CHAIN_SELECTOR",
        optionalEnv("PRIZE_CHAIN_SELECTOR", env) ?? DEFAULT_PRIZE_CHAIN_SELECTOR.toString(),
        1n,
        MAX_UINT64,
      ),
    },
    ticketChain: {
      name: optionalEnv("TICKET_CHAIN_NAME", env) ?? "ticket-chain",
      chainSelector: parseBigInt(
        "TICKET_CHAIN_SELECTOR",
        optionalEnv("TICKET_CHAIN_SELECTOR", env) ?? DEFAULT_TICKET_CHAIN_SELECTOR.toString(),
        1n,
        MAX_UINT64,
      ),
    },
    ccip: {
      baseFee: parseBigInt("CCIP_BASE_FEE", optionalEnv("CCIP_BASE_FEE", env) ?? "100000000000000000", 0n, MAX_UINT64),
      feePerByte: parseBigInt("CCIP_FEE_PER_BYTE", optionalEnv("CCIP_FEE_PER_BYTE", env) ?? "1000000000000", 0n, MAX_UINT64),
      extraArgs,
    },
    vrf: {
      keyHash: parseBytes32("VRF_KEY_HASH", optionalEnv("VRF_KEY_HASH", env) ?? `0x${"00".repeat(32)}`),
      subscriptionId: parseBigInt("VRF_SUBSCRIPTION_ID", optionalEnv("VRF_SUBSCRIPTION_ID", env) ?? "1", 0n, MAX_UINT64),
      requestConfirmations: parseInteger(
        "VRF_REQUEST_CONFIRMATIONS",
        optionalEnv("VRF_REQUEST_CONFIRMATIONS", env) ?? "3",
        1,
        200,
      ),
      callbackGasLimit: parseInteger(
        "VRF_CALLBACK_GAS_LIMIT",
        optionalEnv("VRF_CALLBACK_GAS_LIMIT", env) ?? "2500000",
        1,
        MAX_CALLBACK_GAS_LIMIT,
      ),
    },
    admin,
  };
}

/**
 * Resolves the project configuration: explicit values win over the
 * environment. The two chains must have distinct selectors.
 */
export function defineConfig(user: RaffleUserConfig = {}, env: Env = process.env): RaffleConfig {
  const base = loadConfig(env);
  const config: RaffleConfig = {
    prizeChain: { ...base.prizeChain, ...user.prizeChain },
    ticketChain: { ...base.ticketChain, ...user.ticketChain },
    ccip: { ...base.ccip, ...user.ccip },
    vrf: { ...base.vrf, ...user.vrf },
    admin: user.admin ?? base.admin,
  };
  if (config.prizeChain.chainSelector === config.ticketChain.chainSelector) {
    throw new Error(`Prize and ticket chains share chain selector ${config.prizeChain.chainSelector}`);
  }
  if (config.admin !== undefined && !isAddress(config.admin)) {
    throw new Error(`admin is not a valid address: ${config.admin}`);
  }
  return config;
}
