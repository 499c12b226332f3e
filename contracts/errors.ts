/**
 * Custom errors raised by the raffle contracts.
 *
 * Every revert carries a distinguishable name so off-chain callers can decide
 * whether to retry, escalate or alert. `String(err)` always contains the name.
 */

export type ErrorArgs = Readonly<Record<string, unknown>>;

export class ContractError extends Error {
  readonly errorName: string;
  readonly args: ErrorArgs;

  constructor(errorName: string, args: ErrorArgs = {}, options?: { cause?: unknown }) {
    super(formatMessage(errorName, args), options);
    this.name = "ContractError";
    this.errorName = errorName;
    this.args = args;
  }
}

// Panic codes follow the EVM numbering.
export const PanicCode = {
  ARITHMETIC_OVERFLOW: 0x11,
  ENUM_CONVERSION: 0x21,
} as const;

export type PanicCode = typeof PanicCode[keyof typeof PanicCode];

/**
 * Fatal fault: the counterpart or the channel is misconfigured, or an
 * arithmetic bound was crossed. Never retried.
 */
export class PanicError extends Error {
  readonly code: PanicCode;

  constructor(code: PanicCode, detail: string) {
    super(`Panic(0x${code.toString(16)}): ${detail}`);
    this.name = "PanicError";
    this.code = code;
  }
}

export function isContractError(err: unknown, errorName?: string): err is ContractError {
  if (!(err instanceof ContractError)) return false;
  return errorName === undefined || err.errorName === errorName;
}

function formatMessage(errorName: string, args: ErrorArgs): string {
  const entries = Object.entries(args);
  if (entries.length === 0) return `reverted with custom error '${errorName}()'`;
  const rendered = entries.map(([key, value]) => `${key}=${String(value)}`).join(", ");
  return `reverted with custom error '${errorName}(${rendered})'`;
}
