/**
 * Gauss Stable Bridge - Error taxonomy
 *
 * Every rejected call surfaces a BridgeError whose message is a short,
 * stable reason string. Callers match on `reason`, never on free text.
 */

export type ErrorCategory =
  | "configuration"
  | "authorization"
  | "validation"
  | "invariant"
  | "external";

/** Stable reason strings, grouped by the component that raises them. */
export const Reason = {
  // Access control
  NOT_OWNER: "Ownable: caller is not the owner",
  ZERO_OWNER: "Ownable: new owner is the zero address",
  PAUSED: "Pausable: paused",
  NOT_PAUSED: "Pausable: not paused",
  REENTRANT_CALL: "ReentrancyGuard: reentrant call",

  // Lifecycle / configuration
  ALREADY_INITIALIZED: "already initialized",
  NOT_INITIALIZED: "not initialized",
  ZERO_ADDRESS: "zero address",
  INVALID_ADDRESS: "invalid address",
  UNSUPPORTED_CHAIN: "unsupported chain",
  INVALID_CONFIGURATION: "invalid configuration",

  // Wrapped token
  NOT_AUTHORIZED: "Address not authorized",
  MINT_HOME_ONLY: "Minting only supported on the Gauss Chain",
  RECOVER_AWAY_ONLY: "Recovering only supported on the 'Away' Chain",

  // Bridge coordinator
  NOT_RELAY: "caller is not the bridge",
  UNKNOWN_SENDER: "unknown sender",
  UNEXPECTED_SOURCE_CHAIN: "unexpected source chain",
  RECIPIENT_ZERO: "recipient is zero address",
  AMOUNT_TOO_LOW: "amount too low",
  NET_AMOUNT_ZERO: "net amount is zero",
  INVALID_PACKAGE: "invalid package",
  TOKEN_CALL_FAILED: "token call failed",

  // Ledger
  INVALID_AMOUNT: "ERC20: invalid amount",
  TRANSFER_EXCEEDS_BALANCE: "ERC20: transfer amount exceeds balance",
  BURN_EXCEEDS_BALANCE: "ERC20: burn amount exceeds balance",
  INSUFFICIENT_ALLOWANCE: "ERC20: insufficient allowance",
  TRANSFER_FROM_ZERO: "ERC20: transfer from the zero address",
  TRANSFER_TO_ZERO: "ERC20: transfer to the zero address",
  MINT_TO_ZERO: "ERC20: mint to the zero address",
  BURN_FROM_ZERO: "ERC20: burn from the zero address",
  APPROVE_FROM_ZERO: "ERC20: approve from the zero address",
  APPROVE_TO_ZERO: "ERC20: approve to the zero address",

  // Chain / native currency
  NATIVE_EXCEEDS_BALANCE: "native transfer amount exceeds balance",
  ADDRESS_IN_USE: "address already in use",
  NO_CONTRACT: "no contract at address",
  NESTED_TRANSACTION: "nested transaction",

  // Relay
  RELAY_UNKNOWN_DESTINATION: "relay: unknown destination chain",
  RELAY_UNKNOWN_MESSAGE: "relay: unknown message",
  RELAY_ALREADY_DELIVERED: "relay: message already delivered",
  RELAY_NOT_CONFIRMED: "relay: message not confirmed",
  RELAY_NO_RECEIVER: "relay: recipient cannot receive messages",
} as const;

export type ReasonString = (typeof Reason)[keyof typeof Reason];

export interface BridgeErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class BridgeError extends Error {
  public readonly reason: string;
  public readonly category: ErrorCategory;
  public readonly context: Record<string, unknown>;

  constructor(reason: string, category: ErrorCategory, options: BridgeErrorOptions = {}) {
    super(reason, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BridgeError";
    this.reason = reason;
    this.category = category;
    this.context = options.context ?? {};

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      reason: this.reason,
      category: this.category,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export function isBridgeError(err: unknown): err is BridgeError {
  return err instanceof BridgeError;
}

/**
 * Abort the current call unless `condition` holds.
 */
export function ensure(
  condition: unknown,
  reason: string,
  category: ErrorCategory,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new BridgeError(reason, category, { context });
  }
}

/** Reason string of any thrown value, for logs and metric labels. */
export function reasonOf(err: unknown): string {
  if (isBridgeError(err)) return err.reason;
  if (err instanceof Error) return err.message;
  return String(err);
}
