import { CallContext } from "./chain";

/**
 * Message-relay capability the coordinator consumes. The relay accepts a
 * send request, charges its fee in the token the caller registered, and
 * later invokes `messageProcess` on the recipient contract of the
 * destination chain. Its confirmation and validator policy are its own
 * business.
 */
export interface RelayGateway {
  readonly address: string;

  /** Token the relay charges the caller's fees in from now on. */
  setFeeToken(ctx: CallContext, feeToken: string): void;

  sendRequest(
    ctx: CallContext,
    recipient: string,
    destChainId: bigint,
    feeAmount: bigint,
    source: string,
    data: string,
    confirmations: number
  ): string;

  sendRequestExpress(
    ctx: CallContext,
    recipient: string,
    destChainId: bigint,
    feeAmount: bigint,
    source: string,
    data: string,
    confirmations: number
  ): string;
}

/** Inbound callback exposed to the relay by the receiving contract. */
export interface MessageReceiver {
  readonly address: string;

  messageProcess(
    ctx: CallContext,
    txId: string,
    sourceChainId: bigint,
    sender: string,
    recipientPlaceholder: string,
    amountPlaceholder: bigint,
    data: string
  ): void;
}

function hasFunction(value: unknown, name: string): boolean {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, name) === "function";
}

export function isRelayGateway(value: unknown): value is RelayGateway {
  return (
    hasFunction(value, "sendRequest") &&
    hasFunction(value, "sendRequestExpress") &&
    hasFunction(value, "setFeeToken")
  );
}

export function isMessageReceiver(value: unknown): value is MessageReceiver {
  return hasFunction(value, "messageProcess");
}
