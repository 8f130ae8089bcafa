/**
 * Gauss Stable Bridge - In-process relay network
 *
 * One gateway contract per chain. Senders register the token they pay fees
 * in; until they do, the gateway's default fee token applies. A send
 * request charges the fee, assigns
 * a txId and parks the message in the gateway's outbox (contract state, so
 * a reverted send leaves no message behind). The network later delivers
 * confirmed messages by calling messageProcess on the destination chain,
 * each txId at most once.
 *
 * Delivery order:
 *   - express messages before regular ones
 *   - then in send order
 * A reverted delivery stays pending and is retried on the next pass.
 */

import { ethers } from "ethers";
import { CallContext, Chain, ChainContract, Restore, ZERO_ADDRESS, toAddress } from "./chain";
import { FungibleToken, isFungibleToken, requireValidAmount } from "./ledger";
import { describeChain } from "./chain-role";
import { BridgeError, Reason, ensure, reasonOf } from "./errors";
import { RelayGateway, isMessageReceiver } from "./relay-gateway";
import { componentLogger } from "./logger";
import * as metrics from "./metrics";

const log = componentLogger("relay");

export interface RelayMessage {
  readonly txId: string;
  readonly sourceChainId: bigint;
  readonly destChainId: bigint;
  /** Contract that asked for the send. */
  readonly sender: string;
  /** Contract that receives messageProcess on the destination chain. */
  readonly recipient: string;
  readonly feeAmount: bigint;
  readonly source: string;
  readonly data: string;
  readonly confirmations: number;
  readonly express: boolean;
  /** Source-chain block the send was included in. */
  readonly sentAtBlock: number;
  readonly sequence: number;
}

export interface DeliveryFailure {
  txId: string;
  reason: string;
  attempts: number;
}

export interface DeliveryReport {
  delivered: string[];
  failed: DeliveryFailure[];
}

// ============================================================
//                     GATEWAY
// ============================================================

export class InMemoryRelayGateway extends ChainContract implements RelayGateway {
  readonly defaultFeeToken: string;

  private outbox: RelayMessage[] = [];
  private nonce = 0;
  private feeTokens = new Map<string, string>();

  constructor(chain: Chain, address: string, defaultFeeToken: string, private readonly network: InMemoryRelayNetwork) {
    super(chain, address);
    this.defaultFeeToken = toAddress(defaultFeeToken, "feeToken");
  }

  setFeeToken(ctx: CallContext, feeToken: string): void {
    const token = toAddress(feeToken, "feeToken");
    ensure(token !== ZERO_ADDRESS, Reason.ZERO_ADDRESS, "validation", { field: "feeToken" });
    this.tokenContract(token);
    this.feeTokens = new Map(this.feeTokens).set(ctx.sender, token);
    this.emit("FeeTokenSet", { sender: ctx.sender, feeToken: token });
  }

  /** Token `sender` pays its fees in. */
  feeTokenFor(sender: string): string {
    return this.feeTokens.get(toAddress(sender, "sender")) ?? this.defaultFeeToken;
  }

  sendRequest(
    ctx: CallContext,
    recipient: string,
    destChainId: bigint,
    feeAmount: bigint,
    source: string,
    data: string,
    confirmations: number
  ): string {
    return this.enqueue(ctx, recipient, destChainId, feeAmount, source, data, confirmations, false);
  }

  sendRequestExpress(
    ctx: CallContext,
    recipient: string,
    destChainId: bigint,
    feeAmount: bigint,
    source: string,
    data: string,
    confirmations: number
  ): string {
    return this.enqueue(ctx, recipient, destChainId, feeAmount, source, data, confirmations, true);
  }

  /** Messages sent through this gateway, in send order. */
  sent(): readonly RelayMessage[] {
    return this.outbox;
  }

  /** Fees collected so far in `token`. */
  collectedFees(token: string = this.defaultFeeToken): bigint {
    return this.tokenContract(toAddress(token, "token")).balanceOf(this.address);
  }

  /** Destination-side bookkeeping, called inside the delivery transaction. */
  recordDelivery(ctx: CallContext, message: RelayMessage): void {
    ensure(ctx.sender === this.address, Reason.NOT_AUTHORIZED, "authorization", { caller: ctx.sender });
    this.emit("MessageDelivered", {
      txId: message.txId,
      sourceChainId: message.sourceChainId,
      recipient: message.recipient,
    });
  }

  checkpoint(): Restore {
    const outbox = [...this.outbox];
    const nonce = this.nonce;
    const feeTokens = this.feeTokens;
    return () => {
      this.outbox = outbox;
      this.nonce = nonce;
      this.feeTokens = feeTokens;
    };
  }

  private enqueue(
    ctx: CallContext,
    recipient: string,
    destChainId: bigint,
    feeAmount: bigint,
    source: string,
    data: string,
    confirmations: number,
    express: boolean
  ): string {
    const target = toAddress(recipient, "recipient");
    ensure(target !== ZERO_ADDRESS, Reason.ZERO_ADDRESS, "validation", { field: "recipient" });
    ensure(this.network.hasChain(destChainId), Reason.RELAY_UNKNOWN_DESTINATION, "external", {
      destChainId: destChainId.toString(),
    });
    ensure(ethers.isHexString(data), Reason.INVALID_PACKAGE, "validation");
    requireValidAmount(feeAmount);

    if (feeAmount > 0n) {
      const feeToken = this.feeTokenFor(ctx.sender);
      const ok = this.tokenContract(feeToken).transferFrom(this.asCaller(), ctx.sender, this.address, feeAmount);
      ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token: feeToken, op: "transferFrom" });
    }

    const nonce = this.nonce;
    this.nonce += 1;
    const txId = ethers.solidityPackedKeccak256(
      ["uint256", "address", "address", "uint256", "bytes"],
      [ctx.chainId, this.address, ctx.sender, nonce, data]
    );
    const message: RelayMessage = {
      txId,
      sourceChainId: ctx.chainId,
      destChainId,
      sender: ctx.sender,
      recipient: target,
      feeAmount,
      source: toAddress(source, "source"),
      data,
      confirmations,
      express,
      // the block this transaction will be mined into
      sentAtBlock: this.chain.blockNumber + 1,
      sequence: this.network.nextSequence(),
    };
    this.outbox = [...this.outbox, message];

    this.emit("MessageSent", { txId, destChainId, sender: ctx.sender, feeAmount, express });
    return txId;
  }

  private tokenContract(token: string): FungibleToken {
    const contract = this.chain.getContract(token);
    if (!isFungibleToken(contract)) {
      throw new BridgeError(Reason.INVALID_CONFIGURATION, "invariant", { context: { feeToken: token } });
    }
    return contract;
  }
}

// ============================================================
//                     NETWORK
// ============================================================

export interface AttemptRecord {
  attempts: number;
  lastError?: string;
}

export class InMemoryRelayNetwork {
  private readonly gateways = new Map<bigint, InMemoryRelayGateway>();
  private readonly delivered = new Set<string>();
  private readonly attempts = new Map<string, AttemptRecord>();
  private sequence = 0;

  /** Deploy this network's gateway on `chain`, from `operator`. */
  attach(chain: Chain, feeToken: string, operator: string): InMemoryRelayGateway {
    ensure(!this.gateways.has(chain.chainId), Reason.INVALID_CONFIGURATION, "configuration", {
      chainId: chain.chainId.toString(),
    });
    const gateway = chain.deploy(
      new InMemoryRelayGateway(chain, chain.nextContractAddress(operator), feeToken, this)
    );
    this.gateways.set(chain.chainId, gateway);
    log.info("gateway attached", { network: describeChain(chain.chainId), gateway: gateway.address });
    return gateway;
  }

  hasChain(chainId: bigint): boolean {
    return this.gateways.has(chainId);
  }

  gateway(chainId: bigint): InMemoryRelayGateway {
    const gateway = this.gateways.get(chainId);
    if (!gateway) {
      throw new BridgeError(Reason.RELAY_UNKNOWN_DESTINATION, "external", {
        context: { chainId: chainId.toString() },
      });
    }
    return gateway;
  }

  nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }

  /** Undelivered messages, in delivery order. */
  pending(): RelayMessage[] {
    const messages = Array.from(this.gateways.values()).flatMap((gateway) => gateway.sent());
    return messages
      .filter((message) => !this.delivered.has(message.txId))
      .sort((a, b) => Number(b.express) - Number(a.express) || a.sequence - b.sequence);
  }

  isDelivered(txId: string): boolean {
    return this.delivered.has(txId);
  }

  isConfirmed(message: RelayMessage): boolean {
    const source = this.gateway(message.sourceChainId).chain;
    // the inclusion block counts as the first confirmation
    return source.blockNumber - message.sentAtBlock + 1 >= message.confirmations;
  }

  /** Number of delivery attempts made for `txId` and the last failure. */
  attemptsFor(txId: string): AttemptRecord {
    return this.attempts.get(txId) ?? { attempts: 0 };
  }

  /**
   * Deliver one message now. Throws when the message is unknown, already
   * delivered, not yet confirmed, or when the destination call reverts.
   */
  deliver(txId: string): void {
    ensure(!this.delivered.has(txId), Reason.RELAY_ALREADY_DELIVERED, "external", { txId });
    const message = this.pending().find((m) => m.txId === txId);
    if (!message) {
      throw new BridgeError(Reason.RELAY_UNKNOWN_MESSAGE, "external", { context: { txId } });
    }
    ensure(this.isConfirmed(message), Reason.RELAY_NOT_CONFIRMED, "external", {
      txId,
      confirmations: message.confirmations,
    });

    const destination = this.gateway(message.destChainId);
    const record = this.attemptsFor(txId);
    try {
      destination.chain.transact(destination.address, (ctx) => {
        const receiver = destination.chain.getContract(message.recipient);
        if (!isMessageReceiver(receiver)) {
          throw new BridgeError(Reason.RELAY_NO_RECEIVER, "external", {
            context: { recipient: message.recipient },
          });
        }
        receiver.messageProcess(
          ctx,
          message.txId,
          message.sourceChainId,
          message.sender,
          message.recipient,
          0n,
          message.data
        );
        destination.recordDelivery(ctx, message);
      });
    } catch (err) {
      const reason = reasonOf(err);
      this.attempts.set(txId, { attempts: record.attempts + 1, lastError: reason });
      metrics.relayDeliveriesTotal.inc({ status: "reverted" });
      log.warn("delivery reverted", { txId, reason, attempts: record.attempts + 1 });
      throw err;
    }

    this.attempts.set(txId, { attempts: record.attempts + 1 });
    this.delivered.add(txId);
    metrics.relayDeliveriesTotal.inc({ status: "delivered" });
    metrics.relayPendingMessages.set(this.pending().length);
    log.info("message delivered", {
      txId,
      from: describeChain(message.sourceChainId),
      to: describeChain(message.destChainId),
      express: message.express,
    });
  }

  /**
   * One relay pass: deliver every confirmed pending message. Reverted
   * deliveries are reported and stay pending.
   */
  deliverReady(): DeliveryReport {
    const report: DeliveryReport = { delivered: [], failed: [] };
    for (const message of this.pending()) {
      if (!this.isConfirmed(message)) continue;
      try {
        this.deliver(message.txId);
        report.delivered.push(message.txId);
      } catch (err) {
        report.failed.push({
          txId: message.txId,
          reason: reasonOf(err),
          attempts: this.attemptsFor(message.txId).attempts,
        });
      }
    }
    metrics.relayPendingMessages.set(this.pending().length);
    return report;
  }
}
