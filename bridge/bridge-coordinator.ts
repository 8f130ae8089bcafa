/**
 * Gauss Stable Bridge - Bridge Coordinator
 *
 * One instance per chain, deployed at the same address on both sides.
 *
 * Outbound (initiateTransfer):
 *   1. Pull `amount` of the local asset from the caller
 *   2. Home: burn the net amount. Away: keep it locked in custody
 *   3. Encode {recipient, netAmount, source} and hand it to the relay
 *
 * Inbound (messageProcess, relay only):
 *   1. Check the message came from the twin on the configured remote chain
 *   2. Decode the package
 *   3. Home: mint the net amount. Away: release it from custody
 *
 * The fee is charged once, on the originating chain. When the fee token is
 * the local asset it is subtracted from the amount; otherwise it is pulled
 * from the caller on top of it. The package always carries the net amount
 * and the receiving side applies it verbatim.
 * Replay protection is the relay's job: nothing is recorded per txId here.
 */

import { ethers } from "ethers";
import { CallContext, Chain, ChainContract, Restore, ZERO_ADDRESS, toAddress } from "./chain";
import { Ownable, Pausable, ReentrancyGuard } from "./access";
import {
  FungibleToken,
  MAX_UINT256,
  MintableToken,
  isFungibleToken,
  isMintableToken,
  requireValidAmount,
} from "./ledger";
import { ChainRole, ChainRoleOptions, DEFAULT_CHAIN_ROLE_OPTIONS, RoleLatch, describeChain } from "./chain-role";
import { GUD_DECIMALS } from "./wrapped-stable";
import { BridgeError, Reason, ensure, reasonOf } from "./errors";
import { MessageReceiver, RelayGateway, isRelayGateway } from "./relay-gateway";
import { decodeTransferPackage, encodeTransferPackage } from "./transfer-package";
import { componentLogger } from "./logger";
import * as metrics from "./metrics";

const log = componentLogger("bridge-coordinator");

// ============================================================
//                     CONFIGURATION
// ============================================================

export interface BridgeInitParams {
  /** Relay gateway trusted to deliver inbound messages. */
  relay: string;
  /** Token the relay charges its fee in. */
  feeToken: string;
  /** Token locked (away) or burned (home) on outbound transfers. */
  localAsset: string;
  /** Token released (away) or minted (home) on inbound transfers. */
  pairedAsset: string;
  feeAmount: bigint;
  confirmations: number;
  /** Chain the twin coordinator lives on. */
  remoteChainId: bigint;
}

interface BridgeSettings {
  relay: string;
  feeToken: string;
  localAsset: string;
  pairedAsset: string;
  feeAmount: bigint;
  confirmations: number;
  remoteChainId: bigint;
}

export interface BridgeConfigView {
  relayAddress: string;
  feeTokenAddress: string;
  localAssetAddress: string;
  pairedAssetAddress: string;
  feeAmount: bigint;
  confirmations: number;
  remoteChainId: bigint;
  isHomeChain: boolean;
  initialized: boolean;
}

export interface TransferQuote {
  amount: bigint;
  fee: bigint;
  netAmount: bigint;
  /** False when the fee is paid in a separate token on top of `amount`. */
  feeDeducted: boolean;
}

/**
 * Split a gross amount into fee and net. With `feeDeducted` the amount must
 * exceed the fee floor; otherwise the whole amount travels and only has to
 * be positive. Either way the net amount is at least one unit.
 */
export function quoteTransfer(amount: bigint, feeAmount: bigint, feeDeducted = true): TransferQuote {
  const floor = feeDeducted ? feeAmount : 0n;
  ensure(amount > floor, Reason.AMOUNT_TOO_LOW, "validation", {
    amount: amount.toString(),
    feeAmount: feeAmount.toString(),
  });
  const netAmount = amount - floor;
  ensure(netAmount > 0n, Reason.NET_AMOUNT_ZERO, "validation");
  return { amount, fee: feeAmount, netAmount, feeDeducted };
}

function requireConfirmations(confirmations: number): void {
  ensure(
    Number.isSafeInteger(confirmations) && confirmations >= 1,
    Reason.INVALID_CONFIGURATION,
    "configuration",
    { confirmations }
  );
}

function requireNonZero(value: string, field: string): string {
  const address = toAddress(value, field);
  ensure(address !== ZERO_ADDRESS, Reason.ZERO_ADDRESS, "configuration", { field });
  return address;
}

// ============================================================
//                     COORDINATOR
// ============================================================

export class BridgeCoordinator extends ChainContract implements MessageReceiver {
  private readonly ownable: Ownable;
  private readonly pausable = new Pausable((event, args) => this.emit(event, args));
  private readonly guard = new ReentrancyGuard();
  private readonly latch: RoleLatch;
  private settings: BridgeSettings | null = null;

  constructor(
    chain: Chain,
    address: string,
    owner: string,
    roleOptions: ChainRoleOptions = DEFAULT_CHAIN_ROLE_OPTIONS
  ) {
    super(chain, address);
    this.ownable = new Ownable(owner, (event, args) => this.emit(event, args));
    this.latch = new RoleLatch(roleOptions);
  }

  // ── Views ──────────────────────────────────────────────────

  owner(): string {
    return this.ownable.owner();
  }

  paused(): boolean {
    return this.pausable.paused();
  }

  get initialized(): boolean {
    return this.latch.initialized;
  }

  isHomeChain(): boolean {
    return this.latch.isHome();
  }

  role(): ChainRole {
    return this.latch.role();
  }

  /** Zero-valued until init. */
  config(): BridgeConfigView {
    const s = this.settings;
    return {
      relayAddress: s?.relay ?? ZERO_ADDRESS,
      feeTokenAddress: s?.feeToken ?? ZERO_ADDRESS,
      localAssetAddress: s?.localAsset ?? ZERO_ADDRESS,
      pairedAssetAddress: s?.pairedAsset ?? ZERO_ADDRESS,
      feeAmount: s?.feeAmount ?? 0n,
      confirmations: s?.confirmations ?? 0,
      remoteChainId: s?.remoteChainId ?? 0n,
      isHomeChain: this.latch.isHome(),
      initialized: this.latch.initialized,
    };
  }

  quote(amount: bigint): TransferQuote {
    const settings = this.requireSettings();
    return quoteTransfer(amount, settings.feeAmount, settings.feeToken === settings.localAsset);
  }

  // ── Initialization ─────────────────────────────────────────

  /** One-time setup. Resolves and fixes the chain role. */
  init(ctx: CallContext, params: BridgeInitParams): ChainRole {
    this.ownable.onlyOwner(ctx);
    ensure(!this.latch.initialized, Reason.ALREADY_INITIALIZED, "configuration");

    const settings: BridgeSettings = {
      relay: requireNonZero(params.relay, "relay"),
      feeToken: requireNonZero(params.feeToken, "feeToken"),
      localAsset: requireNonZero(params.localAsset, "localAsset"),
      pairedAsset: requireNonZero(params.pairedAsset, "pairedAsset"),
      feeAmount: params.feeAmount,
      confirmations: params.confirmations,
      remoteChainId: params.remoteChainId,
    };
    requireValidAmount(settings.feeAmount);
    requireConfirmations(settings.confirmations);
    ensure(
      settings.remoteChainId > 0n && settings.remoteChainId !== ctx.chainId,
      Reason.INVALID_CONFIGURATION,
      "configuration",
      { remoteChainId: settings.remoteChainId.toString() }
    );

    const role = this.latch.initialize(ctx.chainId);
    this.settings = settings;
    this.approveFeeSpender(settings.feeToken, settings.relay, MAX_UINT256);
    this.relay(settings).setFeeToken(this.asCaller(), settings.feeToken);

    this.emit("Initialized", { role, relay: settings.relay, remoteChainId: settings.remoteChainId });
    log.info("coordinator initialized", {
      address: this.address,
      network: describeChain(ctx.chainId),
      role,
      remote: describeChain(settings.remoteChainId),
      feeAmount: settings.feeAmount.toString(),
      confirmations: settings.confirmations,
    });
    return role;
  }

  // ── Outbound ───────────────────────────────────────────────

  /**
   * Lock or burn `amount` of the caller's local asset and ask the relay to
   * credit `recipient` with the net amount on the remote chain.
   * Returns the relay's transaction id unchanged.
   */
  initiateTransfer(
    ctx: CallContext,
    recipient: string,
    amount: bigint,
    source: string,
    express = false
  ): string {
    try {
      return this.guard.nonReentrant(() => this.executeTransfer(ctx, recipient, amount, source, express));
    } catch (err) {
      this.reject("initiateTransfer", err, { sender: ctx.sender, amount: amount.toString() });
      throw err;
    }
  }

  private executeTransfer(
    ctx: CallContext,
    recipient: string,
    amount: bigint,
    source: string,
    express: boolean
  ): string {
    const settings = this.requireSettings();
    this.pausable.whenNotPaused();
    const to = toAddress(recipient, "recipient");
    ensure(to !== ZERO_ADDRESS, Reason.RECIPIENT_ZERO, "validation");
    const origin = toAddress(source, "source");
    requireValidAmount(amount);
    const { netAmount, fee, feeDeducted } = quoteTransfer(
      amount,
      settings.feeAmount,
      settings.feeToken === settings.localAsset
    );

    // Token movement strictly before the relay call
    const role = this.latch.role();
    switch (role) {
      case "away":
        this.pull(settings.localAsset, ctx.sender, amount);
        break;
      case "home":
        this.pull(settings.localAsset, ctx.sender, amount);
        this.mintable(settings.localAsset).burn(this.asCaller(), netAmount);
        break;
      default: {
        const unexpected: never = role;
        throw new BridgeError(Reason.INVALID_CONFIGURATION, "invariant", {
          context: { role: String(unexpected) },
        });
      }
    }
    // the relay collects this from the coordinator's balance
    if (!feeDeducted && fee > 0n) {
      this.pull(settings.feeToken, ctx.sender, fee);
    }

    const data = encodeTransferPackage({ recipient: to, amount: netAmount, source: origin });
    const relay = this.relay(settings);
    const args = [
      this.asCaller(),
      this.address,
      settings.remoteChainId,
      settings.feeAmount,
      origin,
      data,
      settings.confirmations,
    ] as const;
    const txId = express ? relay.sendRequestExpress(...args) : relay.sendRequest(...args);

    this.emit("TransferInitiated", {
      txId,
      sender: ctx.sender,
      recipient: to,
      amount,
      netAmount,
      fee,
      express,
    });
    metrics.transfersInitiatedTotal.inc({ role, express: String(express) });
    metrics.transferNetAmount.observe(
      Number(ethers.formatUnits(netAmount, this.decimalsOf(this.fungible(settings.localAsset))))
    );
    log.info("transfer initiated", {
      txId,
      role,
      sender: ctx.sender,
      recipient: to,
      netAmount: netAmount.toString(),
      express,
    });
    return txId;
  }

  // ── Inbound ────────────────────────────────────────────────

  /**
   * Relay callback. The recipient and amount placeholders belong to the
   * relay's generic envelope and are ignored; the package carries the real
   * end-user recipient and net amount.
   */
  messageProcess(
    ctx: CallContext,
    txId: string,
    sourceChainId: bigint,
    sender: string,
    _recipientPlaceholder: string,
    _amountPlaceholder: bigint,
    data: string
  ): void {
    try {
      this.guard.nonReentrant(() => this.executeDelivery(ctx, txId, sourceChainId, sender, data));
    } catch (err) {
      this.reject("messageProcess", err, { txId, caller: ctx.sender });
      throw err;
    }
  }

  private executeDelivery(
    ctx: CallContext,
    txId: string,
    sourceChainId: bigint,
    sender: string,
    data: string
  ): void {
    const settings = this.requireSettings();
    ensure(ctx.sender === settings.relay, Reason.NOT_RELAY, "authorization", { caller: ctx.sender });
    ensure(toAddress(sender, "sender") === this.address, Reason.UNKNOWN_SENDER, "authorization", {
      sender,
    });
    ensure(sourceChainId === settings.remoteChainId, Reason.UNEXPECTED_SOURCE_CHAIN, "authorization", {
      sourceChainId: sourceChainId.toString(),
    });

    const pkg = decodeTransferPackage(data);
    const role = this.latch.role();
    switch (role) {
      case "home":
        this.mintable(settings.pairedAsset).mint(this.asCaller(), pkg.recipient, pkg.amount);
        break;
      case "away": {
        const ok = this.fungible(settings.pairedAsset).transfer(this.asCaller(), pkg.recipient, pkg.amount);
        ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token: settings.pairedAsset, op: "transfer" });
        break;
      }
      default: {
        const unexpected: never = role;
        throw new BridgeError(Reason.INVALID_CONFIGURATION, "invariant", {
          context: { role: String(unexpected) },
        });
      }
    }

    this.emit("TransferCompleted", {
      txId,
      sourceChainId,
      recipient: pkg.recipient,
      amount: pkg.amount,
      source: pkg.source,
    });
    metrics.messagesProcessedTotal.inc({ role });
    log.info("transfer completed", {
      txId,
      role,
      recipient: pkg.recipient,
      amount: pkg.amount.toString(),
    });
  }

  // ── Admin ──────────────────────────────────────────────────

  /** Point the coordinator at a new relay, moving the fee approval with it. */
  updateBridge(ctx: CallContext, newRelay: string): void {
    this.ownable.onlyOwner(ctx);
    const settings = this.requireSettings();
    const relay = requireNonZero(newRelay, "relay");

    this.approveFeeSpender(settings.feeToken, settings.relay, 0n);
    this.approveFeeSpender(settings.feeToken, relay, MAX_UINT256);
    const next = { ...settings, relay };
    this.settings = next;
    this.relay(next).setFeeToken(this.asCaller(), settings.feeToken);
    this.emit("BridgeUpdated", { previous: settings.relay, current: relay });
    log.info("relay updated", { previous: settings.relay, current: relay });
  }

  updateFeeToken(ctx: CallContext, newFeeToken: string): void {
    this.ownable.onlyOwner(ctx);
    const settings = this.requireSettings();
    const feeToken = requireNonZero(newFeeToken, "feeToken");

    this.approveFeeSpender(settings.feeToken, settings.relay, 0n);
    this.approveFeeSpender(feeToken, settings.relay, MAX_UINT256);
    this.settings = { ...settings, feeToken };
    this.relay(settings).setFeeToken(this.asCaller(), feeToken);
    this.emit("FeeTokenUpdated", { previous: settings.feeToken, current: feeToken });
    log.info("fee token updated", {
      previous: settings.feeToken,
      current: feeToken,
      deducted: feeToken === settings.localAsset,
    });
  }

  updateFeeAmount(ctx: CallContext, feeAmount: bigint): void {
    this.ownable.onlyOwner(ctx);
    const settings = this.requireSettings();
    requireValidAmount(feeAmount);
    this.settings = { ...settings, feeAmount };
    this.emit("FeeAmountUpdated", { previous: settings.feeAmount, current: feeAmount });
  }

  updateConfirmations(ctx: CallContext, confirmations: number): void {
    this.ownable.onlyOwner(ctx);
    const settings = this.requireSettings();
    requireConfirmations(confirmations);
    this.settings = { ...settings, confirmations };
    this.emit("ConfirmationsUpdated", { previous: settings.confirmations, current: confirmations });
  }

  pause(ctx: CallContext): void {
    this.ownable.onlyOwner(ctx);
    this.pausable.pause(ctx.sender);
  }

  unpause(ctx: CallContext): void {
    this.ownable.onlyOwner(ctx);
    this.pausable.unpause(ctx.sender);
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    this.ownable.transferOwnership(ctx, newOwner);
  }

  /**
   * Move `amount` (default: the whole balance) of any token held by the
   * coordinator to `to`. Returns the amount moved.
   */
  withdrawERC20(ctx: CallContext, token: string, to: string, amount?: bigint): bigint {
    this.ownable.onlyOwner(ctx);
    const asset = this.fungible(token);
    const value = amount ?? asset.balanceOf(this.address);
    const ok = asset.transfer(this.asCaller(), to, value);
    ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token: asset.address, op: "transfer" });

    this.emit("ERC20Withdrawn", { token: asset.address, to: toAddress(to), amount: value });
    log.warn("token recovered from coordinator", { token: asset.address, to, amount: value.toString() });
    return value;
  }

  nativeRecover(ctx: CallContext, to: string): bigint {
    this.ownable.onlyOwner(ctx);
    const amount = this.chain.nativeBalanceOf(this.address);
    this.chain.transferNative(this.address, to, amount);
    return amount;
  }

  checkpoint(): Restore {
    const restores = [this.ownable.checkpoint(), this.pausable.checkpoint(), this.latch.checkpoint()];
    const settings = this.settings;
    return () => {
      restores.forEach((restore) => restore());
      this.settings = settings;
    };
  }

  // ── Internal ───────────────────────────────────────────────

  private requireSettings(): BridgeSettings {
    const settings = this.settings;
    ensure(settings !== null && this.latch.initialized, Reason.NOT_INITIALIZED, "configuration");
    return settings;
  }

  private pull(token: string, from: string, amount: bigint): void {
    const ok = this.fungible(token).transferFrom(this.asCaller(), from, this.address, amount);
    ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token, op: "transferFrom" });
  }

  private approveFeeSpender(token: string, spender: string, amount: bigint): void {
    const ok = this.fungible(token).approve(this.asCaller(), spender, amount);
    ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token, op: "approve" });
  }

  private fungible(address: string): FungibleToken {
    const contract = this.chain.getContract(address);
    if (!isFungibleToken(contract)) {
      throw new BridgeError(Reason.INVALID_CONFIGURATION, "invariant", { context: { token: address } });
    }
    return contract;
  }

  private decimalsOf(token: FungibleToken): number {
    const decimals: unknown = Reflect.get(token, "decimals");
    return typeof decimals === "number" ? decimals : GUD_DECIMALS;
  }

  private mintable(address: string): MintableToken {
    const contract = this.chain.getContract(address);
    if (!isMintableToken(contract)) {
      throw new BridgeError(Reason.INVALID_CONFIGURATION, "invariant", { context: { token: address } });
    }
    return contract;
  }

  private relay(settings: BridgeSettings): RelayGateway {
    const contract = this.chain.getContract(settings.relay);
    if (!isRelayGateway(contract)) {
      throw new BridgeError(Reason.INVALID_CONFIGURATION, "invariant", {
        context: { relay: settings.relay },
      });
    }
    return contract;
  }

  private reject(operation: string, err: unknown, context: Record<string, unknown>): void {
    const reason = reasonOf(err);
    metrics.rejectionsTotal.inc({ operation, reason });
    log.warn(`${operation} rejected`, { reason, ...context });
  }
}
