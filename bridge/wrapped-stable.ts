/**
 * Gauss Stable Bridge - Wrapped stable token (GUD)
 *
 * Locks an underlying stable asset 1:1 against wrapped units. On the home
 * chain the wrapped supply is driven by the bridge coordinator (mint on
 * inbound, burn on outbound) and deposits/withdrawals are reserved to it;
 * on an away chain anyone can wrap and unwrap.
 *
 * Deposits and withdrawals keep totalSupply() <= underlying held by this
 * contract. Bridge mints on the home chain are backed by custody on the
 * away chain instead.
 */

import { ethers } from "ethers";
import { CallContext, Chain, ChainContract, Restore, ZERO_ADDRESS, toAddress } from "./chain";
import { Ownable, Pausable } from "./access";
import { BalanceLedger, FungibleToken, MintableToken, isFungibleToken, requireValidAmount } from "./ledger";
import { ChainRole, ChainRoleOptions, DEFAULT_CHAIN_ROLE_OPTIONS, RoleLatch } from "./chain-role";
import { BridgeError, Reason, ensure } from "./errors";
import { componentLogger } from "./logger";

const log = componentLogger("wrapped-stable");

export const GUD_NAME = "Gauss Stable";
export const GUD_SYMBOL = "GUD";
export const GUD_DECIMALS = 6;

export class WrappedStable extends ChainContract implements MintableToken {
  readonly name = GUD_NAME;
  readonly symbol = GUD_SYMBOL;
  readonly decimals = GUD_DECIMALS;
  readonly underlying: string;

  private readonly ledger = new BalanceLedger((event, args) => this.emit(event, args));
  private readonly pausable = new Pausable((event, args) => this.emit(event, args));
  private readonly ownable: Ownable;
  private readonly latch: RoleLatch;
  private bridge: string = ZERO_ADDRESS;

  constructor(
    chain: Chain,
    address: string,
    owner: string,
    underlying: string,
    roleOptions: ChainRoleOptions = DEFAULT_CHAIN_ROLE_OPTIONS
  ) {
    super(chain, address);
    this.underlying = toAddress(underlying, "underlying");
    this.ownable = new Ownable(owner, (event, args) => this.emit(event, args));
    this.latch = new RoleLatch(roleOptions);
    // before-transfer hook for transfers, mints and burns alike
    this.ledger.addTransferCheck(() => this.pausable.whenNotPaused());
  }

  // ============================================================
  //                     VIEWS
  // ============================================================

  owner(): string {
    return this.ownable.owner();
  }

  paused(): boolean {
    return this.pausable.paused();
  }

  /** Address allowed to mint, burn and (on the home chain) wrap. */
  gudBridge(): string {
    return this.bridge;
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

  balanceOf(account: string): bigint {
    return this.ledger.balanceOf(account);
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  allowance(owner: string, spender: string): bigint {
    return this.ledger.allowance(owner, spender);
  }

  /** Underlying held in custody by this contract. */
  underlyingBalance(): bigint {
    return this.underlyingToken().balanceOf(this.address);
  }

  // ============================================================
  //                     INITIALIZATION
  // ============================================================

  init(ctx: CallContext, bridge: string): ChainRole {
    this.ownable.onlyOwner(ctx);
    const target = toAddress(bridge, "bridge");
    ensure(target !== ZERO_ADDRESS, Reason.ZERO_ADDRESS, "configuration", { field: "bridge" });

    const role = this.latch.initialize(ctx.chainId);
    this.bridge = target;
    this.emit("Initialized", { bridge: target, role });
    log.info("wrapped token initialized", {
      address: this.address,
      chainId: ctx.chainId.toString(),
      role,
      bridge: target,
    });
    return role;
  }

  // ============================================================
  //                     ERC20 SURFACE
  // ============================================================

  transfer(ctx: CallContext, to: string, amount: bigint): boolean {
    this.ledger.transfer(ctx.sender, to, amount);
    return true;
  }

  approve(ctx: CallContext, spender: string, amount: bigint): boolean {
    this.ledger.approve(ctx.sender, spender, amount);
    return true;
  }

  transferFrom(ctx: CallContext, from: string, to: string, amount: bigint): boolean {
    this.ledger.spendAllowance(from, ctx.sender, amount);
    this.ledger.transfer(from, to, amount);
    return true;
  }

  // ============================================================
  //                     BRIDGE SUPPLY CONTROL
  // ============================================================

  mint(ctx: CallContext, to: string, amount: bigint): void {
    this.onlyBridge(ctx);
    ensure(this.latch.role() === "home", Reason.MINT_HOME_ONLY, "authorization", {
      chainId: ctx.chainId.toString(),
    });
    this.ledger.mint(to, amount);
  }

  burn(ctx: CallContext, amount: bigint): void {
    this.onlyBridge(ctx);
    this.ledger.burn(ctx.sender, amount);
  }

  // ============================================================
  //                     WRAP / UNWRAP
  // ============================================================

  /**
   * Pull `amount` underlying from the caller, then mint the same amount of
   * wrapped units to `account`. The mint never happens without the pull.
   */
  depositFor(ctx: CallContext, account: string, amount: bigint): boolean {
    this.onlyBridgeOnHome(ctx);
    this.pausable.whenNotPaused();
    requireValidAmount(amount);

    const ok = this.underlyingToken().transferFrom(this.asCaller(), ctx.sender, this.address, amount);
    ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token: this.underlying, op: "transferFrom" });
    this.ledger.mint(account, amount);

    log.debug("deposit", { caller: ctx.sender, account, amount: amount.toString() });
    return true;
  }

  /**
   * Burn `amount` of the caller's wrapped units, then release the same
   * amount of underlying to `account`.
   */
  withdrawTo(ctx: CallContext, account: string, amount: bigint): boolean {
    this.onlyBridgeOnHome(ctx);
    this.pausable.whenNotPaused();

    this.ledger.burn(ctx.sender, amount);
    const ok = this.underlyingToken().transfer(this.asCaller(), account, amount);
    ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token: this.underlying, op: "transfer" });

    log.debug("withdraw", { caller: ctx.sender, account, amount: amount.toString() });
    return true;
  }

  /**
   * Mint wrapped units for underlying that reached the contract without a
   * deposit (a plain transfer), restoring supply == custody. Returns the
   * minted amount, zero when there is no excess.
   */
  reconcileExcess(ctx: CallContext, account: string): bigint {
    this.ownable.onlyOwner(ctx);
    const excess = this.underlyingBalance() - this.ledger.totalSupply();
    if (excess <= 0n) return 0n;

    this.ledger.mint(account, excess);
    this.emit("Reconciled", { account, amount: excess });
    log.info("excess underlying reconciled", { account, amount: excess.toString() });
    return excess;
  }

  /** Name kept from the deployed contract. */
  accidentalRecover(ctx: CallContext, account: string): bigint {
    return this.reconcileExcess(ctx, account);
  }

  // ============================================================
  //                     ADMIN
  // ============================================================

  updateBridge(ctx: CallContext, newBridge: string): void {
    this.ownable.onlyOwner(ctx);
    const target = toAddress(newBridge, "bridge");
    ensure(target !== ZERO_ADDRESS, Reason.ZERO_ADDRESS, "configuration", { field: "bridge" });
    const previous = this.bridge;
    this.bridge = target;
    this.emit("BridgeUpdated", { previous, current: target });
    log.info("bridge updated", { previous, current: target });
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
   * Away chain only: pause the token and move every unit of underlying
   * custody to `to`. Returns the amount moved.
   */
  emergencyRecover(ctx: CallContext, to: string): bigint {
    this.ownable.onlyOwner(ctx);
    ensure(this.latch.role() === "away", Reason.RECOVER_AWAY_ONLY, "authorization");

    if (!this.pausable.paused()) {
      this.pausable.pause(ctx.sender);
    }
    const amount = this.underlyingBalance();
    const ok = this.underlyingToken().transfer(this.asCaller(), to, amount);
    ensure(ok, Reason.TOKEN_CALL_FAILED, "external", { token: this.underlying, op: "transfer" });

    this.emit("EmergencyRecovered", { to, amount });
    log.warn("emergency recovery executed", { to, amount: ethers.formatUnits(amount, GUD_DECIMALS) });
    return amount;
  }

  /** Send any native currency held by the contract to `to`. */
  nativeRecover(ctx: CallContext, to: string): bigint {
    this.ownable.onlyOwner(ctx);
    const amount = this.chain.nativeBalanceOf(this.address);
    this.chain.transferNative(this.address, to, amount);
    return amount;
  }

  checkpoint(): Restore {
    const restores = [
      this.ledger.checkpoint(),
      this.pausable.checkpoint(),
      this.ownable.checkpoint(),
      this.latch.checkpoint(),
    ];
    const bridge = this.bridge;
    return () => {
      restores.forEach((restore) => restore());
      this.bridge = bridge;
    };
  }

  // ============================================================
  //                     INTERNAL
  // ============================================================

  private onlyBridge(ctx: CallContext): void {
    ensure(
      this.bridge !== ZERO_ADDRESS && ctx.sender === this.bridge,
      Reason.NOT_AUTHORIZED,
      "authorization",
      { caller: ctx.sender }
    );
  }

  private onlyBridgeOnHome(ctx: CallContext): void {
    if (this.latch.role() === "home") {
      this.onlyBridge(ctx);
    }
  }

  private underlyingToken(): FungibleToken {
    const contract = this.chain.getContract(this.underlying);
    if (!isFungibleToken(contract)) {
      throw new BridgeError(Reason.INVALID_CONFIGURATION, "invariant", {
        context: { underlying: this.underlying },
      });
    }
    return contract;
  }
}
