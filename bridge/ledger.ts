/**
 * Fungible-token ledger primitive: balances, allowances, supply and the
 * Transfer/Approval event contract. Token contracts compose a BalanceLedger
 * and expose the FungibleToken surface on top of it.
 */

import { ethers } from "ethers";
import { CallContext, EventArgs, Restore, ZERO_ADDRESS, toAddress } from "./chain";
import { Reason, ensure } from "./errors";

export const MAX_UINT256 = ethers.MaxUint256;

/** Standard fungible-token surface the bridge consumes. */
export interface FungibleToken {
  readonly address: string;
  balanceOf(account: string): bigint;
  totalSupply(): bigint;
  allowance(owner: string, spender: string): bigint;
  transfer(ctx: CallContext, to: string, amount: bigint): boolean;
  approve(ctx: CallContext, spender: string, amount: bigint): boolean;
  transferFrom(ctx: CallContext, from: string, to: string, amount: bigint): boolean;
}

/** Token whose supply a privileged caller can expand and contract. */
export interface MintableToken extends FungibleToken {
  mint(ctx: CallContext, to: string, amount: bigint): void;
  burn(ctx: CallContext, amount: bigint): void;
}

function hasMethods(value: unknown, names: readonly string[]): boolean {
  if (typeof value !== "object" || value === null) return false;
  return names.every((name) => typeof Reflect.get(value, name) === "function");
}

const FUNGIBLE_METHODS = [
  "balanceOf",
  "totalSupply",
  "allowance",
  "transfer",
  "approve",
  "transferFrom",
] as const;

export function isFungibleToken(value: unknown): value is FungibleToken {
  return hasMethods(value, FUNGIBLE_METHODS);
}

export function isMintableToken(value: unknown): value is MintableToken {
  return isFungibleToken(value) && hasMethods(value, ["mint", "burn"]);
}

/**
 * Check run before every balance change, in registration order.
 * `from` is the zero address for mints, `to` for burns.
 */
export type TransferCheck = (from: string, to: string, amount: bigint) => void;

export function requireValidAmount(amount: bigint): void {
  ensure(amount >= 0n && amount <= MAX_UINT256, Reason.INVALID_AMOUNT, "validation", {
    amount: amount.toString(),
  });
}

export class BalanceLedger {
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;
  private readonly checks: TransferCheck[] = [];

  constructor(private readonly emit: (event: string, args: EventArgs) => void) {}

  /** Register a check that runs before every transfer, mint and burn. */
  addTransferCheck(check: TransferCheck): void {
    this.checks.push(check);
  }

  balanceOf(account: string): bigint {
    return this.balances.get(toAddress(account)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(toAddress(owner), toAddress(spender))) ?? 0n;
  }

  transfer(from: string, to: string, amount: bigint): void {
    requireValidAmount(amount);
    const source = toAddress(from);
    const target = toAddress(to);
    ensure(source !== ZERO_ADDRESS, Reason.TRANSFER_FROM_ZERO, "validation");
    ensure(target !== ZERO_ADDRESS, Reason.TRANSFER_TO_ZERO, "validation");
    this.runChecks(source, target, amount);

    const balance = this.balanceOf(source);
    ensure(balance >= amount, Reason.TRANSFER_EXCEEDS_BALANCE, "validation", {
      from: source,
      balance: balance.toString(),
      amount: amount.toString(),
    });
    this.balances.set(source, balance - amount);
    this.balances.set(target, this.balanceOf(target) + amount);
    this.emit("Transfer", { from: source, to: target, value: amount });
  }

  approve(owner: string, spender: string, amount: bigint): void {
    requireValidAmount(amount);
    const holder = toAddress(owner);
    const delegate = toAddress(spender);
    ensure(holder !== ZERO_ADDRESS, Reason.APPROVE_FROM_ZERO, "validation");
    ensure(delegate !== ZERO_ADDRESS, Reason.APPROVE_TO_ZERO, "validation");
    this.allowances.set(allowanceKey(holder, delegate), amount);
    this.emit("Approval", { owner: holder, spender: delegate, value: amount });
  }

  /** Deduct from an allowance; the maximum uint256 allowance is never reduced. */
  spendAllowance(owner: string, spender: string, amount: bigint): void {
    const current = this.allowance(owner, spender);
    if (current === MAX_UINT256) return;
    ensure(current >= amount, Reason.INSUFFICIENT_ALLOWANCE, "authorization", {
      owner,
      spender,
      allowance: current.toString(),
      amount: amount.toString(),
    });
    this.allowances.set(allowanceKey(toAddress(owner), toAddress(spender)), current - amount);
  }

  mint(to: string, amount: bigint): void {
    requireValidAmount(amount);
    const target = toAddress(to);
    ensure(target !== ZERO_ADDRESS, Reason.MINT_TO_ZERO, "validation");
    this.runChecks(ZERO_ADDRESS, target, amount);

    this.supply += amount;
    this.balances.set(target, this.balanceOf(target) + amount);
    this.emit("Transfer", { from: ZERO_ADDRESS, to: target, value: amount });
  }

  burn(from: string, amount: bigint): void {
    requireValidAmount(amount);
    const source = toAddress(from);
    ensure(source !== ZERO_ADDRESS, Reason.BURN_FROM_ZERO, "validation");
    this.runChecks(source, ZERO_ADDRESS, amount);

    const balance = this.balanceOf(source);
    ensure(balance >= amount, Reason.BURN_EXCEEDS_BALANCE, "validation", {
      from: source,
      balance: balance.toString(),
      amount: amount.toString(),
    });
    this.balances.set(source, balance - amount);
    this.supply -= amount;
    this.emit("Transfer", { from: source, to: ZERO_ADDRESS, value: amount });
  }

  checkpoint(): Restore {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.allowances = allowances;
      this.supply = supply;
    };
  }

  private runChecks(from: string, to: string, amount: bigint): void {
    for (const check of this.checks) check(from, to, amount);
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${owner}:${spender}`;
}
