/**
 * Gauss Stable Bridge - In-process chain
 *
 * Hosts contract instances at addresses, threads the caller and chain id
 * into every call through a CallContext, and runs each top-level call as an
 * atomic transaction: every contract is checkpointed before the call and
 * restored if it throws. One committed transaction mines one block.
 */

import { ethers } from "ethers";
import { BridgeError, Reason, ensure } from "./errors";

export const ZERO_ADDRESS = ethers.ZeroAddress;

/** Explicit replacement for the ambient caller and chain id. */
export interface CallContext {
  readonly sender: string;
  readonly chainId: bigint;
}

export type EventValue = string | bigint | number | boolean;
export type EventArgs = Readonly<Record<string, EventValue>>;

export interface LogEntry {
  readonly address: string;
  readonly event: string;
  readonly args: EventArgs;
  readonly blockNumber: number;
}

export interface LogFilter {
  address?: string;
  event?: string;
}

export interface TxReceipt<T> {
  readonly from: string;
  readonly blockNumber: number;
  readonly result: T;
  readonly logs: readonly LogEntry[];
}

/** Undo function returned by a checkpoint. */
export type Restore = () => void;

/**
 * Normalise an address to its checksummed form.
 * Throws "invalid address" for anything ethers does not accept.
 */
export function toAddress(value: string, label = "address"): string {
  if (!ethers.isAddress(value)) {
    throw new BridgeError(Reason.INVALID_ADDRESS, "validation", { context: { label, value } });
  }
  return ethers.getAddress(value);
}

/**
 * Base for everything deployed on a Chain. Subclasses own their state and
 * must be able to snapshot it.
 */
export abstract class ChainContract {
  readonly address: string;

  constructor(readonly chain: Chain, address: string) {
    this.address = toAddress(address);
  }

  /** Capture the contract's state; the returned function puts it back. */
  abstract checkpoint(): Restore;

  protected emit(event: string, args: EventArgs): void {
    this.chain.emit(this.address, event, args);
  }

  /** Context for calls this contract makes to other contracts. */
  protected asCaller(): CallContext {
    return { sender: this.address, chainId: this.chain.chainId };
  }
}

export interface ChainOptions {
  chainId: bigint;
  name?: string;
}

export class Chain {
  readonly chainId: bigint;
  readonly name: string;

  private height = 0;
  private readonly contracts = new Map<string, ChainContract>();
  private readonly deployerNonces = new Map<string, number>();
  private nativeBalances = new Map<string, bigint>();
  private readonly history: LogEntry[] = [];
  private pending: Array<Omit<LogEntry, "blockNumber">> | null = null;

  constructor(options: ChainOptions) {
    this.chainId = options.chainId;
    this.name = options.name ?? `chain-${options.chainId}`;
  }

  get blockNumber(): number {
    return this.height;
  }

  context(sender: string): CallContext {
    return { sender: toAddress(sender, "sender"), chainId: this.chainId };
  }

  /**
   * CREATE-style address for the deployer's next contract. Replaying the
   * same deployment sequence on two chains yields identical addresses.
   */
  nextContractAddress(deployer: string): string {
    const from = toAddress(deployer, "deployer");
    const nonce = this.deployerNonces.get(from) ?? 0;
    this.deployerNonces.set(from, nonce + 1);
    return ethers.getCreateAddress({ from, nonce });
  }

  deploy<T extends ChainContract>(contract: T): T {
    ensure(contract.chain === this, Reason.INVALID_CONFIGURATION, "invariant", {
      address: contract.address,
    });
    ensure(!this.contracts.has(contract.address), Reason.ADDRESS_IN_USE, "configuration", {
      address: contract.address,
    });
    this.contracts.set(contract.address, contract);
    return contract;
  }

  hasContract(address: string): boolean {
    return this.contracts.has(toAddress(address));
  }

  getContract(address: string): ChainContract {
    const contract = this.contracts.get(toAddress(address));
    if (!contract) {
      throw new BridgeError(Reason.NO_CONTRACT, "external", {
        context: { address, chainId: this.chainId.toString() },
      });
    }
    return contract;
  }

  /**
   * Run `fn` as one transaction sent by `sender`. Either every effect
   * commits (and a block is mined) or none does.
   */
  transact<T>(sender: string, fn: (ctx: CallContext) => T): TxReceipt<T> {
    ensure(this.pending === null, Reason.NESTED_TRANSACTION, "invariant");
    const ctx = this.context(sender);

    const restores = Array.from(this.contracts.values(), (c) => c.checkpoint());
    const nativeBefore = new Map(this.nativeBalances);
    const pending: Array<Omit<LogEntry, "blockNumber">> = [];
    this.pending = pending;

    try {
      const result = fn(ctx);
      this.height += 1;
      const logs = pending.map((entry) => ({ ...entry, blockNumber: this.height }));
      this.history.push(...logs);
      return { from: ctx.sender, blockNumber: this.height, result, logs };
    } catch (err) {
      for (const restore of restores) restore();
      this.nativeBalances = nativeBefore;
      throw err;
    } finally {
      this.pending = null;
    }
  }

  mine(blocks = 1): number {
    this.height += blocks;
    return this.height;
  }

  emit(address: string, event: string, args: EventArgs): void {
    if (this.pending) {
      this.pending.push({ address, event, args });
    } else {
      this.history.push({ address, event, args, blockNumber: this.height });
    }
  }

  getLogs(filter: LogFilter = {}): LogEntry[] {
    const address = filter.address === undefined ? undefined : toAddress(filter.address);
    return this.history.filter(
      (entry) =>
        (address === undefined || entry.address === address) &&
        (filter.event === undefined || entry.event === filter.event)
    );
  }

  // ── Native currency ─────────────────────────────────────────

  nativeBalanceOf(account: string): bigint {
    return this.nativeBalances.get(toAddress(account)) ?? 0n;
  }

  /** Genesis-style allocation, outside any transaction. */
  fund(account: string, amount: bigint): void {
    ensure(amount >= 0n, Reason.INVALID_AMOUNT, "validation");
    const to = toAddress(account);
    this.nativeBalances.set(to, this.nativeBalanceOf(to) + amount);
  }

  transferNative(from: string, to: string, amount: bigint): void {
    ensure(amount >= 0n, Reason.INVALID_AMOUNT, "validation");
    const source = toAddress(from);
    const target = toAddress(to);
    const balance = this.nativeBalanceOf(source);
    ensure(balance >= amount, Reason.NATIVE_EXCEEDS_BALANCE, "validation", {
      from: source,
      balance: balance.toString(),
      amount: amount.toString(),
    });
    this.nativeBalances.set(source, balance - amount);
    this.nativeBalances.set(target, this.nativeBalanceOf(target) + amount);
  }
}
