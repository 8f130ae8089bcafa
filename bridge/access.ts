/**
 * Capability modules shared by the bridge contracts: single-owner gating,
 * a pause flag and a non-reentrant flag. Contracts hold them as fields and
 * delegate to them instead of inheriting.
 */

import { CallContext, EventArgs, Restore, ZERO_ADDRESS, toAddress } from "./chain";
import { Reason, ensure } from "./errors";

export type Emit = (event: string, args: EventArgs) => void;

export class Ownable {
  private current: string;

  constructor(owner: string, private readonly emit: Emit) {
    this.current = toAddress(owner, "owner");
    this.emit("OwnershipTransferred", { previousOwner: ZERO_ADDRESS, newOwner: this.current });
  }

  owner(): string {
    return this.current;
  }

  onlyOwner(ctx: CallContext): void {
    ensure(ctx.sender === this.current, Reason.NOT_OWNER, "authorization", { caller: ctx.sender });
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    this.onlyOwner(ctx);
    const next = toAddress(newOwner, "newOwner");
    ensure(next !== ZERO_ADDRESS, Reason.ZERO_OWNER, "validation");
    const previousOwner = this.current;
    this.current = next;
    this.emit("OwnershipTransferred", { previousOwner, newOwner: next });
  }

  checkpoint(): Restore {
    const saved = this.current;
    return () => {
      this.current = saved;
    };
  }
}

export class Pausable {
  private flag = false;

  constructor(private readonly emit: Emit) {}

  paused(): boolean {
    return this.flag;
  }

  whenNotPaused(): void {
    ensure(!this.flag, Reason.PAUSED, "validation");
  }

  whenPaused(): void {
    ensure(this.flag, Reason.NOT_PAUSED, "validation");
  }

  pause(account: string): void {
    this.whenNotPaused();
    this.flag = true;
    this.emit("Paused", { account });
  }

  unpause(account: string): void {
    this.whenPaused();
    this.flag = false;
    this.emit("Unpaused", { account });
  }

  checkpoint(): Restore {
    const saved = this.flag;
    return () => {
      this.flag = saved;
    };
  }
}

/**
 * Entered/not-entered flag. Guards against recursive entry into the
 * guarded functions of one instance only.
 */
export class ReentrancyGuard {
  private entered = false;

  nonReentrant<T>(fn: () => T): T {
    ensure(!this.entered, Reason.REENTRANT_CALL, "validation");
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
