import { CallContext, Chain, ChainContract, Restore } from "./chain";
import { Ownable } from "./access";
import { BalanceLedger, FungibleToken } from "./ledger";

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

/**
 * Plain fungible token with owner-controlled minting. Stands in for the
 * underlying stable asset (USDC and friends) on either chain.
 */
export class StandardToken extends ChainContract implements FungibleToken {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  private readonly ledger = new BalanceLedger((event, args) => this.emit(event, args));
  private readonly ownable: Ownable;

  constructor(chain: Chain, address: string, owner: string, metadata: TokenMetadata) {
    super(chain, address);
    this.name = metadata.name;
    this.symbol = metadata.symbol;
    this.decimals = metadata.decimals;
    this.ownable = new Ownable(owner, (event, args) => this.emit(event, args));
  }

  owner(): string {
    return this.ownable.owner();
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

  mint(ctx: CallContext, to: string, amount: bigint): void {
    this.ownable.onlyOwner(ctx);
    this.ledger.mint(to, amount);
  }

  transferOwnership(ctx: CallContext, newOwner: string): void {
    this.ownable.transferOwnership(ctx, newOwner);
  }

  checkpoint(): Restore {
    const restores = [this.ledger.checkpoint(), this.ownable.checkpoint()];
    return () => restores.forEach((restore) => restore());
  }
}
