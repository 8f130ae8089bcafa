/**
 * Shared accounts and helpers for the bridge test suites.
 */

import { ethers } from "ethers";
import { BridgeSide } from "../deployment";
import { GUD_DECIMALS } from "../wrapped-stable";
import { BridgeError } from "../errors";

export const OWNER = ethers.getAddress("0x1000000000000000000000000000000000000001");
export const ALICE = ethers.getAddress("0xa11ce00000000000000000000000000000000001");
export const BOB = ethers.getAddress("0xb0b0000000000000000000000000000000000002");
export const CAROL = ethers.getAddress("0xca40100000000000000000000000000000000003");
export const MALLORY = ethers.getAddress("0xbad0000000000000000000000000000000000004");

/** Whole tokens to base units (6 decimals). */
export function units(amount: string): bigint {
  return ethers.parseUnits(amount, GUD_DECIMALS);
}

/** Run `fn`, expecting a BridgeError; returns it for further assertions. */
export function captureError(fn: () => unknown): BridgeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof BridgeError) return err;
    throw err;
  }
  throw new Error("expected call to throw");
}

/** Mint underlying to `account` and wrap all of it into GUD on an away chain. */
export function fundWithGud(side: BridgeSide, deployer: string, account: string, amount: bigint): void {
  side.chain.transact(deployer, (ctx) => side.underlying.mint(ctx, account, amount));
  side.chain.transact(account, (ctx) => {
    side.underlying.approve(ctx, side.gud.address, amount);
    side.gud.depositFor(ctx, account, amount);
  });
}
