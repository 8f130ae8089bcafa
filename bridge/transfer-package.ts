/**
 * Wire format carried by the relay between the two bridge endpoints:
 * the fixed tuple (address recipient, uint256 netAmount, address source),
 * canonical ABI encoding, no version tag. Any change to field order or
 * width breaks compatibility with deployed twins.
 */

import { ethers } from "ethers";
import { BridgeError, Reason } from "./errors";
import { MAX_UINT256 } from "./ledger";

export interface TransferPackage {
  recipient: string;
  /** Net amount, already adjusted for fees on the sending side. */
  amount: bigint;
  source: string;
}

export const TRANSFER_PACKAGE_TYPES = ["address", "uint256", "address"] as const;

/** Three 32-byte words. */
export const TRANSFER_PACKAGE_SIZE = 96;

const coder = ethers.AbiCoder.defaultAbiCoder();

function invalidPackage(detail: string, cause?: unknown): BridgeError {
  return new BridgeError(Reason.INVALID_PACKAGE, "validation", { context: { detail }, cause });
}

export function encodeTransferPackage(pkg: TransferPackage): string {
  if (!ethers.isAddress(pkg.recipient) || !ethers.isAddress(pkg.source)) {
    throw invalidPackage("malformed address");
  }
  if (pkg.amount < 0n || pkg.amount > MAX_UINT256) {
    throw invalidPackage("amount out of range");
  }
  return coder.encode(TRANSFER_PACKAGE_TYPES, [
    ethers.getAddress(pkg.recipient),
    pkg.amount,
    ethers.getAddress(pkg.source),
  ]);
}

export function decodeTransferPackage(data: string): TransferPackage {
  if (!ethers.isHexString(data)) {
    throw invalidPackage("not hex");
  }
  if (ethers.dataLength(data) !== TRANSFER_PACKAGE_SIZE) {
    throw invalidPackage(`expected ${TRANSFER_PACKAGE_SIZE} bytes, got ${ethers.dataLength(data)}`);
  }

  let decoded: ethers.Result;
  try {
    decoded = coder.decode(TRANSFER_PACKAGE_TYPES, data);
  } catch (err) {
    throw invalidPackage("abi decode failed", err);
  }

  const [recipient, amount, source] = decoded.toArray();
  if (typeof recipient !== "string" || typeof amount !== "bigint" || typeof source !== "string") {
    throw invalidPackage("unexpected field types");
  }
  return { recipient, amount, source };
}
