/**
 * Unit tests for bridge/chain-role.ts
 * Tests role resolution, the unknown-chain policy and the init latch.
 */

import {
  DEFAULT_CHAIN_ROLE_OPTIONS,
  GAUSS_MAINNET_CHAIN_ID,
  GAUSS_TESTNET_CHAIN_ID,
  POLYGON_MAINNET_CHAIN_ID,
  POLYGON_MUMBAI_CHAIN_ID,
  RoleLatch,
  describeChain,
  isKnownChain,
  resolveChainRole,
} from "../chain-role";
import { Reason } from "../errors";
import { captureError } from "./fixtures";

const REJECT_UNKNOWN = { ...DEFAULT_CHAIN_ROLE_OPTIONS, unknownChainPolicy: "reject" as const };

// ═══════════════════════════════════════════════
// resolveChainRole
// ═══════════════════════════════════════════════

describe("resolveChainRole", () => {
  it("should resolve both Gauss networks to home", () => {
    expect(resolveChainRole(GAUSS_MAINNET_CHAIN_ID)).toBe("home");
    expect(resolveChainRole(GAUSS_TESTNET_CHAIN_ID)).toBe("home");
  });

  it("should resolve Polygon networks to away", () => {
    expect(resolveChainRole(POLYGON_MAINNET_CHAIN_ID)).toBe("away");
    expect(resolveChainRole(POLYGON_MUMBAI_CHAIN_ID)).toBe("away");
  });

  it("should default unknown chains to away", () => {
    expect(resolveChainRole(1n)).toBe("away");
  });

  it("should reject unknown chains under the reject policy", () => {
    const err = captureError(() => resolveChainRole(1n, REJECT_UNKNOWN));
    expect(err.reason).toBe(Reason.UNSUPPORTED_CHAIN);
    expect(err.category).toBe("configuration");
    expect(err.context).toEqual({ chainId: "1" });
  });

  it("should still resolve listed chains under the reject policy", () => {
    expect(resolveChainRole(POLYGON_MAINNET_CHAIN_ID, REJECT_UNKNOWN)).toBe("away");
    expect(resolveChainRole(GAUSS_MAINNET_CHAIN_ID, REJECT_UNKNOWN)).toBe("home");
  });

  it("should honour custom home chain ids", () => {
    const options = { ...DEFAULT_CHAIN_ROLE_OPTIONS, homeChainIds: [31337n] };
    expect(resolveChainRole(31337n, options)).toBe("home");
    expect(resolveChainRole(GAUSS_MAINNET_CHAIN_ID, options)).toBe("away");
  });
});

describe("describeChain / isKnownChain", () => {
  it("should name known networks", () => {
    expect(describeChain(GAUSS_MAINNET_CHAIN_ID)).toBe("gauss-mainnet");
    expect(describeChain(POLYGON_MUMBAI_CHAIN_ID)).toBe("polygon-mumbai");
  });

  it("should fall back to the numeric id", () => {
    expect(describeChain(5n)).toBe("chain-5");
  });

  it("should only know listed chains", () => {
    expect(isKnownChain(GAUSS_TESTNET_CHAIN_ID)).toBe(true);
    expect(isKnownChain(5n)).toBe(false);
  });
});

// ═══════════════════════════════════════════════
// RoleLatch
// ═══════════════════════════════════════════════

describe("RoleLatch", () => {
  it("should start uninitialized", () => {
    const latch = new RoleLatch();
    expect(latch.initialized).toBe(false);
    expect(latch.isHome()).toBe(false);
    expect(() => latch.role()).toThrow(Reason.NOT_INITIALIZED);
  });

  it("should fix the role on initialize", () => {
    const latch = new RoleLatch();
    expect(latch.initialize(GAUSS_MAINNET_CHAIN_ID)).toBe("home");
    expect(latch.initialized).toBe(true);
    expect(latch.role()).toBe("home");
    expect(latch.isHome()).toBe(true);
  });

  it("should refuse a second initialize and keep the first role", () => {
    const latch = new RoleLatch();
    latch.initialize(POLYGON_MAINNET_CHAIN_ID);
    expect(() => latch.initialize(GAUSS_MAINNET_CHAIN_ID)).toThrow(Reason.ALREADY_INITIALIZED);
    expect(latch.role()).toBe("away");
  });

  it("should stay uninitialized when resolution fails", () => {
    const latch = new RoleLatch(REJECT_UNKNOWN);
    expect(() => latch.initialize(5n)).toThrow(Reason.UNSUPPORTED_CHAIN);
    expect(latch.initialized).toBe(false);
  });

  it("should restore the previous state from a checkpoint", () => {
    const latch = new RoleLatch();
    const restore = latch.checkpoint();
    latch.initialize(GAUSS_MAINNET_CHAIN_ID);
    restore();
    expect(latch.initialized).toBe(false);
  });
});
