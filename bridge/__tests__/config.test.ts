/**
 * Unit tests for bridge/config.ts
 * Tests environment parsing, .env merging and validation.
 */

import * as path from "path";
import { BridgeEnvConfig, loadBridgeConfig, toChainRoleOptions, validateConfig } from "../config";
import { resolveChainRole } from "../chain-role";
import { Reason } from "../errors";
import { captureError, units } from "./fixtures";

const TESTNET_ENV = path.join(__dirname, "env", "testnet.env");

function validConfig(overrides: Partial<BridgeEnvConfig> = {}): BridgeEnvConfig {
  return { ...loadBridgeConfig({ env: {} }), ...overrides };
}

// ═══════════════════════════════════════════════
// loadBridgeConfig
// ═══════════════════════════════════════════════

describe("loadBridgeConfig", () => {
  it("should fall back to the production networks", () => {
    expect(loadBridgeConfig({ env: {} })).toEqual({
      homeChainIds: [1777n, 1452n],
      awayChainIds: [137n, 80001n],
      unknownChainPolicy: "away",
      feeAmount: units("1"),
      confirmations: 1,
      relayAddress: undefined,
      feeTokenAddress: undefined,
    });
  });

  it("should parse every variable", () => {
    const config = loadBridgeConfig({
      env: {
        HOME_CHAIN_IDS: "31337, 1777",
        AWAY_CHAIN_IDS: "137",
        UNKNOWN_CHAIN_POLICY: "Reject",
        BRIDGE_FEE_AMOUNT: "2.5",
        BRIDGE_CONFIRMATIONS: "20",
        RELAY_ADDRESS: "0x3000000000000000000000000000000000000003",
        FEE_TOKEN_ADDRESS: "0x4000000000000000000000000000000000000004",
      },
    });

    expect(config.homeChainIds).toEqual([31337n, 1777n]);
    expect(config.awayChainIds).toEqual([137n]);
    expect(config.unknownChainPolicy).toBe("reject");
    expect(config.feeAmount).toBe(2_500_000n);
    expect(config.confirmations).toBe(20);
    expect(config.relayAddress).toBe("0x3000000000000000000000000000000000000003");
    expect(config.feeTokenAddress).toBe("0x4000000000000000000000000000000000000004");
  });

  it("should read a .env file under the explicit environment", () => {
    const config = loadBridgeConfig({ env: { BRIDGE_CONFIRMATIONS: "6" }, envFile: TESTNET_ENV });

    expect(config.homeChainIds).toEqual([1452n]);
    expect(config.awayChainIds).toEqual([80001n]);
    expect(config.unknownChainPolicy).toBe("reject");
    expect(config.feeAmount).toBe(500_000n);
    // explicit environment wins over the file
    expect(config.confirmations).toBe(6);
    expect(config.relayAddress).toBe("0x3000000000000000000000000000000000000003");
  });

  it("should reject malformed chain ids", () => {
    const err = captureError(() => loadBridgeConfig({ env: { HOME_CHAIN_IDS: "1777,gauss" } }));
    expect(err.reason).toBe(Reason.INVALID_CONFIGURATION);
    expect(err.context).toEqual({
      variable: "HOME_CHAIN_IDS",
      value: "1777,gauss",
      detail: '"gauss" is not a chain id',
    });
  });

  it("should reject an unknown policy", () => {
    expect(() => loadBridgeConfig({ env: { UNKNOWN_CHAIN_POLICY: "home" } })).toThrow(Reason.INVALID_CONFIGURATION);
  });

  it("should reject a fee with too many decimals", () => {
    const err = captureError(() => loadBridgeConfig({ env: { BRIDGE_FEE_AMOUNT: "0.0000001" } }));
    expect(err.context).toEqual({ variable: "BRIDGE_FEE_AMOUNT", value: "0.0000001" });
  });
});

// ═══════════════════════════════════════════════
// validateConfig
// ═══════════════════════════════════════════════

describe("validateConfig", () => {
  it("should accept the defaults", () => {
    expect(() => validateConfig(validConfig())).not.toThrow();
  });

  it("should reject overlapping home and away ids", () => {
    const err = captureError(() => validateConfig(validConfig({ awayChainIds: [137n, 1777n] })));
    expect(err.context).toEqual({
      variable: "AWAY_CHAIN_IDS",
      value: "1777",
      detail: "chain ids cannot be both home and away",
    });
  });

  it("should reject an empty home list", () => {
    expect(() => validateConfig(validConfig({ homeChainIds: [] }))).toThrow(Reason.INVALID_CONFIGURATION);
  });

  it("should reject a negative fee", () => {
    expect(() => validateConfig(validConfig({ feeAmount: -1n }))).toThrow(Reason.INVALID_CONFIGURATION);
    expect(() => validateConfig(loadBridgeConfig({ env: { BRIDGE_FEE_AMOUNT: "-1" } }))).toThrow(
      Reason.INVALID_CONFIGURATION
    );
  });

  it("should reject zero or fractional confirmations", () => {
    expect(() => validateConfig(validConfig({ confirmations: 0 }))).toThrow(Reason.INVALID_CONFIGURATION);
    expect(() => validateConfig(loadBridgeConfig({ env: { BRIDGE_CONFIRMATIONS: "1.5" } }))).toThrow(
      Reason.INVALID_CONFIGURATION
    );
    expect(() => validateConfig(loadBridgeConfig({ env: { BRIDGE_CONFIRMATIONS: "many" } }))).toThrow(
      Reason.INVALID_CONFIGURATION
    );
  });

  it("should reject invalid or zero addresses", () => {
    expect(() => validateConfig(validConfig({ relayAddress: "0x1234" }))).toThrow(Reason.INVALID_CONFIGURATION);
    const err = captureError(() =>
      validateConfig(validConfig({ feeTokenAddress: "0x0000000000000000000000000000000000000000" }))
    );
    expect(err.context).toMatchObject({ variable: "FEE_TOKEN_ADDRESS" });
  });
});

describe("toChainRoleOptions", () => {
  it("should drive role resolution", () => {
    const options = toChainRoleOptions(loadBridgeConfig({ env: { HOME_CHAIN_IDS: "31337", UNKNOWN_CHAIN_POLICY: "reject" } }));
    expect(resolveChainRole(31337n, options)).toBe("home");
    expect(resolveChainRole(137n, options)).toBe("away");
    expect(() => resolveChainRole(5n, options)).toThrow(Reason.UNSUPPORTED_CHAIN);
  });
});
