/**
 * Gauss Stable Bridge - Configuration
 *
 * Reads deployment settings from environment variables (optionally seeded
 * from a .env file) with defaults matching the production networks.
 */

import * as fs from "fs";
import * as path from "path";
import * as dotenv from "dotenv";
import { ethers } from "ethers";
import {
  ChainRoleOptions,
  DEFAULT_CHAIN_ROLE_OPTIONS,
  UnknownChainPolicy,
} from "./chain-role";
import { GUD_DECIMALS } from "./wrapped-stable";
import { BridgeError, Reason } from "./errors";

export interface BridgeEnvConfig {
  /** Chain ids resolved to the home role (HOME_CHAIN_IDS) */
  homeChainIds: bigint[];
  /** Chain ids resolved to the away role (AWAY_CHAIN_IDS) */
  awayChainIds: bigint[];
  /** What to do with a chain id in neither list: away | reject */
  unknownChainPolicy: UnknownChainPolicy;
  /** Relay fee in GUD base units (BRIDGE_FEE_AMOUNT is in whole tokens) */
  feeAmount: bigint;
  confirmations: number;
  /** Relay gateway address (optional until deployment) */
  relayAddress?: string;
  feeTokenAddress?: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** .env file to merge under `env`; values already in `env` win. */
  envFile?: string;
}

function configError(variable: string, value: string | undefined, detail: string): BridgeError {
  return new BridgeError(Reason.INVALID_CONFIGURATION, "configuration", {
    context: { variable, value, detail },
  });
}

function parseChainIds(variable: string, raw: string | undefined, fallback: readonly bigint[]): bigint[] {
  if (raw === undefined || raw.trim() === "") return [...fallback];
  return raw.split(",").map((part) => {
    const trimmed = part.trim();
    if (!/^[0-9]+$/.test(trimmed) || BigInt(trimmed) === 0n) {
      throw configError(variable, raw, `"${trimmed}" is not a chain id`);
    }
    return BigInt(trimmed);
  });
}

function parsePolicy(raw: string | undefined): UnknownChainPolicy {
  const value = (raw || DEFAULT_CHAIN_ROLE_OPTIONS.unknownChainPolicy).trim().toLowerCase();
  if (value !== "away" && value !== "reject") {
    throw configError("UNKNOWN_CHAIN_POLICY", raw, "expected away or reject");
  }
  return value;
}

function parseFee(raw: string | undefined): bigint {
  try {
    return ethers.parseUnits((raw || "1").trim(), GUD_DECIMALS);
  } catch (err) {
    throw new BridgeError(Reason.INVALID_CONFIGURATION, "configuration", {
      context: { variable: "BRIDGE_FEE_AMOUNT", value: raw },
      cause: err,
    });
  }
}

/**
 * Build the bridge configuration from `env` (default: process.env).
 * Throws on malformed values; call validateConfig on the result before use.
 */
export function loadBridgeConfig(options: LoadConfigOptions = {}): BridgeEnvConfig {
  const fromFile = options.envFile ? dotenv.parse(fs.readFileSync(path.resolve(options.envFile))) : {};
  const env: NodeJS.ProcessEnv = { ...fromFile, ...(options.env ?? process.env) };

  return {
    homeChainIds: parseChainIds("HOME_CHAIN_IDS", env.HOME_CHAIN_IDS, DEFAULT_CHAIN_ROLE_OPTIONS.homeChainIds),
    awayChainIds: parseChainIds("AWAY_CHAIN_IDS", env.AWAY_CHAIN_IDS, DEFAULT_CHAIN_ROLE_OPTIONS.awayChainIds),
    unknownChainPolicy: parsePolicy(env.UNKNOWN_CHAIN_POLICY),
    feeAmount: parseFee(env.BRIDGE_FEE_AMOUNT),
    confirmations: Number(env.BRIDGE_CONFIRMATIONS || "1"),
    relayAddress: env.RELAY_ADDRESS || undefined,
    feeTokenAddress: env.FEE_TOKEN_ADDRESS || undefined,
  };
}

/**
 * Validate a loaded configuration.
 * Throws if any value would make the bridge unsafe to initialize.
 */
export function validateConfig(config: BridgeEnvConfig): void {
  if (config.homeChainIds.length === 0) {
    throw configError("HOME_CHAIN_IDS", undefined, "at least one home chain is required");
  }
  const overlap = config.homeChainIds.filter((id) => config.awayChainIds.includes(id));
  if (overlap.length > 0) {
    throw configError("AWAY_CHAIN_IDS", overlap.join(","), "chain ids cannot be both home and away");
  }
  if (config.feeAmount < 0n) {
    throw configError("BRIDGE_FEE_AMOUNT", config.feeAmount.toString(), "fee cannot be negative");
  }
  if (!Number.isSafeInteger(config.confirmations) || config.confirmations < 1) {
    throw configError("BRIDGE_CONFIRMATIONS", String(config.confirmations), "must be an integer >= 1");
  }
  for (const [variable, value] of [
    ["RELAY_ADDRESS", config.relayAddress],
    ["FEE_TOKEN_ADDRESS", config.feeTokenAddress],
  ] as const) {
    if (value !== undefined && (!ethers.isAddress(value) || ethers.getAddress(value) === ethers.ZeroAddress)) {
      throw configError(variable, value, "not a valid non-zero address");
    }
  }
}

export function toChainRoleOptions(config: BridgeEnvConfig): ChainRoleOptions {
  return {
    homeChainIds: config.homeChainIds,
    awayChainIds: config.awayChainIds,
    unknownChainPolicy: config.unknownChainPolicy,
  };
}
