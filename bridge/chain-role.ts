/**
 * Gauss Stable Bridge - Chain role resolution
 *
 * A deployment is either on the home chain (Gauss, where the wrapped asset
 * is minted and burned) or on an away chain (where it is locked and
 * released). The role is resolved once, at initialization, and never
 * re-evaluated.
 */

import { Restore } from "./chain";
import { BridgeError, Reason, ensure } from "./errors";

export type ChainRole = "home" | "away";

/** What to do with a chain id that is neither a home nor a listed away chain. */
export type UnknownChainPolicy = "away" | "reject";

export const GAUSS_MAINNET_CHAIN_ID = 1777n;
export const GAUSS_TESTNET_CHAIN_ID = 1452n;
export const POLYGON_MAINNET_CHAIN_ID = 137n;
export const POLYGON_MUMBAI_CHAIN_ID = 80001n;

const NETWORK_NAMES: ReadonlyMap<bigint, string> = new Map([
  [GAUSS_MAINNET_CHAIN_ID, "gauss-mainnet"],
  [GAUSS_TESTNET_CHAIN_ID, "gauss-testnet"],
  [POLYGON_MAINNET_CHAIN_ID, "polygon-mainnet"],
  [POLYGON_MUMBAI_CHAIN_ID, "polygon-mumbai"],
]);

export interface ChainRoleOptions {
  homeChainIds: readonly bigint[];
  awayChainIds: readonly bigint[];
  unknownChainPolicy: UnknownChainPolicy;
}

export const DEFAULT_CHAIN_ROLE_OPTIONS: ChainRoleOptions = {
  homeChainIds: [GAUSS_MAINNET_CHAIN_ID, GAUSS_TESTNET_CHAIN_ID],
  awayChainIds: [POLYGON_MAINNET_CHAIN_ID, POLYGON_MUMBAI_CHAIN_ID],
  unknownChainPolicy: "away",
};

export function isKnownChain(
  chainId: bigint,
  options: ChainRoleOptions = DEFAULT_CHAIN_ROLE_OPTIONS
): boolean {
  return options.homeChainIds.includes(chainId) || options.awayChainIds.includes(chainId);
}

export function describeChain(chainId: bigint): string {
  return NETWORK_NAMES.get(chainId) ?? `chain-${chainId}`;
}

/**
 * Resolve the role for the chain the contract observes itself running on.
 * Home is the single distinguished role; everything else is away unless
 * the policy rejects unknown chains.
 */
export function resolveChainRole(
  observedChainId: bigint,
  options: ChainRoleOptions = DEFAULT_CHAIN_ROLE_OPTIONS
): ChainRole {
  if (options.homeChainIds.includes(observedChainId)) return "home";
  if (options.awayChainIds.includes(observedChainId)) return "away";
  if (options.unknownChainPolicy === "reject") {
    throw new BridgeError(Reason.UNSUPPORTED_CHAIN, "configuration", {
      context: { chainId: observedChainId.toString() },
    });
  }
  return "away";
}

type LatchState = { status: "uninitialized" } | { status: "initialized"; role: ChainRole };

/**
 * One-time initialization state machine shared by the token and the
 * coordinator. Uninitialized -> Initialized is the only transition, and it
 * fixes the chain role for good.
 */
export class RoleLatch {
  private state: LatchState = { status: "uninitialized" };

  constructor(private readonly options: ChainRoleOptions = DEFAULT_CHAIN_ROLE_OPTIONS) {}

  get initialized(): boolean {
    return this.state.status === "initialized";
  }

  initialize(observedChainId: bigint): ChainRole {
    ensure(this.state.status === "uninitialized", Reason.ALREADY_INITIALIZED, "configuration");
    const role = resolveChainRole(observedChainId, this.options);
    this.state = { status: "initialized", role };
    return role;
  }

  role(): ChainRole {
    const state = this.state;
    ensure(state.status === "initialized", Reason.NOT_INITIALIZED, "configuration");
    return state.role;
  }

  /** False before initialization. */
  isHome(): boolean {
    return this.state.status === "initialized" && this.state.role === "home";
  }

  checkpoint(): Restore {
    const saved = this.state;
    return () => {
      this.state = saved;
    };
  }
}
