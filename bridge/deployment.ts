/**
 * Twin deployment of the bridge on a home and an away chain.
 *
 * The same deployer replays the same deploy sequence on both chains, so the
 * underlying token, GUD and the coordinator land at identical addresses on
 * each side. The coordinator relies on that: inbound messages are accepted
 * only when their sender is the coordinator's own address.
 *
 * Sequence per chain (deployer nonce):
 *   0. underlying stable token (USDC stand-in)
 *   1. GUD wrapped stable
 *   2. bridge coordinator
 * The relay gateway is deployed by the relay operator and may differ.
 */

import { ethers } from "ethers";
import { Chain } from "./chain";
import { StandardToken, TokenMetadata } from "./erc20-token";
import { GUD_DECIMALS, WrappedStable } from "./wrapped-stable";
import { BridgeCoordinator } from "./bridge-coordinator";
import { InMemoryRelayGateway, InMemoryRelayNetwork } from "./in-memory-relay";
import {
  ChainRoleOptions,
  DEFAULT_CHAIN_ROLE_OPTIONS,
  GAUSS_MAINNET_CHAIN_ID,
  POLYGON_MAINNET_CHAIN_ID,
  describeChain,
} from "./chain-role";
import { Reason, ensure } from "./errors";
import { componentLogger } from "./logger";

const log = componentLogger("deployment");

export const DEFAULT_DEPLOYER = "0x1000000000000000000000000000000000000001";
export const DEFAULT_RELAY_OPERATOR = "0x2000000000000000000000000000000000000002";

export const UNDERLYING_METADATA: TokenMetadata = {
  name: "USD Coin",
  symbol: "USDC",
  decimals: GUD_DECIMALS,
};

export interface BridgePairOptions {
  homeChainId?: bigint;
  awayChainId?: bigint;
  deployer?: string;
  relayOperator?: string;
  /** Relay fee, in GUD base units. */
  feeAmount?: bigint;
  confirmations?: number;
  roleOptions?: ChainRoleOptions;
}

export interface BridgeSide {
  chain: Chain;
  underlying: StandardToken;
  gud: WrappedStable;
  coordinator: BridgeCoordinator;
  gateway: InMemoryRelayGateway;
}

export interface BridgePair {
  home: BridgeSide;
  away: BridgeSide;
  network: InMemoryRelayNetwork;
  deployer: string;
}

function deploySide(
  chainId: bigint,
  deployer: string,
  relayOperator: string,
  network: InMemoryRelayNetwork,
  roleOptions: ChainRoleOptions
): BridgeSide {
  const chain = new Chain({ chainId, name: describeChain(chainId) });
  const underlying = chain.deploy(
    new StandardToken(chain, chain.nextContractAddress(deployer), deployer, UNDERLYING_METADATA)
  );
  const gud = chain.deploy(
    new WrappedStable(chain, chain.nextContractAddress(deployer), deployer, underlying.address, roleOptions)
  );
  const coordinator = chain.deploy(
    new BridgeCoordinator(chain, chain.nextContractAddress(deployer), deployer, roleOptions)
  );
  const gateway = network.attach(chain, gud.address, relayOperator);
  return { chain, underlying, gud, coordinator, gateway };
}

function initSide(side: BridgeSide, deployer: string, remoteChainId: bigint, feeAmount: bigint, confirmations: number): void {
  const { chain, gud, coordinator, gateway } = side;
  chain.transact(deployer, (ctx) => {
    gud.init(ctx, coordinator.address);
    coordinator.init(ctx, {
      relay: gateway.address,
      feeToken: gud.address,
      localAsset: gud.address,
      pairedAsset: gud.address,
      feeAmount,
      confirmations,
      remoteChainId,
    });
  });
}

/** Deploy and initialize both sides and wire them to one relay network. */
export function deployBridgePair(options: BridgePairOptions = {}): BridgePair {
  const homeChainId = options.homeChainId ?? GAUSS_MAINNET_CHAIN_ID;
  const awayChainId = options.awayChainId ?? POLYGON_MAINNET_CHAIN_ID;
  const deployer = ethers.getAddress(options.deployer ?? DEFAULT_DEPLOYER);
  const relayOperator = ethers.getAddress(options.relayOperator ?? DEFAULT_RELAY_OPERATOR);
  const feeAmount = options.feeAmount ?? ethers.parseUnits("1", GUD_DECIMALS);
  const confirmations = options.confirmations ?? 1;
  const roleOptions = options.roleOptions ?? DEFAULT_CHAIN_ROLE_OPTIONS;

  const network = new InMemoryRelayNetwork();
  const home = deploySide(homeChainId, deployer, relayOperator, network, roleOptions);
  const away = deploySide(awayChainId, deployer, relayOperator, network, roleOptions);

  ensure(
    home.coordinator.address === away.coordinator.address && home.gud.address === away.gud.address,
    Reason.INVALID_CONFIGURATION,
    "invariant",
    { home: home.coordinator.address, away: away.coordinator.address }
  );

  initSide(home, deployer, awayChainId, feeAmount, confirmations);
  initSide(away, deployer, homeChainId, feeAmount, confirmations);

  log.info("bridge pair deployed", {
    home: describeChain(homeChainId),
    away: describeChain(awayChainId),
    coordinator: home.coordinator.address,
    gud: home.gud.address,
  });
  return { home, away, network, deployer };
}
