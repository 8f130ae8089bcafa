/**
 * Unit tests for bridge/in-memory-relay.ts
 * Tests fee collection, confirmation gating, delivery order, at-most-once
 * delivery and retry of reverted deliveries.
 */

import { ZERO_ADDRESS } from "../chain";
import { MAX_UINT256 } from "../ledger";
import { BridgePair, deployBridgePair } from "../deployment";
import { GAUSS_MAINNET_CHAIN_ID, POLYGON_MAINNET_CHAIN_ID } from "../chain-role";
import { Reason } from "../errors";
import { ALICE, BOB, CAROL, captureError, fundWithGud, units } from "./fixtures";

/** Fund ALICE on the away chain and let the coordinator pull her GUD. */
function prepareSender(pair: BridgePair, amount: bigint): void {
  fundWithGud(pair.away, pair.deployer, ALICE, amount);
  pair.away.chain.transact(ALICE, (ctx) => pair.away.gud.approve(ctx, pair.away.coordinator.address, MAX_UINT256));
}

function sendFromAway(pair: BridgePair, recipient: string, amount: bigint, express = false): string {
  const { chain, coordinator } = pair.away;
  return chain.transact(ALICE, (ctx) => coordinator.initiateTransfer(ctx, recipient, amount, ALICE, express)).result;
}

// ═══════════════════════════════════════════════
// Gateway
// ═══════════════════════════════════════════════

describe("InMemoryRelayGateway", () => {
  let pair: BridgePair;

  beforeEach(() => {
    pair = deployBridgePair();
    fundWithGud(pair.away, pair.deployer, ALICE, units("10"));
  });

  it("should collect the fee and queue the message", () => {
    const { chain, gud, gateway } = pair.away;
    chain.transact(ALICE, (ctx) => gud.approve(ctx, gateway.address, units("2")));

    const txId = chain.transact(ALICE, (ctx) =>
      gateway.sendRequest(ctx, BOB, GAUSS_MAINNET_CHAIN_ID, units("2"), ALICE, "0x01", 1)
    ).result;

    expect(gateway.collectedFees()).toBe(units("2"));
    expect(gud.balanceOf(ALICE)).toBe(units("8"));
    expect(pair.network.pending()).toHaveLength(1);
    expect(pair.network.pending()[0]).toMatchObject({
      txId,
      sourceChainId: POLYGON_MAINNET_CHAIN_ID,
      destChainId: GAUSS_MAINNET_CHAIN_ID,
      sender: ALICE,
      recipient: BOB,
      feeAmount: units("2"),
      source: ALICE,
      data: "0x01",
      confirmations: 1,
      express: false,
    });
  });

  it("should charge each sender in the fee token it registered", () => {
    const { chain, gud, underlying, gateway } = pair.away;
    chain.transact(pair.deployer, (ctx) => underlying.mint(ctx, ALICE, units("3")));
    chain.transact(ALICE, (ctx) => {
      gateway.setFeeToken(ctx, underlying.address);
      underlying.approve(ctx, gateway.address, units("3"));
    });
    expect(gateway.feeTokenFor(ALICE)).toBe(underlying.address);
    expect(gateway.feeTokenFor(BOB)).toBe(gud.address);

    chain.transact(ALICE, (ctx) => gateway.sendRequest(ctx, BOB, GAUSS_MAINNET_CHAIN_ID, units("3"), ALICE, "0x01", 1));

    expect(gateway.collectedFees(underlying.address)).toBe(units("3"));
    expect(gateway.collectedFees()).toBe(0n);
    expect(gud.balanceOf(ALICE)).toBe(units("10"));
  });

  it("should refuse a zero fee token", () => {
    const { chain, gateway } = pair.away;
    expect(() => chain.transact(ALICE, (ctx) => gateway.setFeeToken(ctx, ZERO_ADDRESS))).toThrow(Reason.ZERO_ADDRESS);
    expect(gateway.feeTokenFor(ALICE)).toBe(pair.away.gud.address);
  });

  it("should assign distinct ids to identical requests", () => {
    const { chain, gateway } = pair.away;
    const send = (): string =>
      chain.transact(ALICE, (ctx) => gateway.sendRequest(ctx, BOB, GAUSS_MAINNET_CHAIN_ID, 0n, ALICE, "0x01", 1)).result;
    expect(send()).not.toBe(send());
  });

  it("should leave no message behind when the fee cannot be collected", () => {
    const { chain, gateway } = pair.away;
    expect(() =>
      chain.transact(ALICE, (ctx) => gateway.sendRequest(ctx, BOB, GAUSS_MAINNET_CHAIN_ID, units("1"), ALICE, "0x01", 1))
    ).toThrow(Reason.INSUFFICIENT_ALLOWANCE);
    expect(pair.network.pending()).toEqual([]);
    expect(gateway.sent()).toEqual([]);
  });

  it("should reject unknown destination chains", () => {
    const { chain, gateway } = pair.away;
    const err = captureError(() =>
      chain.transact(ALICE, (ctx) => gateway.sendRequest(ctx, BOB, 56n, 0n, ALICE, "0x01", 1))
    );
    expect(err.reason).toBe(Reason.RELAY_UNKNOWN_DESTINATION);
    expect(err.context).toEqual({ destChainId: "56" });
  });

  it("should only record deliveries made by itself", () => {
    const { chain, gateway } = pair.home;
    const message = {
      txId: "0x00",
      sourceChainId: 1n,
      destChainId: 2n,
      sender: ALICE,
      recipient: BOB,
      feeAmount: 0n,
      source: ALICE,
      data: "0x",
      confirmations: 1,
      express: false,
      sentAtBlock: 1,
      sequence: 1,
    };
    expect(() => chain.transact(ALICE, (ctx) => gateway.recordDelivery(ctx, message))).toThrow(Reason.NOT_AUTHORIZED);
  });
});

// ═══════════════════════════════════════════════
// Network
// ═══════════════════════════════════════════════

describe("InMemoryRelayNetwork", () => {
  it("should hold messages until the source chain has enough confirmations", () => {
    const pair = deployBridgePair({ confirmations: 3 });
    prepareSender(pair, units("10"));
    const txId = sendFromAway(pair, BOB, units("10"));

    const [message] = pair.network.pending();
    expect(pair.network.isConfirmed(message)).toBe(false);
    expect(() => pair.network.deliver(txId)).toThrow(Reason.RELAY_NOT_CONFIRMED);
    expect(pair.network.deliverReady()).toEqual({ delivered: [], failed: [] });

    pair.away.chain.mine(1);
    expect(pair.network.isConfirmed(message)).toBe(false);
    pair.away.chain.mine(1);
    expect(pair.network.isConfirmed(message)).toBe(true);

    expect(pair.network.deliverReady()).toEqual({ delivered: [txId], failed: [] });
    expect(pair.home.gud.balanceOf(BOB)).toBe(units("9"));
  });

  it("should deliver each message at most once", () => {
    const pair = deployBridgePair();
    prepareSender(pair, units("10"));
    const txId = sendFromAway(pair, BOB, units("10"));

    pair.network.deliver(txId);
    expect(pair.network.isDelivered(txId)).toBe(true);
    expect(pair.network.pending()).toEqual([]);
    expect(() => pair.network.deliver(txId)).toThrow(Reason.RELAY_ALREADY_DELIVERED);
    expect(pair.network.deliverReady()).toEqual({ delivered: [], failed: [] });
    expect(pair.home.gud.balanceOf(BOB)).toBe(units("9"));
  });

  it("should reject unknown message ids", () => {
    const pair = deployBridgePair();
    expect(() => pair.network.deliver("0x1234")).toThrow(Reason.RELAY_UNKNOWN_MESSAGE);
  });

  it("should deliver express messages first", () => {
    const pair = deployBridgePair();
    prepareSender(pair, units("20"));
    const regular = sendFromAway(pair, BOB, units("10"));
    const express = sendFromAway(pair, CAROL, units("10"), true);

    expect(pair.network.pending().map((message) => message.txId)).toEqual([express, regular]);
    expect(pair.network.deliverReady().delivered).toEqual([express, regular]);
  });

  it("should allow delivery out of send order", () => {
    const pair = deployBridgePair();
    prepareSender(pair, units("20"));
    const first = sendFromAway(pair, BOB, units("10"));
    const second = sendFromAway(pair, CAROL, units("10"));

    pair.network.deliver(second);
    expect(pair.home.gud.balanceOf(CAROL)).toBe(units("9"));
    expect(pair.home.gud.balanceOf(BOB)).toBe(0n);
    pair.network.deliver(first);
    expect(pair.home.gud.balanceOf(BOB)).toBe(units("9"));
  });

  it("should keep a reverted delivery pending and retry it", () => {
    const pair = deployBridgePair();
    prepareSender(pair, units("10"));
    pair.home.chain.transact(pair.deployer, (ctx) => pair.home.gud.pause(ctx));
    const txId = sendFromAway(pair, BOB, units("10"));

    expect(pair.network.deliverReady()).toEqual({
      delivered: [],
      failed: [{ txId, reason: Reason.PAUSED, attempts: 1 }],
    });
    expect(pair.network.attemptsFor(txId)).toEqual({ attempts: 1, lastError: Reason.PAUSED });
    expect(pair.network.pending()).toHaveLength(1);
    expect(pair.home.gud.totalSupply()).toBe(0n);

    pair.home.chain.transact(pair.deployer, (ctx) => pair.home.gud.unpause(ctx));
    expect(pair.network.deliverReady()).toEqual({ delivered: [txId], failed: [] });
    expect(pair.network.attemptsFor(txId)).toEqual({ attempts: 2 });
    expect(pair.home.gud.balanceOf(BOB)).toBe(units("9"));
  });

  it("should record the delivery on the destination gateway", () => {
    const pair = deployBridgePair();
    prepareSender(pair, units("10"));
    const txId = sendFromAway(pair, BOB, units("10"));
    pair.network.deliver(txId);

    const logs = pair.home.chain.getLogs({ address: pair.home.gateway.address, event: "MessageDelivered" });
    expect(logs.map((log) => log.args)).toEqual([
      { txId, sourceChainId: POLYGON_MAINNET_CHAIN_ID, recipient: pair.home.coordinator.address },
    ]);
  });

  it("should refuse to deliver to a contract without a message handler", () => {
    const pair = deployBridgePair();
    const { chain, gateway } = pair.away;
    const txId = chain.transact(ALICE, (ctx) =>
      gateway.sendRequest(ctx, pair.home.gud.address, GAUSS_MAINNET_CHAIN_ID, 0n, ALICE, "0x", 1)
    ).result;

    expect(() => pair.network.deliver(txId)).toThrow(Reason.RELAY_NO_RECEIVER);
    expect(pair.network.attemptsFor(txId).attempts).toBe(1);
  });

  it("should refuse a second gateway on the same chain", () => {
    const pair = deployBridgePair();
    expect(() => pair.network.attach(pair.home.chain, pair.home.gud.address, ALICE)).toThrow(
      Reason.INVALID_CONFIGURATION
    );
  });
});
