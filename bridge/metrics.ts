/**
 * Gauss Stable Bridge - Prometheus metrics
 *
 * Counters and gauges for the coordinator and the relay network.
 * Naming convention:  gud_bridge_<metric>_<unit>
 */

import { Registry, Counter, Gauge, Histogram } from "prom-client";

// ============================================================
//  REGISTRY
// ============================================================

/** Registry shared by every bridge component in this process. */
export const register: Registry = new Registry();

// ============================================================
//  COUNTERS
// ============================================================

/** Outbound transfers accepted by a coordinator (lock or burn committed). */
export const transfersInitiatedTotal = new Counter({
  name: "gud_bridge_transfers_initiated_total",
  help: "Outbound transfers handed to the relay",
  labelNames: ["role", "express"] as const,
  registers: [register],
});

/** Inbound relay messages credited (mint or unlock committed). */
export const messagesProcessedTotal = new Counter({
  name: "gud_bridge_messages_processed_total",
  help: "Inbound relay messages credited to recipients",
  labelNames: ["role"] as const,
  registers: [register],
});

/** Rejected calls by operation and reason string. */
export const rejectionsTotal = new Counter({
  name: "gud_bridge_rejections_total",
  help: "Calls rejected by a bridge component",
  labelNames: ["operation", "reason"] as const,
  registers: [register],
});

/** Relay delivery attempts by outcome. */
export const relayDeliveriesTotal = new Counter({
  name: "gud_bridge_relay_deliveries_total",
  help: "Relay delivery attempts",
  labelNames: ["status"] as const, // delivered | reverted
  registers: [register],
});

// ============================================================
//  GAUGES
// ============================================================

/** Messages sent but not yet delivered. */
export const relayPendingMessages = new Gauge({
  name: "gud_bridge_relay_pending_messages",
  help: "Relay messages awaiting delivery",
  registers: [register],
});

// ============================================================
//  HISTOGRAMS
// ============================================================

/** Net amount of outbound transfers, in whole token units. */
export const transferNetAmount = new Histogram({
  name: "gud_bridge_transfer_net_amount_tokens",
  help: "Net amount of outbound transfers in whole tokens",
  buckets: [1, 10, 100, 1_000, 10_000, 100_000, 1_000_000],
  registers: [register],
});

/** Prometheus text-format payload for the registry. */
export async function renderMetrics(): Promise<string> {
  return register.metrics();
}
