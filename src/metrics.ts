/**
 * Loop Vault - Prometheus Metrics
 *
 * Metrics naming convention:  loopvault_<metric>_<unit>
 */

import { Registry, Counter, Gauge } from "prom-client";

/** Registry for everything the engine records. */
export const register: Registry = new Registry();

/** Top-level operations by outcome. */
export const operationsTotal = new Counter({
  name: "loopvault_operations_total",
  help: "Top-level vault operations",
  labelNames: ["kind", "status"] as const, // status: committed | rejected
  registers: [register],
});

/** Rejections by error code (collaborator failures are labelled "external"). */
export const operationRejectionsTotal = new Counter({
  name: "loopvault_operation_rejections_total",
  help: "Rejected vault operations by reason",
  labelNames: ["kind", "code"] as const,
  registers: [register],
});

export const sessionActionsTotal = new Counter({
  name: "loopvault_session_actions_total",
  help: "Primitive actions executed inside sessions",
  labelNames: ["action"] as const,
  registers: [register],
});

export const healthFactorGauge = new Gauge({
  name: "loopvault_health_factor",
  help: "Health factor after the last committed operation",
  registers: [register],
});

export const navGauge = new Gauge({
  name: "loopvault_nav",
  help: "Net asset value after the last committed operation, whole borrowed-asset units",
  registers: [register],
});
