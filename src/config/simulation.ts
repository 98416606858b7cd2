import { DEFAULT_TRAFFIC, type TrafficPlan } from "../algorithms/traffic.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readBool, readEnum, readInt, readOptionalString } from "./env.js";

/** Settings shared by the runner and the CLI, resolved from the environment. */
export interface SimulationConfig {
  /** Seed making every run reproducible; unset means `Math.random`. */
  readonly seed?: string;
  readonly traffic: TrafficPlan;
  /** File mirroring structured log entries; unset disables mirroring. */
  readonly logFile?: string;
  readonly logLevel: LogLevel;
}

/** Upper bound keeping a misconfigured run from flooding the queue. */
const MAX_TRAFFIC = 1_000;

/**
 * Reads `DISTSIM_*` variables:
 *
 * - `DISTSIM_SEED`
 * - `DISTSIM_TRAFFIC_BEFORE_CUT`, `DISTSIM_TRAFFIC_AFTER_CUT`,
 *   `DISTSIM_TRAFFIC_PER_RESPONSE`
 * - `DISTSIM_LOG_FILE`
 * - `DISTSIM_LOG_LEVEL` (`debug`, `info`, `warn` or `error`)
 * - `DISTSIM_LOG_VERBOSE`, shorthand for the `debug` level which mirrors every
 *   trace line
 */
export function loadSimulationConfig(): SimulationConfig {
  const bounds = { min: 0, max: MAX_TRAFFIC };
  return {
    seed: readOptionalString("DISTSIM_SEED"),
    traffic: {
      beforeCut: readInt("DISTSIM_TRAFFIC_BEFORE_CUT", DEFAULT_TRAFFIC.beforeCut, bounds),
      afterCut: readInt("DISTSIM_TRAFFIC_AFTER_CUT", DEFAULT_TRAFFIC.afterCut, bounds),
      perResponse: readInt("DISTSIM_TRAFFIC_PER_RESPONSE", DEFAULT_TRAFFIC.perResponse, bounds),
    },
    logFile: readOptionalString("DISTSIM_LOG_FILE"),
    logLevel: readEnum("DISTSIM_LOG_LEVEL", LOG_LEVELS, readBool("DISTSIM_LOG_VERBOSE", false) ? "debug" : "info"),
  };
}
