/** Shared types used across the simulator. */

/** Algorithms the runner knows how to execute. */
export const ALGORITHMS = ["chandy_lamport", "lai_yang", "chang_roberts"] as const;

export type AlgorithmName = (typeof ALGORITHMS)[number];

/** Human readable labels used in trace lines. */
export const ALGORITHM_LABELS: Record<AlgorithmName, string> = {
  chandy_lamport: "Chandy-Lamport",
  lai_yang: "Lai-Yang",
  chang_roberts: "Chang-Roberts",
};

/** Catalogue of stable error codes grouped by feature family. */
export const ERROR_CATALOG = {
  SIM: {
    EMPTY_GRAPH: "E-SIM-EMPTY-GRAPH",
    TOPOLOGY: "E-SIM-TOPOLOGY",
    INITIATOR: "E-SIM-INITIATOR",
    INTERNAL: "E-SIM-INTERNAL",
  },
  GRAPH: {
    INPUT: "E-GRAPH-INPUT",
  },
  CLI: {
    USAGE: "E-CLI-USAGE",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `SIM_TOPOLOGY`).
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(catalog: T): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.SIM_TOPOLOGY`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];
