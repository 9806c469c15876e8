/**
 * Shared types used across the planner. Grouping these definitions keeps the
 * error codes consistent between the graph engine, the pipeline and the CLI.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth ensures every module emits consistent codes
 * which simplifies documentation and client handling.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
    NODE_RANGE: "E-GRAPH-NODE-RANGE",
    INVALID_WEIGHT: "E-GRAPH-INVALID-WEIGHT",
    FROZEN: "E-GRAPH-FROZEN",
    INVALID_ORDER: "E-GRAPH-INVALID-ORDER",
    PATH_STATE: "E-GRAPH-PATH-STATE",
    DISTANCE_OVERFLOW: "E-GRAPH-DISTANCE-OVERFLOW",
    UNSUPPORTED: "E-GRAPH-UNSUPPORTED",
  },
  PLAN: {
    CYCLIC_CONDENSATION: "E-PLAN-CYCLIC-CONDENSATION",
    UNEXPECTED: "E-PLAN-UNEXPECTED",
  },
  EXPORT: {
    WRITE_FAILED: "E-EXPORT-WRITE-FAILED",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `GRAPH_NODE_RANGE`). The helper keeps runtime data immutable while
 * preserving the strongly typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_NODE_RANGE`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the planner. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. If the provided text is empty once trimmed a generic
 * fallback is returned so reports never carry an empty string.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Serialisable view of an error, used by logs and exported reports. */
export interface ErrorSummary {
  code: ErrorCode;
  message: string;
  hint?: string;
}

/**
 * Converts any thrown value into an {@link ErrorSummary}. Errors exposing a
 * catalogued `code` keep it; everything else is reported as unexpected.
 */
export function summariseError(error: unknown): ErrorSummary {
  const message = normaliseErrorMessage(error instanceof Error ? error.message : String(error));
  if (error instanceof Error && "code" in error && isErrorCode(error.code)) {
    const hint = "hint" in error && typeof error.hint === "string" ? error.hint : undefined;
    return hint === undefined ? { code: error.code, message } : { code: error.code, message, hint };
  }
  return { code: ERROR_CODES.PLAN_UNEXPECTED, message };
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ERROR_CODES));

/** Type guard asserting the value is one of the catalogued codes. */
export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && KNOWN_CODES.has(value);
}
