/**
 * Shared types used across the partitioner. Grouping these definitions keeps
 * the error codes consistent between the engine, the text readers and the CLI.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Every error raised by the engine carries one of these codes so front ends can
 * branch on the failure kind without parsing messages.
 */
export const ERROR_CATALOG = {
  KL: {
    STRUCTURE: "E-KL-STRUCTURE",
    PARAMETER: "E-KL-PARAMETER",
    BALANCE: "E-KL-BALANCE",
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

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `KL_BALANCE`). The helper keeps runtime data immutable while
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

/** Flat access to all stable error codes (e.g. `ERROR_CODES.KL_PARAMETER`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];
