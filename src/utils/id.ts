/**
 * Identifier validation for values that end up in filesystem paths.
 */

const SAFE_ID_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

/**
 * True when an ID contains only safe characters (alphanumeric, dash,
 * underscore, dot) and does not start with a dot, so it cannot escape the
 * directory it is joined onto.
 */
export function isSafeId(value: string): boolean {
  return SAFE_ID_PATTERN.test(value);
}

/** Throw unless the ID is safe to use as a path segment. */
export function validateId(value: string, label: string): void {
  if (!isSafeId(value)) {
    throw new Error(
      `invalid ${label}: "${value}": must match ${SAFE_ID_PATTERN.source}`,
    );
  }
}
