/**
 * Turns an arbitrary string into a token usable as the last segment of an IRI.
 *
 * Every character outside [A-Za-z0-9_] becomes an underscore, runs of
 * underscores collapse to one, and the result is percent-encoded. The
 * function is idempotent. Distinct inputs may share a token ("O'Brien" and
 * "O_Brien" both give "O_Brien"); callers keying nodes by it merge them.
 */
export function sanitizeUriComponent(value: string): string {
    const replaced = value.replace(/[^A-Za-z0-9_]/g, '_').replace(/_+/g, '_');
    return encodeURIComponent(replaced);
}
