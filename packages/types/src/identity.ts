/**
 * Identity
 *
 * An identity is an opaque, externally-authenticated principal name.
 * Keepsake never authenticates identities; it only compares them to
 * stored fields.
 */

export type Identity = string;

export const MAX_IDENTITY_LENGTH = 256;

/**
 * A usable identity: a non-empty string without surrounding whitespace,
 * at most MAX_IDENTITY_LENGTH characters.
 */
export function isIdentity(value: unknown): value is Identity {
  return (
    typeof value === "string" &&
    value.length > 0 &&
    value.length <= MAX_IDENTITY_LENGTH &&
    value.trim() === value
  );
}
