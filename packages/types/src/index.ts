/**
 * @keepsake/types — Shared domain types for the Keepsake stack.
 *
 * Used across all Keepsake packages:
 * - Financial primitives (Money, Currency)
 * - Identities and the reserved no-single-beneficiary marker
 * - Fact (event) architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Financial types
export type { Money, Currency, UnixSeconds } from "./financial.js";

// Identity
export type { Identity } from "./identity.js";
export { MAX_IDENTITY_LENGTH, isIdentity } from "./identity.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isRecord,
  isMoney,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
