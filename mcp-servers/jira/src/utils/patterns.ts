/**
 * Centralized pattern definitions
 * Single source of truth - all services should import from here
 */

/**
 * Testim references in ticket prose, scanned in this order.
 * Names may use any script, so word characters are Unicode letters and digits.
 */
export const TESTIM_REFERENCE_PATTERNS: readonly RegExp[] = [
  // Links into the Testim app or any URL carrying the tool name
  /https?:\/\/[^\s]*testim[^\s]*/giu,
  // "Testim: checkout-flow"
  /testim[:\s]+[\p{L}\p{N}_\-]+/giu,
  // "test id: 1234", "testim-link: runs/abc", "test_ref: smoke-7"
  /test(?:im)?[\s\-_]*(?:id|name|link|url|ref)[\s:]+[\p{L}\p{N}_\-/]+/giu,
];

export const ISSUE_KEY_PATTERN = /^[A-Z][A-Z0-9]+-\d+$/;

/** Changelog item field that carries workflow status changes */
export const STATUS_FIELD = 'status';
