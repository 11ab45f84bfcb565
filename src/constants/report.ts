/**
 * Report formatting constants
 */

/**
 * Duplicate groups listed per table before truncating with "... and N more"
 */
export const REPORT_SAMPLE_LIMIT = 5;

/**
 * Width of the horizontal rules framing report sections
 */
export const REPORT_RULE_WIDTH = 70;

/**
 * Prompt shown before a confirmed cleanup
 */
export const CLEANUP_CONFIRM_PROMPT =
  "Found duplicates. Proceed with cleanup? (yes/no): ";

/**
 * The only answer (case-insensitive, trimmed) that proceeds with cleanup
 */
export const CLEANUP_CONFIRM_ANSWER = "yes";
