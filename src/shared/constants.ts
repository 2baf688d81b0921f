/**
 * Shared constants.
 *
 * @module shared/constants
 */

/** Package version shown by the CLI */
export const VERSION = '0.1.0';

/** Name of the command-line binary */
export const BIN_NAME = 'content-tracker';
