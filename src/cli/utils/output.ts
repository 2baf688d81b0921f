/**
 * CLI output utilities.
 *
 * Shared formatting helpers for consistent command-line output across
 * the announce and query commands.
 *
 * @module cli/utils/output
 */

import { type ContentAddress, formatContentAddress } from '../../content/address.js';
import type { PeerId } from '../../content/peer-id.js';
import { AnnounceKind } from '../../protocol/types.js';

// =============================================================================
// Colors
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
} as const;

/**
 * Apply ANSI color to text
 */
export function colorize(text: string, color: string): string {
  return `${color}${text}${ansiColors.reset}`;
}

// =============================================================================
// Text Helpers
// =============================================================================

/**
 * Pad text to a fixed width
 */
export function padText(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}

/**
 * "1 item" / "3 items"
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function describeKind(kind: AnnounceKind): 'complete' | 'partial' {
  return kind === AnnounceKind.Complete ? 'complete' : 'partial';
}

// =============================================================================
// Message Formatting
// =============================================================================

/**
 * Format a success message
 */
export function successMessage(message: string): string {
  return colorize(`[OK] ${message}`, ansiColors.green);
}

/**
 * Format an error message
 */
export function errorMessage(message: string): string {
  return colorize(`[ERROR] ${message}`, ansiColors.red);
}

/**
 * Format a warning message
 */
export function warnMessage(message: string): string {
  return colorize(`[WARN] ${message}`, ansiColors.yellow);
}

// =============================================================================
// Key-Value Display
// =============================================================================

/**
 * Format a key-value pair for display
 */
export function formatKeyValue(key: string, value: string, keyWidth: number = 10): string {
  return `${colorize(padText(key + ':', keyWidth), ansiColors.dim)} ${value}`;
}

// =============================================================================
// JSON Output
// =============================================================================

export interface AnnounceJson {
  tracker: string;
  host: string;
  kind: 'complete' | 'partial';
  content: string[];
}

export interface ErrorJson {
  error: string;
}

export interface QueryJson {
  tracker: string;
  content: string;
  hosts: string[];
}

export function announceToJson(
  tracker: PeerId,
  host: PeerId,
  kind: AnnounceKind,
  content: readonly ContentAddress[]
): AnnounceJson {
  return {
    tracker: tracker.toString(),
    host: host.toString(),
    kind: describeKind(kind),
    content: content.map(formatContentAddress),
  };
}

export function queryToJson(
  tracker: PeerId,
  content: ContentAddress,
  hosts: readonly PeerId[]
): QueryJson {
  return {
    tracker: tracker.toString(),
    content: formatContentAddress(content),
    hosts: hosts.map((host) => host.toString()),
  };
}

export function errorToJson(message: string): ErrorJson {
  return { error: message };
}
