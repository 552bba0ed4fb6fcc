/**
 * Terminal UI helpers
 *
 * Semantic, TTY-aware styling for launcher output.
 *
 * Constraints:
 * - NO EMOJIS (ASCII only: [OK], [X], [!], [i])
 * - TTY-aware (plain text in pipes/CI)
 * - Respects NO_COLOR environment variable
 *
 * @module utils/ui
 */

import boxen from 'boxen';
import chalk from 'chalk';
import type { BoxOptions, SemanticColor } from '../types/utils';

// =============================================================================
// TTY & COLOR DETECTION
// =============================================================================

/**
 * Check if colors should be used
 * Respects NO_COLOR and FORCE_COLOR environment variables
 */
function useColors(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR) return false;
  return !!process.stderr.isTTY;
}

// =============================================================================
// COLOR SYSTEM
// =============================================================================

/**
 * Apply semantic color to text
 */
export function color(text: string, semantic: SemanticColor): string {
  if (!useColors()) return text;

  switch (semantic) {
    case 'success':
      return chalk.green.bold(text);
    case 'error':
      return chalk.red.bold(text);
    case 'warning':
      return chalk.yellow(text);
    case 'info':
      return chalk.cyan(text);
    case 'path':
      return chalk.cyan.underline(text);
    default:
      return text;
  }
}

// =============================================================================
// STATUS INDICATORS (ASCII only - NO EMOJIS)
// =============================================================================

export function ok(message: string): string {
  return `${color('[OK]', 'success')} ${message}`;
}

export function fail(message: string): string {
  return `${color('[X]', 'error')} ${message}`;
}

export function warn(message: string): string {
  return `${color('[!]', 'warning')} ${message}`;
}

export function info(message: string): string {
  return `${color('[i]', 'info')} ${message}`;
}

// =============================================================================
// BOX RENDERING
// =============================================================================

/**
 * Render content in a box. Borders stay uncolored outside a TTY.
 */
export function box(content: string, options: BoxOptions = {}): string {
  const body = options.title ? `${color(options.title, 'error')}\n\n${content}` : content;
  return boxen(body, {
    padding: options.padding ?? 1,
    margin: options.margin ?? 0,
    borderColor: useColors() ? options.borderColor : undefined,
  });
}

/**
 * Render error box (red border)
 */
export function errorBox(content: string, title = 'ERROR'): string {
  return box(content, { title, borderColor: 'red', padding: 1, margin: 1 });
}
