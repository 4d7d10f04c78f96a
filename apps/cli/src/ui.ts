/**
 * Shared terminal styling: ANSI constants, box drawing and width-aware
 * padding. Everything here is a pure string function.
 */

import type { TunnelStatus } from '@portshift/core';

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const UNDERLINE = '\x1b[4m';
export const INVERSE = '\x1b[7m';
export const RED = '\x1b[31m';
export const GREEN = '\x1b[32m';
export const YELLOW = '\x1b[33m';
export const TEAL = '\x1b[38;2;0;180;170m';
export const TEAL_DIM = '\x1b[38;2;0;110;105m';

export const BOX = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
} as const;

export const CHECK = `${GREEN}✓${RESET}`;
export const CROSS = `${RED}✗${RESET}`;
export const WARN = `${YELLOW}!${RESET}`;
export const ELLIPSIS = '…';

// ---------------------------------------------------------------------------
// Width helpers
// ---------------------------------------------------------------------------

const ANSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/** Number of visible characters, ignoring escape sequences. */
export function visibleLength(text: string): number {
  return [...stripAnsi(text)].length;
}

/** Cut plain text to `width` characters, marking the cut with an ellipsis. */
export function truncate(text: string, width: number): string {
  if (width <= 0) return '';
  const chars = [...text];
  if (chars.length <= width) return text;
  return chars.slice(0, width - 1).join('') + ELLIPSIS;
}

/** Right-pad to a visible width. Longer input is returned unchanged. */
export function padVisible(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - visibleLength(text)));
}

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/**
 * Draw a rounded box `width` columns wide. With `height`, the body is padded
 * or cut so the box is exactly that many rows.
 */
export function box(title: string, lines: readonly string[], width: number, height?: number): string {
  const inner = Math.max(0, width - 2);
  const label = title ? truncate(title, Math.max(0, inner - 3)) : '';
  const head = label ? `${BOX.horizontal} ${RESET}${BOLD}${label}${RESET}${TEAL_DIM} ` : '';
  const fill = Math.max(0, inner - (label ? visibleLength(label) + 3 : 0));

  let body = [...lines];
  if (height !== undefined) {
    const rows = Math.max(0, height - 2);
    body = body.slice(0, rows);
    while (body.length < rows) body.push('');
  }

  const out = [`${TEAL_DIM}${BOX.topLeft}${head}${BOX.horizontal.repeat(fill)}${BOX.topRight}${RESET}`];
  for (const line of body) {
    out.push(`${TEAL_DIM}${BOX.vertical}${RESET}${padVisible(line, inner)}${TEAL_DIM}${BOX.vertical}${RESET}`);
  }
  out.push(`${TEAL_DIM}${BOX.bottomLeft}${BOX.horizontal.repeat(inner)}${BOX.bottomRight}${RESET}`);
  return out.join('\n');
}

export function sectionHeader(title: string, width = 60): string {
  const rule = BOX.horizontal.repeat(Math.max(0, width - visibleLength(title) - 1));
  return `${TEAL}${BOLD}${title}${RESET} ${TEAL_DIM}${rule}${RESET}`;
}

export function kvRow(label: string, value: string, labelWidth = 14): string {
  return `  ${BOLD}${label.padEnd(labelWidth)}${RESET}${value}`;
}

export function separator(width = 60): string {
  return `${TEAL_DIM}${BOX.horizontal.repeat(width)}${RESET}`;
}

// ---------------------------------------------------------------------------
// Tunnel status
// ---------------------------------------------------------------------------

const STATUS_STYLE: Record<TunnelStatus, { glyph: string; badge: string; color: string }> = {
  idle: { glyph: '○', badge: 'IDLE', color: DIM },
  connecting: { glyph: '◌', badge: 'CONNECTING', color: YELLOW },
  active: { glyph: '●', badge: 'ACTIVE', color: GREEN },
  stopped: { glyph: '■', badge: 'STOPPED', color: DIM },
  failed: { glyph: '✗', badge: 'FAILED', color: RED },
};

/** One-character status marker, colored. */
export function statusGlyph(status: TunnelStatus): string {
  const style = STATUS_STYLE[status];
  return `${style.color}${style.glyph}${RESET}`;
}

export function statusBadge(status: TunnelStatus): string {
  const style = STATUS_STYLE[status];
  return `${style.color}${BOLD}${style.badge}${RESET}`;
}
