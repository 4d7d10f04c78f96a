/**
 * Full-screen frame for the interactive view.
 *
 * `render()` is a pure function of the rows, the selection and the terminal
 * size; the app writes its lines after clearing the screen.
 */

import type { SessionRow } from '@portshift/core';
import {
  BOLD,
  DIM,
  GREEN,
  INVERSE,
  RED,
  RESET,
  UNDERLINE,
  box,
  padVisible,
  statusGlyph,
  truncate,
  visibleLength,
} from '../ui.js';
import { clampView, groupByService } from './view-model.js';
import type { ServiceGroup, ViewState } from './view-model.js';

export interface RenderInput {
  rows: readonly SessionRow[];
  view: ViewState;
  namespace: string;
  width: number;
  height: number;
}

export const MIN_WIDTH = 40;
export const MIN_HEIGHT = 6;

const MARKER = '❯ ';
const NO_MARKER = '  ';
const KEY_HELP = '↑↓ move  ←→ pane  ⏎ toggle  q quit';

export function render(input: RenderInput): string[] {
  const { rows, namespace, width, height } = input;
  if (width < MIN_WIDTH || height < MIN_HEIGHT) {
    return [truncate(`Terminal too small (need ${MIN_WIDTH}x${MIN_HEIGHT})`, Math.max(1, width))];
  }

  const groups = groupByService(rows);
  const view = clampView(input.view, groups);

  const leftWidth = Math.floor(width * 0.6);
  const rightWidth = width - leftWidth;
  const boxHeight = height - 1;
  const bodyRows = boxHeight - 2;

  const left = box(
    'Services',
    servicePane(groups, view, leftWidth - 2, bodyRows, namespace),
    leftWidth,
    boxHeight,
  ).split('\n');

  const group = groups[view.serviceIndex];
  const right = box(
    group ? `Ports · ${group.name}` : 'Ports',
    group ? portPane(group, view, rightWidth - 2, bodyRows) : [],
    rightWidth,
    boxHeight,
  ).split('\n');

  const lines: string[] = [];
  for (let i = 0; i < boxHeight; i++) {
    lines.push(`${left[i] ?? ''}${right[i] ?? ''}`);
  }
  lines.push(footer(namespace, width));
  return lines;
}

// ---------------------------------------------------------------------------
// Panes
// ---------------------------------------------------------------------------

function servicePane(
  groups: readonly ServiceGroup[],
  view: ViewState,
  inner: number,
  rows: number,
  namespace: string,
): string[] {
  if (groups.length === 0) {
    return [`${DIM}${truncate(`No services in namespace ${namespace}`, inner)}${RESET}`];
  }
  const start = scrollStart(view.serviceIndex, groups.length, rows);
  return groups.slice(start, start + rows).map((group, offset) => {
    const index = start + offset;
    return serviceLine(group, index === view.serviceIndex, view.focus === 'services', inner);
  });
}

function serviceLine(group: ServiceGroup, selected: boolean, focused: boolean, inner: number): string {
  const active = group.rows.filter((row) => row.status === 'active').length;
  const count = `${active}/${group.rows.length}`;
  const nameWidth = Math.max(1, inner - MARKER.length - count.length - 1);
  const name = truncate(group.name, nameWidth);
  const gap = ' '.repeat(Math.max(1, inner - MARKER.length - visibleLength(name) - count.length));
  const marker = selected ? MARKER : NO_MARKER;
  const underline = group.rows.some((row) => row.requested) ? UNDERLINE : '';

  if (selected && focused) {
    return `${INVERSE}${marker}${underline}${name}${RESET}${INVERSE}${gap}${count}${RESET}`;
  }
  const countColor = active > 0 ? GREEN : DIM;
  const nameStyle = selected ? BOLD : '';
  return `${marker}${nameStyle}${underline}${name}${RESET}${gap}${countColor}${count}${RESET}`;
}

function portPane(group: ServiceGroup, view: ViewState, inner: number, rows: number): string[] {
  const focused = view.focus === 'ports';
  const start = focused ? scrollStart(view.portIndex, group.rows.length, rows) : 0;
  return group.rows.slice(start, start + rows).map((row, offset) => {
    const selected = focused && start + offset === view.portIndex;
    return portLine(row, selected, inner);
  });
}

/** Plain description of a port: label, port/protocol and its current detail. */
export function describePort(row: SessionRow): string {
  const { label, remotePort, protocol } = row.entry;
  const base = label === String(remotePort) ? `${remotePort}/${protocol}` : `${label} ${remotePort}/${protocol}`;
  if (row.status === 'active' && row.localPort !== null) return `${base} → localhost:${row.localPort}`;
  if (row.status === 'failed' && row.lastError) return `${base} ${row.lastError}`;
  return base;
}

function portLine(row: SessionRow, selected: boolean, inner: number): string {
  const text = truncate(describePort(row), Math.max(1, inner - MARKER.length - 2));
  const glyph = statusGlyph(row.status);
  if (selected) {
    return `${INVERSE}${MARKER}${RESET}${glyph}${INVERSE} ${text}${RESET}`;
  }
  const color = row.status === 'failed' ? RED : '';
  return `${NO_MARKER}${glyph} ${color}${text}${RESET}`;
}

/** First visible index so that `selected` stays inside a window of `rows`. */
export function scrollStart(selected: number, total: number, rows: number): number {
  if (rows <= 0 || total <= rows) return 0;
  return Math.min(Math.max(0, selected - rows + 1), total - rows);
}

function footer(namespace: string, width: number): string {
  const right = `namespace: ${namespace}`;
  const left = truncate(KEY_HELP, Math.max(0, width - right.length - 1));
  return `${DIM}${padVisible(left, width - right.length)}${RESET}${BOLD}${right}${RESET}`;
}
