/**
 * Selection state for the two-pane view and the pure functions that move it.
 *
 * The view never owns session data: it holds indices into the grouping of
 * the latest rows and is clamped whenever the rows change.
 */

import type { PortEntryRef, SessionRow } from '@portshift/core';

export interface ServiceGroup {
  readonly name: string;
  readonly rows: readonly SessionRow[];
}

export type Focus = 'services' | 'ports';

export interface ViewState {
  readonly focus: Focus;
  readonly serviceIndex: number;
  readonly portIndex: number;
}

export type NavigationKey = 'up' | 'down' | 'left' | 'right';

export type SelectedAction =
  | { type: 'toggle'; ref: PortEntryRef }
  | { type: 'toggle_service'; serviceName: string };

export const INITIAL_VIEW: ViewState = { focus: 'services', serviceIndex: 0, portIndex: 0 };

/** Group rows by service, keeping the row order (rows arrive sorted). */
export function groupByService(rows: readonly SessionRow[]): ServiceGroup[] {
  const groups: { name: string; rows: SessionRow[] }[] = [];
  for (const row of rows) {
    const last = groups[groups.length - 1];
    if (last && last.name === row.entry.serviceName) {
      last.rows.push(row);
    } else {
      groups.push({ name: row.entry.serviceName, rows: [row] });
    }
  }
  return groups;
}

/** Replace changed rows by ref. Rows not in the table are ignored. */
export function applyDelta(rows: readonly SessionRow[], changes: readonly SessionRow[]): SessionRow[] {
  if (changes.length === 0) return [...rows];
  const byRef = new Map(changes.map((row) => [row.ref, row]));
  return rows.map((row) => byRef.get(row.ref) ?? row);
}

function wrap(index: number, length: number): number {
  if (length === 0) return 0;
  return ((index % length) + length) % length;
}

/** Keep indices inside the current groups. */
export function clampView(view: ViewState, groups: readonly ServiceGroup[]): ViewState {
  if (groups.length === 0) return INITIAL_VIEW;
  const serviceIndex = Math.min(Math.max(0, view.serviceIndex), groups.length - 1);
  const ports = groups[serviceIndex]?.rows.length ?? 0;
  const portIndex = ports === 0 ? 0 : Math.min(Math.max(0, view.portIndex), ports - 1);
  const focus = view.focus === 'ports' && ports === 0 ? 'services' : view.focus;
  return { focus, serviceIndex, portIndex };
}

/**
 * Move the selection. Up and down wrap inside the focused list; right
 * enters the port list of the selected service; left returns to services.
 */
export function navigate(view: ViewState, groups: readonly ServiceGroup[], key: NavigationKey): ViewState {
  const current = clampView(view, groups);
  if (groups.length === 0) return current;

  const ports = groups[current.serviceIndex]?.rows.length ?? 0;

  switch (key) {
    case 'up':
    case 'down': {
      const step = key === 'up' ? -1 : 1;
      if (current.focus === 'services') {
        return { ...current, serviceIndex: wrap(current.serviceIndex + step, groups.length), portIndex: 0 };
      }
      return { ...current, portIndex: wrap(current.portIndex + step, ports) };
    }
    case 'right':
      return ports > 0 ? { ...current, focus: 'ports' } : current;
    case 'left':
      return { ...current, focus: 'services' };
  }
}

/** What Enter does for the current selection. */
export function selectedAction(view: ViewState, groups: readonly ServiceGroup[]): SelectedAction | null {
  const current = clampView(view, groups);
  const group = groups[current.serviceIndex];
  if (!group) return null;

  if (current.focus === 'ports') {
    const row = group.rows[current.portIndex];
    return row ? { type: 'toggle', ref: row.ref } : null;
  }
  return { type: 'toggle_service', serviceName: group.name };
}
