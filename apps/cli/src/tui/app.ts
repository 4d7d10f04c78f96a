/**
 * Interactive terminal loop.
 *
 * Owns the terminal while running: alternate screen, hidden cursor, raw
 * keypresses. The table comes only from the session manager's subscription;
 * keys either move the local selection or become toggle commands.
 */

import { emitKeypressEvents, type Key } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { SessionRow } from '@portshift/core';
import type { SessionManager } from '@portshift/sessions';
import { render } from './render.js';
import {
  INITIAL_VIEW,
  applyDelta,
  clampView,
  groupByService,
  navigate,
  selectedAction,
  type NavigationKey,
  type ViewState,
} from './view-model.js';

export const ENTER_ALT_SCREEN = '\x1b[?1049h';
export const LEAVE_ALT_SCREEN = '\x1b[?1049l';
export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';
const CLEAR_SCREEN = '\x1b[H\x1b[2J';

export type TuiSession = Pick<SessionManager, 'snapshot' | 'subscribe' | 'toggle' | 'toggleAllForService'>;

/** stdin, or any readable that may act like a TTY. */
export type TuiInput = Readable & { isTTY?: boolean; setRawMode?(mode: boolean): unknown };
/** stdout, or any writable that reports a size. */
export type TuiOutput = Writable & { columns?: number; rows?: number };

export interface TuiOptions {
  session: TuiSession;
  namespace: string;
  input: TuiInput;
  output: TuiOutput;
}

const ARROWS: Record<string, NavigationKey> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
};

/** Run until the user quits. Resolves after the terminal is restored. */
export async function runTui(options: TuiOptions): Promise<void> {
  const { session, namespace, input, output } = options;
  const controller = new AbortController();

  let rows: readonly SessionRow[] = session.snapshot().rows;
  let view: ViewState = INITIAL_VIEW;

  const draw = (): void => {
    const lines = render({
      rows,
      view,
      namespace,
      width: output.columns ?? 80,
      height: output.rows ?? 24,
    });
    output.write(CLEAR_SCREEN + lines.join('\r\n'));
  };

  const onKeypress = (_text: string | undefined, key: Key | undefined): void => {
    if (!key) return;
    if ((key.ctrl && key.name === 'c') || key.name === 'q') {
      controller.abort();
      return;
    }

    const groups = groupByService(rows);
    const arrow = key.name ? ARROWS[key.name] : undefined;
    if (arrow) {
      view = navigate(view, groups, arrow);
      draw();
      return;
    }

    if (key.name === 'return' || key.name === 'enter') {
      const action = selectedAction(view, groups);
      if (action?.type === 'toggle') session.toggle(action.ref);
      if (action?.type === 'toggle_service') session.toggleAllForService(action.serviceName);
    }
  };

  emitKeypressEvents(input);
  const raw = input.isTTY === true && typeof input.setRawMode === 'function';
  if (raw) input.setRawMode?.(true);
  input.on('keypress', onKeypress);
  output.on('resize', draw);
  input.resume();
  output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);

  try {
    draw();
    for await (const event of session.subscribe({ signal: controller.signal })) {
      rows = event.type === 'snapshot' ? event.rows : applyDelta(rows, event.changes);
      view = clampView(view, groupByService(rows));
      draw();
    }
  } finally {
    input.off('keypress', onKeypress);
    output.off('resize', draw);
    if (raw) input.setRawMode?.(false);
    input.pause();
    output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }
}
