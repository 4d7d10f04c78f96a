/**
 * Tests for the shared CLI styling module.
 *
 * Tests pure rendering functions: box(), sectionHeader(), kvRow(),
 * separator(), visibleLength(), truncate(), padVisible(), statusGlyph(),
 * statusBadge().
 */

import { describe, it, expect } from 'vitest';
import {
  box,
  sectionHeader,
  kvRow,
  separator,
  stripAnsi,
  visibleLength,
  truncate,
  padVisible,
  statusGlyph,
  statusBadge,
  TEAL_DIM,
  RESET,
  BOLD,
  DIM,
  GREEN,
  YELLOW,
  RED,
  BOX,
  CHECK,
  CROSS,
} from './ui.js';

// ---------------------------------------------------------------------------
// Width helpers
// ---------------------------------------------------------------------------

describe('visibleLength', () => {
  it('counts plain characters', () => {
    expect(visibleLength('hello')).toBe(5);
  });

  it('ignores escape sequences', () => {
    expect(visibleLength(`${GREEN}${BOLD}ok${RESET}`)).toBe(2);
  });

  it('counts box-drawing and glyph characters once', () => {
    expect(visibleLength('╭─●✗…')).toBe(5);
  });
});

describe('stripAnsi', () => {
  it('removes color codes', () => {
    expect(stripAnsi(`${RED}failed${RESET} now`)).toBe('failed now');
  });
});

describe('truncate', () => {
  it('returns short text unchanged', () => {
    expect(truncate('api', 5)).toBe('api');
  });

  it('cuts long text and ends with an ellipsis', () => {
    expect(truncate('payments-gateway', 8)).toBe('payment…');
  });

  it('returns an empty string for a non-positive width', () => {
    expect(truncate('api', 0)).toBe('');
  });
});

describe('padVisible', () => {
  it('pads by visible width', () => {
    expect(padVisible(`${GREEN}ab${RESET}`, 4)).toBe(`${GREEN}ab${RESET}  `);
  });

  it('leaves longer text alone', () => {
    expect(padVisible('abcdef', 3)).toBe('abcdef');
  });
});

// ---------------------------------------------------------------------------
// box
// ---------------------------------------------------------------------------

describe('box', () => {
  it('draws every row at the requested width', () => {
    const rows = box('Services', ['api', 'worker'], 20).split('\n');
    expect(rows).toHaveLength(4);
    for (const row of rows) {
      expect(visibleLength(row)).toBe(20);
    }
  });

  it('puts the title in the top border', () => {
    const top = stripAnsi(box('Ports', [], 14).split('\n')[0]!);
    expect(top).toBe('╭─ Ports ────╮');
  });

  it('draws a plain top border without a title', () => {
    const top = stripAnsi(box('', [], 6).split('\n')[0]!);
    expect(top).toBe('╭────╮');
  });

  it('pads the body to an exact height', () => {
    const rows = box('x', ['one'], 10, 5).split('\n');
    expect(rows).toHaveLength(5);
    expect(stripAnsi(rows[2]!)).toBe(`${BOX.vertical}        ${BOX.vertical}`);
  });

  it('cuts the body to an exact height', () => {
    const rows = box('x', ['1', '2', '3', '4'], 10, 4).split('\n');
    expect(rows.map(stripAnsi)).toEqual([
      '╭─ x ────╮',
      '│1       │',
      '│2       │',
      '╰────────╯',
    ]);
  });

  it('colors the border', () => {
    expect(box('', [], 4).startsWith(TEAL_DIM)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

describe('sectionHeader', () => {
  it('fills the rest of the width with a rule', () => {
    const header = sectionHeader('Services', 20);
    expect(stripAnsi(header)).toBe(`Services ${'─'.repeat(11)}`);
    expect(visibleLength(header)).toBe(20);
  });
});

describe('kvRow', () => {
  it('pads the label to a fixed width', () => {
    expect(stripAnsi(kvRow('namespace', 'default'))).toBe('  namespace     default');
  });

  it('takes a custom label width', () => {
    expect(stripAnsi(kvRow('ns', 'dev', 4))).toBe('  ns  dev');
  });
});

describe('separator', () => {
  it('draws a horizontal rule', () => {
    expect(stripAnsi(separator(5))).toBe('─────');
  });
});

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

describe('statusGlyph', () => {
  it('maps each status to a colored glyph', () => {
    expect(statusGlyph('idle')).toBe(`${DIM}○${RESET}`);
    expect(statusGlyph('connecting')).toBe(`${YELLOW}◌${RESET}`);
    expect(statusGlyph('active')).toBe(`${GREEN}●${RESET}`);
    expect(statusGlyph('stopped')).toBe(`${DIM}■${RESET}`);
    expect(statusGlyph('failed')).toBe(`${RED}✗${RESET}`);
  });
});

describe('statusBadge', () => {
  it('shows the status name in bold', () => {
    expect(statusBadge('active')).toBe(`${GREEN}${BOLD}ACTIVE${RESET}`);
    expect(stripAnsi(statusBadge('connecting'))).toBe('CONNECTING');
  });
});

describe('marks', () => {
  it('colors check and cross', () => {
    expect(CHECK).toBe(`${GREEN}✓${RESET}`);
    expect(CROSS).toBe(`${RED}✗${RESET}`);
  });
});
