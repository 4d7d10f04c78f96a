import type { PortEntry, SessionRow, TunnelStatus } from '@portshift/core';
import { stripAnsi, visibleLength } from '../ui.js';
import { describePort, render, scrollStart } from './render.js';
import { INITIAL_VIEW } from './view-model.js';

function row(
  serviceName: string,
  remotePort: number,
  label: string,
  status: TunnelStatus = 'idle',
  extra: Partial<Pick<SessionRow, 'localPort' | 'lastError' | 'requested'>> = {},
): SessionRow {
  const entry: PortEntry = { serviceName, remotePort, protocol: 'TCP', label };
  return {
    ref: `${serviceName}/${remotePort}/TCP`,
    entry,
    status,
    requested: status === 'connecting' || status === 'active',
    localPort: null,
    generation: 0,
    startedAt: null,
    lastError: null,
    target: null,
    ...extra,
  };
}

const rows = [
  row('api', 8080, 'http', 'active', { localPort: 8080 }),
  row('api', 9090, '9090'),
  row('web', 80, 'http', 'failed', { lastError: 'boom' }),
];

function plain(lines: string[]): string[] {
  return lines.map(stripAnsi);
}

describe('render', () => {
  it('fills the terminal exactly', () => {
    const lines = render({ rows, view: INITIAL_VIEW, namespace: 'dev', width: 40, height: 6 });
    expect(lines).toHaveLength(6);
    for (const line of lines) {
      expect(visibleLength(line)).toBe(40);
    }
  });

  it('draws services on the left and the selected service ports on the right', () => {
    const lines = plain(render({ rows, view: INITIAL_VIEW, namespace: 'dev', width: 40, height: 6 }));
    expect(lines.slice(0, 5)).toEqual([
      `╭─ Services ${'─'.repeat(11)}╮╭─ Ports · api ╮`,
      `│❯ api${' '.repeat(14)}1/2││  ● http 8080…│`,
      `│  web${' '.repeat(14)}0/1││  ○ 9090/TCP  │`,
      `│${' '.repeat(22)}││${' '.repeat(14)}│`,
      `╰${'─'.repeat(22)}╯╰${'─'.repeat(14)}╯`,
    ]);
  });

  it('marks the selected port when the port pane has focus', () => {
    const lines = plain(
      render({ rows, view: { focus: 'ports', serviceIndex: 0, portIndex: 1 }, namespace: 'dev', width: 40, height: 6 }),
    );
    expect(lines[1]).toBe(`│❯ api${' '.repeat(14)}1/2││  ● http 8080…│`);
    expect(lines[2]).toBe(`│  web${' '.repeat(14)}0/1││❯ ○ 9090/TCP  │`);
  });

  it('highlights the focused selection in inverse video', () => {
    const focusedService = render({ rows, view: INITIAL_VIEW, namespace: 'dev', width: 40, height: 6 });
    expect(focusedService[1]).toContain('\x1b[7m❯ ');

    const focusedPort = render({
      rows,
      view: { focus: 'ports', serviceIndex: 0, portIndex: 0 },
      namespace: 'dev',
      width: 40,
      height: 6,
    });
    expect(focusedPort[1]).toContain('❯ \x1b[1m\x1b[4mapi');
    expect(focusedPort[1]).toContain('\x1b[7m❯ \x1b[0m');
  });

  it('underlines services with a requested tunnel', () => {
    const lines = render({
      rows,
      view: { focus: 'services', serviceIndex: 1, portIndex: 0 },
      namespace: 'dev',
      width: 40,
      height: 6,
    });
    expect(lines[1]).toContain('\x1b[4mapi');
    expect(lines[2]).not.toContain('\x1b[4m');
  });

  it('shows the last error of a failed port', () => {
    const lines = plain(
      render({ rows, view: { focus: 'services', serviceIndex: 1, portIndex: 0 }, namespace: 'dev', width: 80, height: 6 }),
    );
    expect(lines[0]?.endsWith(`╭─ Ports · web ${'─'.repeat(16)}╮`)).toBe(true);
    expect(lines[1]?.endsWith(`│  ✗ http 80/TCP boom${' '.repeat(10)}│`)).toBe(true);
  });

  it('puts key help and the namespace in the footer', () => {
    const lines = plain(render({ rows, view: INITIAL_VIEW, namespace: 'dev', width: 60, height: 6 }));
    expect(lines[5]).toBe(`↑↓ move  ←→ pane  ⏎ toggle  q quit${' '.repeat(12)}namespace: dev`);
  });

  it('scrolls to keep the selected service visible', () => {
    const many = ['a', 'b', 'c', 'd', 'e', 'f'].map((name) => row(name, 80, 'http'));
    const lines = plain(
      render({ rows: many, view: { focus: 'services', serviceIndex: 4, portIndex: 0 }, namespace: 'dev', width: 40, height: 6 }),
    );
    expect(lines.slice(1, 4).map((line) => line.slice(0, 6))).toEqual(['│  c  ', '│  d  ', '│❯ e  ']);
  });

  it('explains an empty namespace', () => {
    const lines = plain(render({ rows: [], view: INITIAL_VIEW, namespace: 'dev', width: 60, height: 6 }));
    expect(lines[0]?.endsWith(`╭─ Ports ${'─'.repeat(14)}╮`)).toBe(true);
    expect(lines[1]?.startsWith('│No services in namespace dev ')).toBe(true);
  });

  it('asks for a larger terminal below the minimum size', () => {
    expect(render({ rows, view: INITIAL_VIEW, namespace: 'dev', width: 30, height: 20 })).toEqual([
      'Terminal too small (need 40x6)',
    ]);
  });
});

describe('describePort', () => {
  it('omits a label that only repeats the port number', () => {
    expect(describePort(row('api', 9090, '9090'))).toBe('9090/TCP');
  });

  it('shows the local address while active', () => {
    expect(describePort(row('api', 8080, 'http', 'active', { localPort: 18080 }))).toBe(
      'http 8080/TCP → localhost:18080',
    );
  });

  it('shows nothing extra while connecting', () => {
    expect(describePort(row('api', 8080, 'http', 'connecting'))).toBe('http 8080/TCP');
  });
});

describe('scrollStart', () => {
  it('starts at the top while the selection fits', () => {
    expect(scrollStart(2, 10, 3)).toBe(0);
  });

  it('keeps the selection on the last visible row', () => {
    expect(scrollStart(5, 10, 3)).toBe(3);
  });

  it('never scrolls past the end', () => {
    expect(scrollStart(9, 10, 3)).toBe(7);
  });

  it('does not scroll a short list', () => {
    expect(scrollStart(1, 2, 3)).toBe(0);
  });
});
