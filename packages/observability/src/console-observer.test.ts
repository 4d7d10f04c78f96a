import { vi } from 'vitest';
import { ConsoleObserver } from './console-observer.js';
import type { DiscoveryEvent, TunnelTransitionEvent, RaceDiscardEvent } from '@portshift/core';

function makeDiscovery(): DiscoveryEvent {
  return { provider: 'kubernetes', namespace: 'shop', services: 2, ports: 3, duration: 42 };
}

function makeTransition(overrides: Partial<TunnelTransitionEvent> = {}): TunnelTransitionEvent {
  return {
    ref: 'api/8080/TCP',
    generation: 1,
    from: 'connecting',
    to: 'active',
    localPort: 8080,
    timestamp: new Date(),
    ...overrides,
  };
}

function makeDiscard(): RaceDiscardEvent {
  return {
    ref: 'api/8080/TCP',
    generation: 1,
    currentGeneration: 2,
    outcome: 'active',
    timestamp: new Date(),
  };
}

describe('ConsoleObserver', () => {
  let consoleSpy: {
    log: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('log level filtering', () => {
    it('logs discovery at "info" level', () => {
      new ConsoleObserver('info').onDiscovery(makeDiscovery());
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    });

    it('suppresses discovery at "warn" level', () => {
      new ConsoleObserver('warn').onDiscovery(makeDiscovery());
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('suppresses connecting transitions below "debug"', () => {
      new ConsoleObserver('info').onTunnelTransition(makeTransition({ from: 'idle', to: 'connecting' }));
      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it('logs connecting transitions at "debug"', () => {
      new ConsoleObserver('debug').onTunnelTransition(makeTransition({ from: 'idle', to: 'connecting' }));
      expect(consoleSpy.log).toHaveBeenCalledTimes(1);
    });
  });

  describe('onDiscovery', () => {
    it('includes namespace, provider and counts', () => {
      new ConsoleObserver('info').onDiscovery(makeDiscovery());
      const output = String(consoleSpy.log.mock.calls[0]![0]);
      expect(output).toContain('shop');
      expect(output).toContain('kubernetes');
      expect(output).toContain('services=\x1b[0m2');
      expect(output).toContain('ports=\x1b[0m3');
      expect(output).toContain('42ms');
    });
  });

  describe('onTunnelTransition', () => {
    it('logs the ref, generation and local port', () => {
      new ConsoleObserver('info').onTunnelTransition(makeTransition());
      const output = String(consoleSpy.log.mock.calls[0]![0]);
      expect(output).toContain('api/8080/TCP');
      expect(output).toContain('gen=\x1b[0m1');
      expect(output).toContain('local=\x1b[0m8080');
    });

    it('sends failures to stderr with the error message', () => {
      new ConsoleObserver('info').onTunnelTransition(
        makeTransition({ to: 'failed', error: new Error('pod gone') }),
      );
      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(String(consoleSpy.error.mock.calls[0]![0])).toContain('error=\x1b[0mpod gone');
    });

    it('omits the local port when unknown', () => {
      new ConsoleObserver('info').onTunnelTransition(makeTransition({ to: 'stopped', localPort: null }));
      expect(String(consoleSpy.log.mock.calls[0]![0])).not.toContain('local=');
    });
  });

  describe('onRaceDiscard', () => {
    it('is only logged at debug level', () => {
      new ConsoleObserver('info').onRaceDiscard(makeDiscard());
      expect(consoleSpy.log).not.toHaveBeenCalled();

      new ConsoleObserver('debug').onRaceDiscard(makeDiscard());
      const output = String(consoleSpy.log.mock.calls[0]![0]);
      expect(output).toContain('current=\x1b[0m2');
    });
  });

  describe('onError', () => {
    it('logs error name, message and context', () => {
      new ConsoleObserver('info').onError(new TypeError('bad'), { ref: 'x' });
      const output = String(consoleSpy.error.mock.calls[0]![0]);
      expect(output).toContain('TypeError');
      expect(output).toContain('bad');
      expect(output).toContain('{"ref":"x"}');
    });

    it('omits ctx when context is empty', () => {
      new ConsoleObserver('info').onError(new Error('bad'), {});
      expect(String(consoleSpy.error.mock.calls[0]![0])).not.toContain('ctx=');
    });
  });

  it('flush resolves', async () => {
    await expect(new ConsoleObserver().flush()).resolves.toBeUndefined();
  });
});
