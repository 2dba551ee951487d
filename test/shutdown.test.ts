import { describe, it, expect, vi } from 'vitest';
import { setupGracefulShutdown } from '../src/shutdown';
import { silentLogger } from './helpers/fixtures';

function addedListeners(signal: NodeJS.Signals, before: Function[]): Function[] {
  return process.listeners(signal).filter((listener) => !before.includes(listener));
}

describe('setupGracefulShutdown', () => {
  it('aborts on the first signal and exits on the second', () => {
    const before = process.listeners('SIGINT');
    const controller = new AbortController();
    const exit = vi.fn();

    const dispose = setupGracefulShutdown(controller, silentLogger(), exit);
    const [handler] = addedListeners('SIGINT', before);

    try {
      handler('SIGINT');
      expect(controller.signal.aborted).toBe(true);
      expect(exit).not.toHaveBeenCalled();

      handler('SIGINT');
      expect(exit).toHaveBeenCalledWith(130);
    } finally {
      dispose();
    }
  });

  it('handles SIGTERM the same way', () => {
    const before = process.listeners('SIGTERM');
    const controller = new AbortController();

    const dispose = setupGracefulShutdown(controller, silentLogger(), vi.fn());
    try {
      addedListeners('SIGTERM', before)[0]('SIGTERM');
      expect(controller.signal.aborted).toBe(true);
    } finally {
      dispose();
    }
  });

  it('removes its handlers when disposed', () => {
    const beforeInt = process.listeners('SIGINT');
    const beforeTerm = process.listeners('SIGTERM');

    const dispose = setupGracefulShutdown(new AbortController(), silentLogger(), vi.fn());
    expect(addedListeners('SIGINT', beforeInt)).toHaveLength(1);
    expect(addedListeners('SIGTERM', beforeTerm)).toHaveLength(1);

    dispose();
    expect(addedListeners('SIGINT', beforeInt)).toHaveLength(0);
    expect(addedListeners('SIGTERM', beforeTerm)).toHaveLength(0);
  });
});
