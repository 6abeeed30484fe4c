import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import os from 'os';
import { HEALTH_MESSAGE, runBridgeUntilSignal } from '../../../src/api/bridge-server.js';
import { loadConfig } from '../../../src/utils/config.js';

describe('AI bridge lifecycle', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should serve until SIGTERM and then close', async () => {
    const log = vi.spyOn(console, 'log');
    const signals = new EventEmitter();
    const config = { ...loadConfig({ WORK_DIR: os.tmpdir() }), bridgePort: 0, bridgeHost: '127.0.0.1' };

    const serving = runBridgeUntilSignal(config, undefined, signals);

    const port = await vi.waitFor(() => {
      const line = log.mock.calls.map(call => String(call[0])).find(text => text.startsWith('AI bridge listening on'));
      const match = line?.match(/:(\d+)$/);
      if (!match) throw new Error('bridge not listening yet');
      return Number(match[1]);
    }, { timeout: 5000 });

    const response = await fetch(`http://127.0.0.1:${port}/health`);
    expect(await response.json()).toEqual({ status: 'ok', message: HEALTH_MESSAGE });

    signals.emit('SIGTERM');

    await expect(serving).resolves.toBeUndefined();
    expect(log).toHaveBeenCalledWith('\nReceived SIGTERM, stopping AI bridge...');
    expect(signals.listenerCount('SIGTERM')).toBe(0);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });
});
