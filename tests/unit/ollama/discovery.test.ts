/**
 * Tests for endpoint discovery
 *
 * @module tests/unit/ollama/discovery
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { discoverEndpoints, type PortProbe } from '../../../src/services/ollama/discovery.js';
import { defaultAppConfig } from '../../../src/config/schema.js';
import type { OllamaConfig } from '../../../src/config/schema.js';

function ollamaConfig(overrides: Partial<OllamaConfig> = {}): OllamaConfig {
  const base = defaultAppConfig().ollama;
  return {
    ...base,
    model: 'test-model',
    fallbackApiUrl: 'http://gpu-box:11434/api/generate',
    discovery: { host: '127.0.0.1', basePort: 11434, maxPort: 11437, probeTimeoutMs: 5 },
    ...overrides,
  };
}

describe('discoverEndpoints', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns one endpoint per open port, in port order', async () => {
    const open = new Set([11437, 11435]);
    const probe = vi.fn<PortProbe>(async (_host, port) => open.has(port));

    const endpoints = await discoverEndpoints(ollamaConfig(), probe);

    expect(endpoints).toEqual([
      { address: 'http://127.0.0.1:11435/api/generate', modelName: 'test-model' },
      { address: 'http://127.0.0.1:11437/api/generate', modelName: 'test-model' },
    ]);
    expect(probe).toHaveBeenCalledTimes(4);
    expect(probe).toHaveBeenCalledWith('127.0.0.1', 11434, 5);
  });

  it('probes all ports concurrently', async () => {
    let inFlight = 0;
    let peak = 0;
    const probe: PortProbe = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return false;
    };

    await discoverEndpoints(ollamaConfig(), probe);

    expect(peak).toBe(4);
  });

  it('falls back to the configured URL when nothing answers', async () => {
    const probe = vi.fn<PortProbe>(async () => false);
    expect(await discoverEndpoints(ollamaConfig(), probe)).toEqual([
      { address: 'http://gpu-box:11434/api/generate', modelName: 'test-model' },
    ]);
  });

  it('treats a failing probe as a closed port', async () => {
    const probe = vi.fn<PortProbe>(async (_host, port) => {
      if (port === 11434) throw new Error('EACCES');
      return port === 11436;
    });
    const endpoints = await discoverEndpoints(ollamaConfig(), probe);
    expect(endpoints.map((e) => e.address)).toEqual(['http://127.0.0.1:11436/api/generate']);
  });

  it('skips probing when auto-detection is off', async () => {
    const probe = vi.fn<PortProbe>(async () => true);
    const endpoints = await discoverEndpoints(ollamaConfig({ autoDetect: false }), probe);
    expect(probe).not.toHaveBeenCalled();
    expect(endpoints).toHaveLength(1);
  });
});
