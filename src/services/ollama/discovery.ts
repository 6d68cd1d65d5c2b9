/**
 * Endpoint Discovery
 *
 * Probes every port in [basePort, maxPort] on the configured host in
 * parallel. Each port that accepts a TCP connection within the probe
 * timeout becomes one endpoint; when none do, the configured fallback
 * URL is the only endpoint.
 *
 * @module services/ollama/discovery
 */

import * as net from 'net';
import type { EndpointDescriptor } from '../../models/endpoint.js';
import type { OllamaConfig } from '../../config/schema.js';

export type PortProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

/**
 * Resolves true if the port accepts a connection before the timeout.
 */
export const probeTcpPort: PortProbe = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = new net.Socket();
    const finish = (open: boolean) => {
      socket.destroy();
      resolve(open);
    };
    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect(port, host);
  });

export function generateUrl(host: string, port: number): string {
  return `http://${host}:${port}/api/generate`;
}

/**
 * Live endpoints in port order. Never empty.
 */
export async function discoverEndpoints(
  config: Pick<OllamaConfig, 'discovery' | 'model' | 'fallbackApiUrl' | 'autoDetect'>,
  probe: PortProbe = probeTcpPort
): Promise<EndpointDescriptor[]> {
  const fallback: EndpointDescriptor[] = [
    { address: config.fallbackApiUrl, modelName: config.model },
  ];
  if (!config.autoDetect) {
    console.error(`[Discovery] Auto-detection disabled; using ${config.fallbackApiUrl}`);
    return fallback;
  }

  const { host, basePort, maxPort, probeTimeoutMs } = config.discovery;
  const ports = Array.from({ length: maxPort - basePort + 1 }, (_, i) => basePort + i);
  const results = await Promise.all(
    ports.map((port) => probe(host, port, probeTimeoutMs).catch(() => false))
  );

  const endpoints = ports
    .filter((_, i) => results[i])
    .map((port): EndpointDescriptor => ({ address: generateUrl(host, port), modelName: config.model }));

  if (endpoints.length === 0) {
    console.error(`[Discovery] No Ollama instances on ${host}:${basePort}-${maxPort}; using ${config.fallbackApiUrl}`);
    return fallback;
  }

  console.error(`[Discovery] Found ${endpoints.length} Ollama instance(s): ${endpoints.map((e) => e.address).join(', ')}`);
  return endpoints;
}
