import { describe, expect, test } from 'vitest';
import { serviceEndpoint, serviceHealthURL, servicePort } from './endpoints';
import { parseConfig } from './load-config';

describe('service endpoints', () => {
  test('use the binding port by default', () => {
    const { service } = parseConfig({
      service: {
        binding: { kind: 'port', port: 8001 },
        runtime: { type: 'process', command: ['uvicorn', 'main:app'] },
      },
    });

    expect(servicePort(service)).toBe(8001);
    expect(serviceEndpoint(service)).toBe('http://localhost:8001');
    expect(serviceHealthURL(service)).toBe('http://localhost:8001/health');
  });

  test('use the explicit host, port and health path', () => {
    const { service } = parseConfig({
      service: {
        binding: { kind: 'container', name: 'stock-api' },
        host: '127.0.0.1',
        port: 8080,
        healthPath: '/',
        runtime: { type: 'container', image: 'stock-api:latest' },
      },
    });

    expect(serviceHealthURL(service)).toBe('http://127.0.0.1:8080/');
  });
});
