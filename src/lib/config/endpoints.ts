import type { ServiceConfig } from './schema';

/**
 * Port the service answers HTTP on: the explicit `port`, else the binding's
 */
export function servicePort(service: ServiceConfig): number {
  if (service.port !== undefined) {
    return service.port;
  }

  if (service.binding.kind === 'port') {
    return service.binding.port;
  }

  throw new TypeError(`Service ${service.name} has no port to reach it on`);
}

export function serviceEndpoint(service: ServiceConfig): string {
  return `http://${service.host}:${servicePort(service)}`;
}

export function serviceHealthURL(service: ServiceConfig): string {
  return `${serviceEndpoint(service)}${service.healthPath}`;
}
