/**
 * Network utility library
 * Provides endpoint address helpers
 */

import { EndpointInfo } from '../interfaces/transfer.interface';
import { ENGINE } from '../utils/constants';

/**
 * Check if a port is valid
 */
export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= ENGINE.MIN_PORT && port <= ENGINE.MAX_PORT;
}

/**
 * Parse a port from text, undefined when absent or out of range
 */
export function parsePort(value: string | undefined): number | undefined {
  if (!value || !/^\d{1,5}$/.test(value.trim())) {
    return undefined;
  }
  const port = parseInt(value.trim(), 10);
  return isValidPort(port) ? port : undefined;
}

/**
 * `address:port` as the engine expects it; missing parts are left empty
 */
export function formatEndpointAddress(endpoint: Pick<EndpointInfo, 'address' | 'port'>): string {
  return `${endpoint.address ?? ''}:${endpoint.port ?? ''}`;
}
