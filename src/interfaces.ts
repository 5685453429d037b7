/**
 * Interface index → name lookup, used to enrich events with the ingress device.
 * Only available where the platform exposes interface indices (Linux sysfs); elsewhere
 * the capability is absent and events simply omit the field.
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { INTERFACE_RESCAN_INTERVAL_MS } from './constants.js';
import { errorMessage } from './errors.js';
import { logDebug } from './logger.js';

export interface InterfaceNameResolver {
  nameOf(index: number): string | undefined;
}

export const SYSFS_NET_ROOT = '/sys/class/net';

function scan(root: string): Map<number, string> {
  const byIndex = new Map<number, string>();
  let names: string[];
  try {
    names = readdirSync(root);
  } catch (err) {
    logDebug('Cannot list network interfaces', { root, error: errorMessage(err) });
    return byIndex;
  }
  for (const name of names) {
    const indexFile = path.join(root, name, 'ifindex');
    try {
      const index = parseInt(readFileSync(indexFile, 'utf8').trim(), 10);
      if (!Number.isNaN(index)) byIndex.set(index, name);
    } catch (err) {
      logDebug('Skipping interface without readable ifindex', { name, error: errorMessage(err) });
    }
  }
  return byIndex;
}

export interface SysfsResolverOptions {
  /** Minimum time between rescans caused by unknown indices. */
  rescanIntervalMs?: number;
  now?: () => number;
}

/**
 * Resolver backed by `<root>/<name>/ifindex`. Returns null when the directory does not exist.
 * An unknown index triggers a rescan, so interfaces created after startup resolve too;
 * rescans happen at most once per rescanIntervalMs, and misses in between cost a map lookup.
 */
export function createSysfsInterfaceResolver(
  root: string = SYSFS_NET_ROOT,
  options: SysfsResolverOptions = {}
): InterfaceNameResolver | null {
  if (!existsSync(root)) return null;
  const rescanIntervalMs = options.rescanIntervalMs ?? INTERFACE_RESCAN_INTERVAL_MS;
  const now = options.now ?? Date.now;
  let byIndex = scan(root);
  let scannedAt = now();
  return {
    nameOf(index: number): string | undefined {
      const known = byIndex.get(index);
      if (known !== undefined) return known;
      const t = now();
      if (t - scannedAt < rescanIntervalMs) return undefined;
      byIndex = scan(root);
      scannedAt = t;
      return byIndex.get(index);
    },
  };
}

/** The platform's resolver, or null when the platform has none. */
export function detectInterfaceResolver(): InterfaceNameResolver | null {
  return process.platform === 'linux' ? createSysfsInterfaceResolver() : null;
}
