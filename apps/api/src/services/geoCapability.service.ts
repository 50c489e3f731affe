import type { GeoCapabilityState } from '@punchcard/shared';
import { logger } from '../utils/logger.js';

export const CHECK_IN_GEO_FIELDS = ['in_latitude', 'in_longitude'] as const;
export const CHECK_OUT_GEO_FIELDS = ['out_latitude', 'out_longitude'] as const;

/**
 * Whether the remote hr.attendance schema accepts latitude/longitude.
 * `unknown` counts as supported; `unsupported` is terminal.
 */
export class GeoCapability {
  constructor(private current: GeoCapabilityState = 'unknown') {}

  get state(): GeoCapabilityState {
    return this.current;
  }

  allowsGeo(): boolean {
    return this.current !== 'unsupported';
  }

  markSupported(): void {
    if (this.current === 'unknown') {
      this.current = 'supported';
    }
  }

  /** @returns true when this call performed the downgrade. */
  markUnsupported(): boolean {
    if (this.current === 'unsupported') return false;
    this.current = 'unsupported';
    return true;
  }
}

export class GeoCapabilityRegistry {
  private readonly byConnection = new Map<string, GeoCapability>();

  forConnection(key: string): GeoCapability {
    let capability = this.byConnection.get(key);
    if (!capability) {
      capability = new GeoCapability();
      this.byConnection.set(key, capability);
    }
    return capability;
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.byConnection.clear();
      return;
    }
    this.byConnection.delete(key);
    logger.info({ connection: key }, 'Geo capability reset');
  }
}

export const geoCapabilities = new GeoCapabilityRegistry();

/**
 * Matches Odoo's "Invalid field '<name>'" rejection for the given fields.
 * This is a plain substring check on server error text; if Odoo rewords the
 * message the downgrade stops triggering and geo writes fail as `remote`.
 */
export function isGeoFieldRejection(message: string, fields: readonly string[]): boolean {
  return fields.some((field) => message.includes(`Invalid field '${field}'`));
}
