/**
 * License Type Definitions
 *
 * Records as issued by the service and persisted by a license store.
 */

/**
 * Contact data captured by the validated issuance form
 */
export interface LicenseHolder {
  name: string;
  phone: string;
}

/**
 * A record built by the issuance service, before the store assigns an id.
 * Every field is set explicitly at construction; the store adds no defaults.
 */
export interface NewLicenseRecord {
  key: string;
  createdAt: Date;
  holder?: LicenseHolder;
}

/**
 * A durably issued license. Never mutated once stored.
 */
export interface LicenseRecord extends NewLicenseRecord {
  readonly id: number;
}

/**
 * Key format: `segments` groups of `segmentLength` characters drawn from
 * `alphabet`, joined by `separator`
 */
export interface KeyFormat {
  alphabet: string;
  segments: number;
  segmentLength: number;
  separator: string;
}

/**
 * Row shape of the `licenses` table
 */
export interface LicenseRow {
  id: number;
  license_key: string;
  holder_name: string | null;
  holder_phone: string | null;
  created_at: string;
}
