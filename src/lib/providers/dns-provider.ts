import type { Zone } from '../types/domain.js';

export interface TxtRecordSet {
  /** Seconds */
  ttl: number;
  values: string[];
}

/**
 * Authoritative DNS hosting (zones and TXT record sets)
 */
export interface DnsProvider {
  listZones(): Promise<Zone[]>;
  /** `undefined` when the record set does not exist */
  getTxtRecordSet(zone: Zone, label: string): Promise<TxtRecordSet | undefined>;
  upsertTxtRecordSet(zone: Zone, label: string, recordSet: TxtRecordSet): Promise<void>;
  /** Deleting a missing record set is not an error */
  deleteTxtRecordSet(zone: Zone, label: string): Promise<void>;
}
