import { z } from 'zod';

import type { Zone } from '../../types/domain.js';
import type { DnsProvider, TxtRecordSet } from '../dns-provider.js';
import { isSuccess } from '../hosting.js';
import { ControlPlaneRequestError } from '../../errors/workflow-errors.js';
import { normalizeTxtFragments } from '../../dns/resolver.js';
import { ArmClient } from './arm-client.js';

export const DNS_API_VERSION = '2018-05-01';

const zoneSchema = z.object({
  id: z.string(),
  name: z.string(),
  properties: z
    .object({
      nameServers: z.array(z.string()).nullish(),
    })
    .default({}),
});

const txtRecordSetSchema = z.object({
  properties: z.object({
    TTL: z.number().int().nonnegative(),
    TXTRecords: z.array(z.object({ value: z.array(z.string()) })).default([]),
  }),
});

/**
 * DNS zones and TXT record sets over the resource manager REST API
 */
export class ArmDnsProvider implements DnsProvider {
  constructor(private readonly arm: ArmClient) {}

  private recordSetPath(zone: Zone, label: string): string {
    return `${zone.id}/TXT/${label}`;
  }

  async listZones(): Promise<Zone[]> {
    const zones = await this.arm.list(
      `${this.arm.subscriptionPath}/providers/Microsoft.Network/dnszones`,
      DNS_API_VERSION,
      zoneSchema,
    );

    return zones.map((zone) => ({
      id: zone.id,
      name: zone.name,
      nameServers: zone.properties.nameServers ?? [],
    }));
  }

  async getTxtRecordSet(zone: Zone, label: string): Promise<TxtRecordSet | undefined> {
    const resource = await this.arm.get(this.recordSetPath(zone, label), DNS_API_VERSION, txtRecordSetSchema);
    if (!resource) return undefined;

    return {
      ttl: resource.properties.TTL,
      values: resource.properties.TXTRecords.map((record) => normalizeTxtFragments(record.value)),
    };
  }

  async upsertTxtRecordSet(zone: Zone, label: string, recordSet: TxtRecordSet): Promise<void> {
    const result = await this.arm.put(this.recordSetPath(zone, label), DNS_API_VERSION, {
      properties: {
        TTL: recordSet.ttl,
        TXTRecords: recordSet.values.map((value) => ({ value: [value] })),
      },
    });

    if (!isSuccess(result)) {
      throw new ControlPlaneRequestError('PUT', result.target, result.statusCode, result.detail);
    }
  }

  async deleteTxtRecordSet(zone: Zone, label: string): Promise<void> {
    const result = await this.arm.delete(this.recordSetPath(zone, label), DNS_API_VERSION);
    if (!isSuccess(result) && result.statusCode !== 404) {
      throw new ControlPlaneRequestError('DELETE', result.target, result.statusCode, result.detail);
    }
  }
}
