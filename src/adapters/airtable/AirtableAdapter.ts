// src/adapters/airtable/AirtableAdapter.ts

import { BaseAdapter } from '../BaseAdapter';
import type { FetchParams } from '../types';
import type { IntegrationItem, ProviderId } from '../../core/normalizer/types';
import type { TokenRecord } from '../../core/token/types';
import type { OAuthEndpoints } from '../../core/auth/OAuthClient';
import { RetryBudget } from '../../core/http/RetryHandler';
import {
  AirtableBasesPageSchema,
  AirtableTablesResponseSchema,
  type AirtableBase,
  type AirtableRecord,
} from './types';

const META_URL = 'https://api.airtable.com/v0/meta/bases';

export class AirtableAdapter extends BaseAdapter<AirtableRecord> {
  readonly providerId: ProviderId = 'airtable';

  protected readonly endpoints: OAuthEndpoints = {
    authorizationEndpoint: 'https://airtable.com/oauth2/v1/authorize',
    tokenEndpoint: 'https://airtable.com/oauth2/v1/token',
    tokenEndpointAuthMethod: 'client_secret_basic',
  };

  protected readonly defaultTokenLifetimeSeconds = 3600;

  // Airtable rejects authorization requests without a PKCE challenge
  protected readonly pkceByDefault = true;

  async fetchItems(record: TokenRecord, params?: FetchParams): Promise<AirtableRecord[]> {
    const limit = this.fetchLimit(params);
    const retryBudget = new RetryBudget();
    const bases = await this.listBases(record, limit, retryBudget);
    const records: AirtableRecord[] = [];

    for (const base of bases) {
      if (records.length >= limit) break;
      records.push({ kind: 'base', base });

      const response = await this.deps.http.get(`${META_URL}/${encodeURIComponent(base.id)}/tables`, {
        provider: this.providerId,
        headers: this.bearer(record),
        retryBudget,
      });
      const { tables } = AirtableTablesResponseSchema.parse(response.data);
      for (const table of tables) {
        records.push({ kind: 'table', base, table });
      }
    }

    this.deps.logger.info('Retrieved Airtable bases and tables', {
      provider: this.providerId,
      ownerContext: record.ownerContext,
      bases: bases.length,
      count: records.length,
    });
    return records.slice(0, limit);
  }

  normalize(raw: AirtableRecord): IntegrationItem {
    if (raw.kind === 'base') {
      const metadata: Record<string, string> = {};
      if (raw.base.permissionLevel) metadata.permission_level = raw.base.permissionLevel;

      return { id: raw.base.id, name: raw.base.name, type: 'base', metadata };
    }

    const { base, table } = raw;
    const metadata: Record<string, string> = {
      base_id: base.id,
      base_name: base.name,
    };
    if (table.primaryFieldId) metadata.primary_field_id = table.primaryFieldId;
    if (table.description) metadata.description = table.description;
    if (table.fields) metadata.field_count = String(table.fields.length);

    return { id: table.id, name: table.name, type: 'table', metadata };
  }

  private async listBases(
    record: TokenRecord,
    limit: number,
    retryBudget: RetryBudget
  ): Promise<AirtableBase[]> {
    const bases: AirtableBase[] = [];
    let offset: string | undefined;

    do {
      const response = await this.deps.http.get(META_URL, {
        provider: this.providerId,
        headers: this.bearer(record),
        query: offset ? { offset } : undefined,
        retryBudget,
      });

      const page = AirtableBasesPageSchema.parse(response.data);
      bases.push(...page.bases);
      offset = page.offset;
    } while (offset && bases.length < limit);

    return bases;
  }
}
