// src/adapters/hubspot/HubSpotAdapter.ts

import { BaseAdapter } from '../BaseAdapter';
import type { FetchParams } from '../types';
import type { IntegrationItem, ProviderId } from '../../core/normalizer/types';
import type { TokenRecord } from '../../core/token/types';
import type { OAuthEndpoints } from '../../core/auth/OAuthClient';
import { RetryBudget } from '../../core/http/RetryHandler';
import { HubSpotContactsPageSchema, type HubSpotContact } from './types';

const CONTACTS_URL = 'https://api.hubapi.com/crm/v3/objects/contacts';
const REFRESH_TOKENS_URL = 'https://api.hubapi.com/oauth/v1/refresh-tokens';
const MAX_PAGE_SIZE = 100;

// HubSpot contact property -> metadata key
const METADATA_PROPERTIES: Record<string, string> = {
  company: 'company',
  phone: 'phone',
  mobilephone: 'mobile_phone',
  website: 'website',
  address: 'address',
  city: 'city',
  state: 'state',
  country: 'country',
  jobtitle: 'job_title',
  industry: 'industry',
  lifecyclestage: 'lifecycle_stage',
  hs_lead_status: 'lead_status',
  createdate: 'created_at',
  lastmodifieddate: 'updated_at',
};

const REQUESTED_PROPERTIES = ['email', 'firstname', 'lastname', ...Object.keys(METADATA_PROPERTIES)];

export class HubSpotAdapter extends BaseAdapter<HubSpotContact> {
  readonly providerId: ProviderId = 'hubspot';

  protected readonly endpoints: OAuthEndpoints = {
    authorizationEndpoint: 'https://app.hubspot.com/oauth/authorize',
    tokenEndpoint: 'https://api.hubapi.com/oauth/v1/token',
    tokenEndpointAuthMethod: 'client_secret_post',
  };

  // HubSpot access tokens live for 30 minutes
  protected readonly defaultTokenLifetimeSeconds = 1800;

  async fetchItems(record: TokenRecord, params?: FetchParams): Promise<HubSpotContact[]> {
    const limit = this.fetchLimit(params);
    const contacts: HubSpotContact[] = [];
    const retryBudget = new RetryBudget();
    let after: string | undefined;

    do {
      const response = await this.deps.http.get(CONTACTS_URL, {
        provider: this.providerId,
        headers: this.bearer(record),
        retryBudget,
        query: {
          limit: Math.min(MAX_PAGE_SIZE, limit - contacts.length),
          properties: REQUESTED_PROPERTIES.join(','),
          archived: false,
          ...(after ? { after } : {}),
        },
      });

      const page = HubSpotContactsPageSchema.parse(response.data);
      contacts.push(...page.results);
      after = page.paging?.next?.after;
    } while (after && contacts.length < limit);

    this.deps.logger.info('Retrieved HubSpot contacts', {
      provider: this.providerId,
      ownerContext: record.ownerContext,
      count: contacts.length,
    });
    return contacts.slice(0, limit);
  }

  normalize(contact: HubSpotContact): IntegrationItem {
    const props = contact.properties;
    const id = String(contact.id);
    const email = props.email || undefined;
    const fullName = [props.firstname, props.lastname].filter(Boolean).join(' ').trim();

    const metadata: Record<string, string> = {};
    for (const [property, key] of Object.entries(METADATA_PROPERTIES)) {
      const value = props[property];
      if (value) metadata[key] = value;
    }

    return {
      id,
      name: fullName || email || id,
      ...(email ? { email } : {}),
      type: 'contact',
      metadata,
    };
  }

  /**
   * HubSpot revokes by deleting the refresh token
   */
  async revokeToken(record: TokenRecord): Promise<void> {
    if (!record.refreshToken) return;

    await this.deps.http.delete(`${REFRESH_TOKENS_URL}/${encodeURIComponent(record.refreshToken)}`, {
      provider: this.providerId,
    });
  }
}
