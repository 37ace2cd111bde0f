// src/adapters/notion/NotionAdapter.ts

import { BaseAdapter } from '../BaseAdapter';
import type { FetchParams } from '../types';
import type { IntegrationItem, ProviderId } from '../../core/normalizer/types';
import type { TokenRecord } from '../../core/token/types';
import type { OAuthEndpoints } from '../../core/auth/OAuthClient';
import { RetryBudget } from '../../core/http/RetryHandler';
import { NotionSearchPageSchema, type NotionObject, type NotionParent } from './types';

const SEARCH_URL = 'https://api.notion.com/v1/search';
const NOTION_VERSION = '2022-06-28';
const MAX_PAGE_SIZE = 100;

export class NotionAdapter extends BaseAdapter<NotionObject> {
  readonly providerId: ProviderId = 'notion';

  protected readonly endpoints: OAuthEndpoints = {
    authorizationEndpoint: 'https://api.notion.com/v1/oauth/authorize',
    tokenEndpoint: 'https://api.notion.com/v1/oauth/token',
    tokenEndpointAuthMethod: 'client_secret_basic',
  };

  // Notion access tokens do not expire; records are treated as valid for 90 days
  protected readonly defaultTokenLifetimeSeconds = 90 * 24 * 60 * 60;

  protected authorizationParams(): Record<string, string> {
    return { owner: 'user' };
  }

  async fetchItems(record: TokenRecord, params?: FetchParams): Promise<NotionObject[]> {
    const limit = this.fetchLimit(params);
    const objects: NotionObject[] = [];
    const retryBudget = new RetryBudget();
    let cursor: string | undefined;

    do {
      const body: Record<string, unknown> = {
        page_size: Math.min(MAX_PAGE_SIZE, limit - objects.length),
      };
      if (cursor) body.start_cursor = cursor;

      const response = await this.deps.http.post(SEARCH_URL, body, {
        provider: this.providerId,
        headers: {
          ...this.bearer(record),
          'Notion-Version': NOTION_VERSION,
          'Content-Type': 'application/json',
        },
        retryBudget,
      });

      const page = NotionSearchPageSchema.parse(response.data);
      objects.push(...page.results);
      cursor = page.has_more && page.next_cursor ? page.next_cursor : undefined;
    } while (cursor && objects.length < limit);

    this.deps.logger.info('Retrieved Notion pages and databases', {
      provider: this.providerId,
      ownerContext: record.ownerContext,
      count: objects.length,
    });
    return objects.slice(0, limit);
  }

  normalize(raw: NotionObject): IntegrationItem {
    const metadata: Record<string, string> = {};
    if (raw.url) metadata.url = raw.url;
    if (raw.created_time) metadata.created_at = raw.created_time;
    if (raw.last_edited_time) metadata.last_edited_at = raw.last_edited_time;
    if (raw.archived !== undefined) metadata.archived = String(raw.archived);
    if (raw.parent) {
      metadata.parent_type = raw.parent.type;
      const parentId = this.parentId(raw.parent);
      if (parentId) metadata.parent_id = parentId;
    }

    return {
      id: raw.id,
      name: this.titleOf(raw) || raw.id,
      type: raw.object,
      metadata,
    };
  }

  private titleOf(raw: NotionObject): string {
    if (raw.title) {
      return raw.title.map((part) => part.plain_text).join('').trim();
    }

    for (const property of Object.values(raw.properties ?? {})) {
      if (property.type === 'title' && property.title) {
        return property.title.map((part) => part.plain_text).join('').trim();
      }
    }
    return '';
  }

  private parentId(parent: NotionParent): string | undefined {
    return parent.page_id ?? parent.database_id ?? parent.block_id;
  }
}
