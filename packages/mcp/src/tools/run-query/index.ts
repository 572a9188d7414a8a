import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { MAX_PAGE_SIZE } from '../../ads/ads-api-client.js';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';
import {
  CUSTOMER_ID_PROPERTY,
  CustomerIdSchema,
  LOGIN_CUSTOMER_ID_PROPERTY,
  LoginCustomerIdSchema,
} from '../ads-arguments.js';

export const DEFAULT_QUERY_PAGE_SIZE = 1000;
export const DEFAULT_MAX_PAGES = 10;

const ArgsSchema = z.object({
  customer_id: CustomerIdSchema,
  query: z.string().trim().min(1),
  login_customer_id: LoginCustomerIdSchema,
  page_size: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_QUERY_PAGE_SIZE),
  max_pages: z.number().int().min(1).default(DEFAULT_MAX_PAGES),
});

export class RunQuery extends BaseKeeperTool {
  public readonly name = 'run_query';

  public get tool(): Tool {
    return {
      name: this.name,
      description:
        'Run a Google Ads Query Language (GAQL) query against one customer and return the rows as the API sends them.',
      inputSchema: {
        type: 'object',
        properties: {
          customer_id: CUSTOMER_ID_PROPERTY,
          query: {
            type: 'string',
            description: 'GAQL query, e.g. SELECT campaign.id, campaign.name FROM campaign',
          },
          login_customer_id: LOGIN_CUSTOMER_ID_PROPERTY,
          page_size: {
            type: 'number',
            description: `Rows per page (1-${MAX_PAGE_SIZE}, default ${DEFAULT_QUERY_PAGE_SIZE})`,
          },
          max_pages: {
            type: 'number',
            description: `Stop after this many pages (default ${DEFAULT_MAX_PAGES})`,
          },
        },
        required: ['customer_id', 'query'],
      },
    };
  }

  protected async execute(args: Record<string, unknown>, context: KeeperToolContext) {
    const parsed = ArgsSchema.parse(args);
    const result = await context.ads.searchAll(parsed.customer_id, parsed.query, {
      pageSize: parsed.page_size,
      maxPages: parsed.max_pages,
      loginCustomerId: parsed.login_customer_id,
      signal: context.signal,
      onAuthorizationRequired: context.onAuthorizationRequired,
    });
    return {
      customer_id: parsed.customer_id,
      result_count: result.results.length,
      pages: result.pages,
      ...(result.nextPageToken && { next_page_token: result.nextPageToken }),
      results: result.results,
    };
  }
}
