import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { toResourceName } from '../../ads/customer-id.js';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';
import {
  CUSTOMER_ID_PROPERTY,
  CustomerIdSchema,
  LOGIN_CUSTOMER_ID_PROPERTY,
  LoginCustomerIdSchema,
} from '../ads-arguments.js';

/** English */
export const DEFAULT_LANGUAGE = '1000';
/** United States */
export const DEFAULT_GEO_TARGETS = ['2840'];

const KEYWORD_PLAN_NETWORKS = ['GOOGLE_SEARCH', 'GOOGLE_SEARCH_AND_PARTNERS'] as const;

const ConstantIdSchema = z.union([z.string().trim().min(1), z.number().int().positive().transform(String)]);

const ArgsSchema = z
  .object({
    customer_id: CustomerIdSchema,
    keywords: z.array(z.string().trim().min(1)).default([]),
    page_url: z.string().url().optional(),
    language_id: ConstantIdSchema.default(DEFAULT_LANGUAGE),
    geo_target_constants: z.array(ConstantIdSchema).min(1).default(DEFAULT_GEO_TARGETS),
    include_adult: z.boolean().default(false),
    keyword_plan_network: z.enum(KEYWORD_PLAN_NETWORKS).default('GOOGLE_SEARCH_AND_PARTNERS'),
    login_customer_id: LoginCustomerIdSchema,
  })
  .refine((args) => args.keywords.length > 0 || args.page_url !== undefined, {
    message: 'provide keywords, page_url or both',
    path: ['keywords'],
  });

export class KeywordIdeas extends BaseKeeperTool {
  public readonly name = 'keyword_ideas';

  public get tool(): Tool {
    return {
      name: this.name,
      description:
        'Generate keyword ideas with search volume, competition and top-of-page bid ranges from seed keywords or a page URL.',
      inputSchema: {
        type: 'object',
        properties: {
          customer_id: CUSTOMER_ID_PROPERTY,
          keywords: {
            type: 'array',
            items: { type: 'string' },
            description: 'Seed keywords',
          },
          page_url: {
            type: 'string',
            description: 'Seed page URL',
          },
          language_id: {
            type: 'string',
            description: `Language constant id (default ${DEFAULT_LANGUAGE}, English)`,
          },
          geo_target_constants: {
            type: 'array',
            items: { type: 'string' },
            description: `Geo target constant ids (default ${DEFAULT_GEO_TARGETS.join(', ')}, United States)`,
          },
          include_adult: { type: 'boolean' },
          keyword_plan_network: {
            type: 'string',
            enum: [...KEYWORD_PLAN_NETWORKS],
          },
          login_customer_id: LOGIN_CUSTOMER_ID_PROPERTY,
        },
        required: ['customer_id'],
      },
    };
  }

  protected async execute(args: Record<string, unknown>, context: KeeperToolContext) {
    const parsed = ArgsSchema.parse(args);
    const request: Record<string, unknown> = {
      language: toResourceName('languageConstants', parsed.language_id),
      geoTargetConstants: parsed.geo_target_constants.map((id) => toResourceName('geoTargetConstants', id)),
      includeAdultKeywords: parsed.include_adult,
      keywordPlanNetwork: parsed.keyword_plan_network,
    };
    if (parsed.keywords.length > 0 && parsed.page_url) {
      request.keywordAndUrlSeed = { keywords: parsed.keywords, url: parsed.page_url };
    } else if (parsed.page_url) {
      request.urlSeed = { url: parsed.page_url };
    } else {
      request.keywordSeed = { keywords: parsed.keywords };
    }

    const response = await context.ads.generateKeywordIdeas(parsed.customer_id, request, {
      loginCustomerId: parsed.login_customer_id,
      signal: context.signal,
      onAuthorizationRequired: context.onAuthorizationRequired,
    });
    const ideas = response.results.map((item) => ({
      text: item.text ?? null,
      avgMonthlySearches: item.keywordIdeaMetrics?.avgMonthlySearches ?? null,
      competition: item.keywordIdeaMetrics?.competition ?? null,
      lowTopOfPageBidMicros: item.keywordIdeaMetrics?.lowTopOfPageBidMicros ?? null,
      highTopOfPageBidMicros: item.keywordIdeaMetrics?.highTopOfPageBidMicros ?? null,
    }));
    return { customer_id: parsed.customer_id, count: ideas.length, ideas };
  }
}
