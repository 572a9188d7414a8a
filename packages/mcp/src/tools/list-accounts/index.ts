import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { logEvent } from '@credential-keeper/core';
import { BaseKeeperTool } from '../base-tool.js';
import type { KeeperToolContext } from '../keeper-tool.interface.js';
import { LOGIN_CUSTOMER_ID_PROPERTY, LoginCustomerIdSchema } from '../ads-arguments.js';

const ArgsSchema = z.object({
  login_customer_id: LoginCustomerIdSchema,
});

const CUSTOMER_QUERY =
  'SELECT customer.id, customer.descriptive_name, customer.currency_code, customer.time_zone, customer.manager FROM customer';

const CustomerRowSchema = z.object({
  customer: z
    .object({
      descriptiveName: z.string().optional(),
      manager: z.boolean().optional(),
      currencyCode: z.string().optional(),
      timeZone: z.string().optional(),
    })
    .default({}),
});

type CustomerDetails = z.infer<typeof CustomerRowSchema>['customer'];

export interface AccountSummary {
  customer_id: string;
  resource_name: string;
  descriptive_name?: string | null;
  manager?: boolean | null;
  currency_code?: string | null;
  time_zone?: string | null;
}

export class ListAccounts extends BaseKeeperTool {
  public readonly name = 'list_accounts';

  public get tool(): Tool {
    return {
      name: this.name,
      description:
        'List Google Ads accounts the signed-in user can access, with name and manager flag where they can be read.',
      inputSchema: {
        type: 'object',
        properties: {
          login_customer_id: LOGIN_CUSTOMER_ID_PROPERTY,
        },
      },
    };
  }

  protected async execute(args: Record<string, unknown>, context: KeeperToolContext): Promise<AccountSummary[]> {
    const { login_customer_id } = ArgsSchema.parse(args);
    const requestOptions = {
      loginCustomerId: login_customer_id,
      signal: context.signal,
      onAuthorizationRequired: context.onAuthorizationRequired,
    };
    const resourceNames = await context.ads.listAccessibleCustomers(requestOptions);

    const accounts: AccountSummary[] = [];
    for (const resourceName of resourceNames) {
      const customerId = resourceName.split('/').pop() ?? resourceName;
      try {
        const page = await context.ads.search(customerId, { query: CUSTOMER_QUERY, pageSize: 1 }, requestOptions);
        const row = page.results[0] ? CustomerRowSchema.safeParse(page.results[0]) : undefined;
        const customer: CustomerDetails = row?.success ? row.data.customer : {};
        accounts.push({
          customer_id: customerId,
          resource_name: resourceName,
          descriptive_name: customer.descriptiveName ?? null,
          manager: customer.manager ?? null,
          currency_code: customer.currencyCode ?? null,
          time_zone: customer.timeZone ?? null,
        });
      } catch (error) {
        if (context.signal?.aborted) throw error;
        logEvent('debug', 'ads:account_details_unavailable', {
          customerId,
          error: error instanceof Error ? error.message : String(error),
        });
        accounts.push({ customer_id: customerId, resource_name: resourceName });
      }
    }
    return accounts;
  }
}
