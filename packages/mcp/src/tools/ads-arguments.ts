import { z } from 'zod';
import { normalizeCustomerId } from '../ads/customer-id.js';

/**
 * Accepts `123-456-7890`, `1234567890` or `customers/1234567890`.
 */
export const CustomerIdSchema = z
  .union([z.string(), z.number().int().nonnegative().transform(String)])
  .refine(
    (value) => /^\d+$/.test(value.trim().replace(/^customers\//, '').replace(/[\s-]/g, '')),
    'must be a customer id such as 123-456-7890',
  )
  .transform(normalizeCustomerId);

export const LoginCustomerIdSchema = CustomerIdSchema.optional();

export const CUSTOMER_ID_PROPERTY = {
  type: 'string',
  description: 'Google Ads customer id, with or without dashes',
} as const;

export const LOGIN_CUSTOMER_ID_PROPERTY = {
  type: 'string',
  description: 'Manager account id to access the customer through (login-customer-id header)',
} as const;
