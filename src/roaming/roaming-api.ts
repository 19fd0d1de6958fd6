/**
 * Roaming API client
 *
 * HTTP client for the roaming plan backend. Payloads are validated with zod
 * so the tools only ever see well-formed records.
 */

import { z } from 'zod';

export const RoamingPlanSchema = z.object({
  plan_name: z.string(),
  plan_code: z.string(),
  duration: z.number().positive(),
  duration_unit: z.string(),
  data_amount: z.string(),
  voice_incoming_fee: z.number(),
  voice_outgoing_fee: z.number(),
  price: z.number(),
  supported_countries: z.array(z.string()),
});
export type RoamingPlan = z.infer<typeof RoamingPlanSchema>;

export const RoamingUsageSchema = z.object({
  plan_name: z.string(),
  roaming_country: z.string(),
  subscription_date: z.string(),
  start_date: z.string(),
  start_time: z.string(),
  end_date: z.string(),
  time_standard: z.string(),
});
export type RoamingUsage = z.infer<typeof RoamingUsageSchema>;

export const SubscriptionResultSchema = z
  .object({
    plan_name: z.string().optional(),
  })
  .passthrough();
export type SubscriptionResult = z.infer<typeof SubscriptionResultSchema>;

export interface SubscriptionRequest {
  phone_number: string;
  plan_code: string;
  roaming_country: string;
  start_date: string;
  start_time: string;
}

/**
 * Raised for non-2xx responses and payloads that fail validation.
 */
export class RoamingApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'RoamingApiError';
  }
}

export class RoamingApiClient {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async listPlans(): Promise<RoamingPlan[]> {
    const body = await this.request('GET', '/roaming/plans');
    return this.parse(z.array(RoamingPlanSchema), body);
  }

  async getUsage(phoneNumber: string): Promise<RoamingUsage[]> {
    const body = await this.request('GET', `/roaming/subscription/${encodeURIComponent(phoneNumber)}`);
    return this.parse(z.array(RoamingUsageSchema), body);
  }

  async subscribe(request: SubscriptionRequest): Promise<SubscriptionResult> {
    const body = await this.request('POST', '/roaming/subscribe', {
      ...request,
      time_standard: 'LOCAL',
    });
    return this.parse(SubscriptionResultSchema, body);
  }

  private async request(method: 'GET' | 'POST', path: string, payload?: unknown): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: payload === undefined ? undefined : JSON.stringify(payload),
    });

    if (!response.ok) {
      throw new RoamingApiError(`${method} ${path} failed with status ${response.status}`, response.status);
    }

    return response.json();
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new RoamingApiError(`Unexpected roaming API response: ${result.error.message}`);
    }
    return result.data;
  }
}
