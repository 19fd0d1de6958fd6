import { z } from 'zod';
import type { Logger } from 'pino';
import type { ToolDescriptor } from '../mcp/tool-registry.js';
import { textResult } from '../mcp/tool-registry.js';
import type { RoamingApiClient, RoamingUsage } from './roaming-api.js';
import { formatRecommendation, selectBestPlans } from './plan-selection.js';

export interface RoamingToolContext {
  api: RoamingApiClient;
  logger: Logger;
}

const ListPlansArgs = z.object({
  country: z.string().min(1),
  duration: z.coerce.number().int(),
});

const UsageArgs = z.object({
  phone_number: z.string().min(1),
});

const SubscribeArgs = z.object({
  phone_number: z.string().min(1),
  plan_code: z.string().min(1),
  roaming_country: z.string().min(1),
  start_date: z.string().min(1),
  start_time: z.string().min(1),
});

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * `2024-05-01T09:30:00Z` → `2024-05-01 09:30`. Values that are not ISO
 * timestamps pass through unchanged.
 */
export function formatTimestamp(value: string, withTime: boolean): string {
  const match = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}))?/.exec(value);
  if (!match) return value;
  const [, date, time] = match;
  return withTime && time ? `${date} ${time}` : date;
}

export function formatUsage(phoneNumber: string, usages: RoamingUsage[]): string {
  if (usages.length === 0) {
    return `No roaming usage history. (Phone number: ${phoneNumber})`;
  }

  const sections = usages.map((usage) =>
    [
      `[${usage.plan_name}]`,
      `• Country: ${usage.roaming_country}`,
      `• Subscribed: ${formatTimestamp(usage.subscription_date, true)}`,
      `• Starts: ${formatTimestamp(usage.start_date, false)} ${usage.start_time} (${usage.time_standard})`,
      `• Ends: ${formatTimestamp(usage.end_date, false)}`,
    ].join('\n'),
  );

  return [`Roaming usage history (Phone number: ${phoneNumber})`, ...sections].join('\n\n');
}

export function roamingTools(): ToolDescriptor<RoamingToolContext>[] {
  return [
    {
      definition: {
        name: 'list_roaming_plans',
        description:
          'List the roaming plans available for a country and trip length, and recommend the most economical one.',
        inputSchema: {
          type: 'object',
          properties: {
            country: { type: 'string', description: 'Destination country (e.g. Japan, USA, France)' },
            duration: { type: 'integer', description: 'Trip length in days' },
          },
          required: ['country', 'duration'],
        },
      },
      execute: async (params, ctx) => {
        const { country, duration } = ListPlansArgs.parse(params);
        if (duration <= 0) {
          return textResult('Trip duration must be at least 1 day.');
        }

        try {
          const plans = await ctx.api.listPlans();
          const available = plans.filter((plan) => plan.supported_countries.includes(country));
          if (available.length === 0) {
            return textResult(`Sorry, ${country} is not currently supported.`);
          }
          return textResult(formatRecommendation(selectBestPlans(available, duration), country, duration));
        } catch (error) {
          ctx.logger.warn({ err: error, country }, 'Plan lookup failed');
          return textResult(`An error occurred while looking up plans: ${describeFailure(error)}`);
        }
      },
    },
    {
      definition: {
        name: 'get_roaming_usage',
        description: "Look up a customer's roaming usage history.",
        inputSchema: {
          type: 'object',
          properties: {
            phone_number: { type: 'string', description: 'Customer phone number' },
          },
          required: ['phone_number'],
        },
      },
      execute: async (params, ctx) => {
        const { phone_number } = UsageArgs.parse(params);
        try {
          const usages = await ctx.api.getUsage(phone_number);
          return textResult(formatUsage(phone_number, usages));
        } catch (error) {
          ctx.logger.warn({ err: error }, 'Usage lookup failed');
          return textResult(`An error occurred while looking up usage history: ${describeFailure(error)}`);
        }
      },
    },
    {
      definition: {
        name: 'subscribe_roaming_plan',
        description:
          "Subscribe a customer to a roaming plan. Requires the customer's phone number, the plan code, the destination country and the start date and time.",
        inputSchema: {
          type: 'object',
          properties: {
            phone_number: { type: 'string', description: 'Subscriber phone number (e.g. 01012345678)' },
            plan_code: { type: 'string', description: 'Plan code (e.g. ZERO_LITE_8GB)' },
            roaming_country: { type: 'string', description: 'Destination country' },
            start_date: { type: 'string', description: 'Start date in YYYY-MM-DDT00:00:00 format' },
            start_time: { type: 'string', description: 'Start time in HH:mm format' },
          },
          required: ['phone_number', 'plan_code', 'roaming_country', 'start_date', 'start_time'],
        },
      },
      execute: async (params, ctx) => {
        const args = SubscribeArgs.parse(params);
        try {
          const subscription = await ctx.api.subscribe(args);
          return textResult(
            [
              'Roaming plan subscription completed.',
              '',
              '[Subscription]',
              `• Phone number: ${args.phone_number}`,
              `• Plan: ${subscription.plan_name ?? 'Unknown'}`,
              `• Country: ${args.roaming_country}`,
              `• Starts: ${args.start_date.split('T')[0]} ${args.start_time}`,
            ].join('\n'),
          );
        } catch (error) {
          ctx.logger.warn({ err: error, planCode: args.plan_code }, 'Subscription failed');
          return textResult(`An error occurred while subscribing: ${describeFailure(error)}`);
        }
      },
    },
  ];
}
