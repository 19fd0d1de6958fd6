/**
 * Plan ranking and recommendation text for `list_roaming_plans`.
 */

import type { RoamingPlan } from './roaming-api.js';

export const MAX_RECOMMENDATIONS = 5;

export interface RankedPlan extends RoamingPlan {
  purchasesNeeded: number;
  totalPrice: number;
}

/**
 * Length of one purchase of the plan, in hours. Unknown units count as days.
 */
export function planDurationHours(plan: RoamingPlan): number {
  return plan.duration_unit === 'hours' ? plan.duration : plan.duration * 24;
}

/**
 * Rank plans by what the whole trip would cost, cheapest first.
 */
export function selectBestPlans(plans: RoamingPlan[], tripDays: number): RankedPlan[] {
  if (plans.length === 0) {
    throw new Error('No plans are available for this region.');
  }

  const tripHours = tripDays * 24;

  return plans
    .map((plan) => {
      const purchasesNeeded = Math.ceil(tripHours / planDurationHours(plan));
      return { ...plan, purchasesNeeded, totalPrice: plan.price * purchasesNeeded };
    })
    .sort((a, b) => a.totalPrice - b.totalPrice)
    .slice(0, MAX_RECOMMENDATIONS);
}

function won(amount: number): string {
  return `${amount.toLocaleString('en-US')} KRW`;
}

function unitText(plan: RoamingPlan): string {
  return plan.duration_unit === 'hours' ? 'hour(s)' : 'day(s)';
}

function voiceFee(fee: number): string {
  return fee === 0 ? 'Free' : `${won(fee)}/min`;
}

function voiceSummary(plan: RoamingPlan): string {
  const incoming = plan.voice_incoming_fee;
  const outgoing = plan.voice_outgoing_fee;
  if (incoming === 0 && outgoing === 0) {
    return 'Incoming and outgoing voice calls are both free.';
  }
  const inPart = incoming === 0 ? 'Incoming calls are free' : `Incoming calls cost ${won(incoming)} per minute`;
  const outPart = outgoing === 0 ? 'outgoing calls are free.' : `outgoing calls cost ${won(outgoing)} per minute.`;
  return `${inPart}, ${outPart}`;
}

export function formatRecommendation(plans: RankedPlan[], country: string, tripDays: number): string {
  const best = plans[0];
  if (!best) {
    return `No suitable plan was found for ${country}.`;
  }

  const summary =
    `For a ${tripDays}-day trip to ${country} we recommend '${best.plan_name}' (code ${best.plan_code}). ` +
    `Using the ${best.duration} ${unitText(best)} pass ${best.purchasesNeeded} time(s) costs ` +
    `${won(best.totalPrice)} in total, the most economical option. ${voiceSummary(best)}`;

  const details = plans.map((plan, index) =>
    [
      `${index + 1}. [${plan.plan_name}]`,
      `• Duration: ${plan.duration} ${unitText(plan)}`,
      `• Data: ${plan.data_amount}`,
      `• Incoming voice: ${voiceFee(plan.voice_incoming_fee)}`,
      `• Outgoing voice: ${voiceFee(plan.voice_outgoing_fee)}`,
      `• Price per purchase: ${won(plan.price)}`,
      `• Total for ${tripDays} day(s): ${won(plan.totalPrice)} (${plan.purchasesNeeded} purchase(s))`,
      `• Plan code: ${plan.plan_code}`,
    ].join('\n'),
  );

  return [
    summary,
    '',
    `Top ${plans.length} plans for ${tripDays} day(s) in ${country}:`,
    '',
    details.join('\n\n'),
  ].join('\n');
}
