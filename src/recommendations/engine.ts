/**
 * Deployment recommendation engine
 */

import { BudgetError } from '../errors/index.js';
import { formatCurrency } from '../utils/units.js';
import type { DemandFigures, DeploymentOptimizer } from '../optimizers/deployment.js';
import type { DeploymentPlan, DeploymentPolicy } from '../types/pricing.js';

export type DeploymentOptionName = 'on-demand-standard' | 'spot-standard' | 'high-availability';
export type PerformancePriority = 'cost' | 'performance' | 'balanced';

export interface DeploymentOption {
  name: DeploymentOptionName;
  plan: DeploymentPlan;
}

export interface RecommendationRequest {
  budget?: number;
  priority?: PerformancePriority;
}

export interface DeploymentRecommendation {
  options: DeploymentOption[];
  recommended: DeploymentOption;
  excluded: Array<{ name: DeploymentOptionName; effectiveMonthlyCost: number }>;
  budget?: number;
  priority: PerformancePriority;
  rationale: string;
}

export const DEPLOYMENT_OPTIONS: ReadonlyArray<{ name: DeploymentOptionName; policy: DeploymentPolicy }> = [
  { name: 'on-demand-standard', policy: {} },
  { name: 'spot-standard', policy: { discounted: true } },
  { name: 'high-availability', policy: { highAvailability: true } },
];

// Option each priority prefers when it fits the budget
const PREFERRED: Record<PerformancePriority, DeploymentOptionName | undefined> = {
  cost: undefined,
  performance: 'on-demand-standard',
  balanced: 'spot-standard',
};

/**
 * Plan every deployment option for the demand
 */
export function planOptions(demand: DemandFigures, optimizer: DeploymentOptimizer): DeploymentOption[] {
  return DEPLOYMENT_OPTIONS.map(({ name, policy }) => ({ name, plan: optimizer.optimize(demand, policy) }));
}

/**
 * Recommend a deployment option within an optional monthly budget
 */
export function recommendDeployment(
  demand: DemandFigures,
  optimizer: DeploymentOptimizer,
  request: RecommendationRequest = {}
): DeploymentRecommendation {
  const priority = request.priority ?? 'balanced';
  const { budget } = request;
  const all = planOptions(demand, optimizer);

  const options = budget === undefined ? all : all.filter(o => o.plan.effectiveMonthlyCost <= budget);
  const excluded = all
    .filter(o => !options.includes(o))
    .map(o => ({ name: o.name, effectiveMonthlyCost: o.plan.effectiveMonthlyCost }));

  const cheapest = [...options].sort((a, b) => a.plan.effectiveMonthlyCost - b.plan.effectiveMonthlyCost)[0];
  if (!cheapest) {
    const currency = all[0]?.plan.currency;
    throw new BudgetError(
      `No deployment option fits the monthly budget of ${formatCurrency(budget ?? 0, currency)}`,
      { budget, excluded }
    );
  }

  const preferredName = PREFERRED[priority];
  const preferred = options.find(o => o.name === preferredName);
  const recommended = preferred ?? cheapest;

  return {
    options,
    recommended,
    excluded,
    budget,
    priority,
    rationale: explain(priority, recommended, preferred !== undefined),
  };
}

function explain(priority: PerformancePriority, option: DeploymentOption, preferredFits: boolean): string {
  const cost = `${formatCurrency(option.plan.effectiveMonthlyCost, option.plan.currency)}/month`;
  if (priority === 'cost' || !preferredFits) {
    return `${option.name} is the cheapest option that fits (${cost} on ${option.plan.machineType})`;
  }
  if (priority === 'performance') {
    return `${option.name} avoids preemption for steady performance (${cost} on ${option.plan.machineType})`;
  }
  return `${option.name} balances cost and capacity using discounted instances (${cost} on ${option.plan.machineType})`;
}
