/**
 * Deployment optimizer: maps resource demand onto the cheapest fitting machine offer
 */

import { CapacityError, ValidationError, type CapacityShortfall } from '../errors/index.js';
import { formatCurrency, roundCurrency, roundTo } from '../utils/units.js';
import type { PriceTable } from '../pricing/price-table.js';
import type {
  DeploymentPlan,
  DeploymentPolicy,
  MachineOffer,
  PlanStrategy,
} from '../types/pricing.js';

export interface DemandFigures {
  vcpus: number;
  memoryGB: number;
}

const HA_INSTANCE_COUNT = 2;

/**
 * Cheapest first; ties go to the smaller machine, then by name
 */
export function compareOffers(a: MachineOffer, b: MachineOffer): number {
  return (
    a.monthlyPrice - b.monthlyPrice ||
    a.vcpus - b.vcpus ||
    a.memoryGB - b.memoryGB ||
    a.name.localeCompare(b.name)
  );
}

function strategyFor(policy: Required<DeploymentPolicy>): PlanStrategy {
  if (policy.highAvailability) {
    return policy.discounted ? 'high-availability-discounted' : 'high-availability';
  }
  return policy.discounted ? 'discounted' : 'on-demand';
}

export class DeploymentOptimizer {
  private readonly table: PriceTable;

  constructor(table: PriceTable) {
    this.table = table;
  }

  /**
   * Offers the optimizer chooses from
   */
  priceTable(): readonly MachineOffer[] {
    return this.table.list();
  }

  /**
   * Cheapest offer meeting both dimensions of the demand
   */
  selectOffer(demand: DemandFigures): MachineOffer {
    this.assertDemand(demand);

    const candidates = this.table
      .list()
      .filter(offer => offer.vcpus >= demand.vcpus && offer.memoryGB >= demand.memoryGB)
      .sort(compareOffers);

    const [best] = candidates;
    if (best) {
      return best;
    }
    throw this.capacityError(demand);
  }

  /**
   * Plan a deployment for the demand under the given policy
   */
  optimize(demand: DemandFigures, policy: DeploymentPolicy = {}): DeploymentPlan {
    const offer = this.selectOffer(demand);
    const resolved: Required<DeploymentPolicy> = {
      highAvailability: policy.highAvailability ?? false,
      discounted: policy.discounted ?? false,
    };
    const instanceCount = resolved.highAvailability ? HA_INSTANCE_COUNT : 1;
    const { currency, region } = this.table.metadata;

    const monthlyCost = {
      onDemand: roundCurrency(offer.monthlyPrice * instanceCount),
      discounted: roundCurrency(offer.discountedMonthlyPrice * instanceCount),
    };
    const hourlyCost = {
      onDemand: roundTo(offer.hourlyPrice * instanceCount, 4),
      discounted: roundTo(offer.discountedHourlyPrice * instanceCount, 4),
    };

    const notes: string[] = [
      `${offer.name} provides ${offer.vcpus} vCPUs and ${offer.memoryGB}GB for a demand of ${demand.vcpus} vCPUs and ${demand.memoryGB}GB`,
    ];
    if (resolved.highAvailability) {
      notes.push(`High availability: ${instanceCount} identical instances, each sized for the full demand`);
    }
    if (resolved.discounted) {
      const savings = roundCurrency(monthlyCost.onDemand - monthlyCost.discounted);
      notes.push(
        `Discounted (spot) capacity saves ${formatCurrency(savings, currency)}/month but instances can be preempted`
      );
    }

    return {
      strategy: strategyFor(resolved),
      policy: resolved,
      demand: { vcpus: demand.vcpus, memoryGB: demand.memoryGB },
      machineType: offer.name,
      offers: Array.from({ length: instanceCount }, () => offer),
      instanceCount,
      hourlyCost,
      monthlyCost,
      effectiveMonthlyCost: resolved.discounted ? monthlyCost.discounted : monthlyCost.onDemand,
      headroom: {
        vcpus: roundTo(offer.vcpus - demand.vcpus, 2),
        memoryGB: roundTo(offer.memoryGB - demand.memoryGB, 2),
      },
      region,
      currency,
      notes,
    };
  }

  /**
   * On-demand, discounted and high-availability plans, cheapest on-demand first
   */
  compare(demand: DemandFigures): DeploymentPlan[] {
    const plans = [
      this.optimize(demand),
      this.optimize(demand, { discounted: true }),
      this.optimize(demand, { highAvailability: true }),
    ];
    return plans.sort((a, b) => a.monthlyCost.onDemand - b.monthlyCost.onDemand);
  }

  private assertDemand(demand: DemandFigures): void {
    for (const [dimension, value] of [
      ['vcpus', demand.vcpus],
      ['memoryGB', demand.memoryGB],
    ] as const) {
      if (!Number.isFinite(value) || value < 0) {
        throw new ValidationError(`Demand ${dimension} must be a non-negative number, got ${value}`, {
          dimension,
          value,
        });
      }
    }
  }

  /**
   * Name the dimension(s) no offer can meet. CPU is judged against the whole
   * table, memory against the offers that already satisfy the CPU demand.
   */
  private capacityError(demand: DemandFigures): CapacityError {
    const offers = this.table.list();
    const cpuFitting = offers.filter(offer => offer.vcpus >= demand.vcpus);
    const largest = (pool: readonly MachineOffer[], pick: (o: MachineOffer) => number): number =>
      pool.reduce((max, offer) => Math.max(max, pick(offer)), 0);

    const memoryShortfall = (pool: readonly MachineOffer[]): CapacityShortfall => {
      const available = largest(pool, o => o.memoryGB);
      return {
        dimension: 'memory',
        required: demand.memoryGB,
        available,
        shortfall: roundTo(demand.memoryGB - available, 2),
      };
    };

    if (cpuFitting.length > 0) {
      return new CapacityError([memoryShortfall(cpuFitting)]);
    }

    const availableCpu = largest(offers, o => o.vcpus);
    const cpu: CapacityShortfall = {
      dimension: 'cpu',
      required: demand.vcpus,
      available: availableCpu,
      shortfall: roundTo(demand.vcpus - availableCpu, 2),
    };
    const memory = memoryShortfall(offers);
    return memory.shortfall > 0 ? new CapacityError([cpu, memory]) : new CapacityError([cpu]);
  }
}
