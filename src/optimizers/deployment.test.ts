/**
 * Unit tests for the deployment optimizer
 */

import { describe, it, expect } from '@jest/globals';
import { DeploymentOptimizer } from './deployment.js';
import { CapacityError, ValidationError } from '../errors/index.js';
import { bundledPriceTable, createTestPriceTable } from '../__tests__/utils.js';

describe('DeploymentOptimizer', () => {
  const optimizer = new DeploymentOptimizer(bundledPriceTable());

  describe('optimize', () => {
    it('should pick the custom 16 vCPU / 32GB machine for a matching demand', () => {
      const plan = optimizer.optimize({ vcpus: 16, memoryGB: 32 });

      expect(plan.machineType).toBe('n2-custom-16-32768');
      expect(plan.strategy).toBe('on-demand');
      expect(plan.instanceCount).toBe(1);
      expect(plan.monthlyCost).toEqual({ onDemand: 520.92, discounted: 156.28 });
      expect(plan.hourlyCost).toEqual({ onDemand: 0.7136, discounted: 0.2141 });
      expect(plan.effectiveMonthlyCost).toBe(520.92);
      expect(plan.headroom).toEqual({ vcpus: 0, memoryGB: 0 });
      expect(plan.region).toBe('us-east4');
    });

    it('should use the discounted price when requested without changing the match', () => {
      const plan = optimizer.optimize({ vcpus: 16, memoryGB: 32 }, { discounted: true });

      expect(plan.machineType).toBe('n2-custom-16-32768');
      expect(plan.strategy).toBe('discounted');
      expect(plan.effectiveMonthlyCost).toBe(156.28);
      expect(plan.notes[1]).toBe('Discounted (spot) capacity saves $364.64/month but instances can be preempted');
    });

    it('should double instances and cost for high availability', () => {
      const plan = optimizer.optimize({ vcpus: 16, memoryGB: 32 }, { highAvailability: true });

      expect(plan.strategy).toBe('high-availability');
      expect(plan.instanceCount).toBe(2);
      expect(plan.offers.map(o => o.name)).toEqual(['n2-custom-16-32768', 'n2-custom-16-32768']);
      expect(plan.monthlyCost.onDemand).toBe(1041.84);
      expect(plan.headroom).toEqual({ vcpus: 0, memoryGB: 0 });
    });

    it('should never undersize', () => {
      const demands = [
        { vcpus: 1, memoryGB: 1 },
        { vcpus: 3, memoryGB: 20 },
        { vcpus: 17, memoryGB: 10 },
        { vcpus: 40, memoryGB: 300 },
        { vcpus: 0, memoryGB: 0 },
      ];

      for (const demand of demands) {
        const [offer] = optimizer.optimize(demand).offers;
        expect(offer?.vcpus).toBeGreaterThanOrEqual(demand.vcpus);
        expect(offer?.memoryGB).toBeGreaterThanOrEqual(demand.memoryGB);
      }
    });

    it('should prefer memory-light machines when they are cheapest', () => {
      expect(optimizer.optimize({ vcpus: 17, memoryGB: 10 }).machineType).toBe('n2-highcpu-32');
      expect(optimizer.optimize({ vcpus: 4, memoryGB: 16 }).machineType).toBe('n2-standard-4');
    });

    it('should break price ties by vCPUs, then memory, then name', () => {
      const tied = new DeploymentOptimizer(
        createTestPriceTable([
          { name: 'b-8-32', vcpus: 8, memoryGB: 32, monthlyPrice: 100 },
          { name: 'a-4-64', vcpus: 4, memoryGB: 64, monthlyPrice: 100 },
          { name: 'b-4-32', vcpus: 4, memoryGB: 32, monthlyPrice: 100 },
          { name: 'a-4-32', vcpus: 4, memoryGB: 32, monthlyPrice: 100 },
        ])
      );

      expect(tied.optimize({ vcpus: 4, memoryGB: 16 }).machineType).toBe('a-4-32');
    });

    it('should raise a capacity error naming the unmet CPU dimension', () => {
      let caught: unknown;
      try {
        optimizer.optimize({ vcpus: 200, memoryGB: 64 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CapacityError);
      if (caught instanceof CapacityError) {
        expect(caught.dimension).toBe('cpu');
        expect(caught.shortfall).toBe(72);
        expect(caught.unmet).toEqual([{ dimension: 'cpu', required: 200, available: 128, shortfall: 72 }]);
      }
    });

    it('should measure memory against machines that already fit the CPU demand', () => {
      expect(() => optimizer.optimize({ vcpus: 96, memoryGB: 600 })).toThrow(
        'No machine offer satisfies the demand: memory short by 88GB (need 600, largest fitting offer has 512)'
      );
    });

    it('should report both dimensions when neither can be met', () => {
      let caught: unknown;
      try {
        optimizer.optimize({ vcpus: 256, memoryGB: 1024 });
      } catch (error) {
        caught = error;
      }

      expect(caught instanceof CapacityError && caught.unmet.map(u => [u.dimension, u.shortfall])).toEqual([
        ['cpu', 128],
        ['memory', 512],
      ]);
    });

    it('should reject negative demand', () => {
      expect(() => optimizer.optimize({ vcpus: -1, memoryGB: 4 })).toThrow(ValidationError);
    });
  });

  describe('compare', () => {
    it('should return the three standard plans sorted by on-demand cost', () => {
      const plans = optimizer.compare({ vcpus: 16, memoryGB: 32 });

      expect(plans.map(p => [p.strategy, p.monthlyCost.onDemand, p.effectiveMonthlyCost])).toEqual([
        ['on-demand', 520.92, 520.92],
        ['discounted', 520.92, 156.28],
        ['high-availability', 1041.84, 1041.84],
      ]);
    });
  });

  describe('priceTable', () => {
    it('should expose the injected offers', () => {
      expect(optimizer.priceTable()).toHaveLength(29);
    });
  });
});
