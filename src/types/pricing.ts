/**
 * Demand, price table and deployment plan type definitions
 */

export type DemandSource = 'explicit' | 'kind-default' | 'components';

export interface NodeDemand {
  name: string;
  kind: string;
  vcpus: number;
  memoryGB: number;
  source: DemandSource;
  componentCount: number;
}

export interface ResourceDemand {
  vcpus: number;
  memoryGB: number;
  nodeCount: number;
  nodes: NodeDemand[];
}

export interface DemandOptions {
  overheadCpuPerNode?: number;
  overheadMemoryGBPerNode?: number;
}

export interface MachineOffer {
  readonly name: string;
  readonly family: string;
  readonly vcpus: number;
  readonly memoryGB: number;
  readonly hourlyPrice: number;
  readonly monthlyPrice: number;
  readonly discountedHourlyPrice: number;
  readonly discountedMonthlyPrice: number;
}

export interface PriceTableMetadata {
  readonly provider: string;
  readonly region: string;
  readonly version: string;
  readonly currency: string;
  readonly source?: string;
  /** Fraction taken off on-demand prices for spot/preemptible capacity */
  readonly discountRate: number;
}

export interface DeploymentPolicy {
  highAvailability?: boolean;
  discounted?: boolean;
}

export type PlanStrategy =
  | 'on-demand'
  | 'discounted'
  | 'high-availability'
  | 'high-availability-discounted';

export interface CostProjection {
  onDemand: number;
  discounted: number;
}

export interface DeploymentPlan {
  strategy: PlanStrategy;
  policy: Required<DeploymentPolicy>;
  demand: { vcpus: number; memoryGB: number };
  machineType: string;
  offers: MachineOffer[];
  instanceCount: number;
  hourlyCost: CostProjection;
  monthlyCost: CostProjection;
  effectiveMonthlyCost: number;
  /** Spare capacity of each instance */
  headroom: { vcpus: number; memoryGB: number };
  region: string;
  currency: string;
  notes: string[];
}
