/**
 * End-to-end topology analysis: validation, repair, structure, demand and cost
 */

import { validate } from '../validators/topology.js';
import { repair } from '../validators/repair.js';
import { analyzeStructure } from './structure.js';
import { extractDemand } from '../estimators/demand.js';
import type { DeploymentOptimizer } from '../optimizers/deployment.js';
import type { DemandOptions, DeploymentPlan, DeploymentPolicy, ResourceDemand } from '../types/pricing.js';
import type {
  RepairReport,
  StructureSummary,
  TopologyDocument,
  ValidationResult,
} from '../types/topology.js';

export interface CompleteAnalysisOptions {
  repairIfBroken?: boolean;
  policy?: DeploymentPolicy;
  demand?: DemandOptions;
}

export type AnalysisAction = 'validated' | 'repaired' | 'analyzed-with-violations';

export interface CompleteAnalysis {
  action: AnalysisAction;
  validation: ValidationResult;
  repair?: { report: RepairReport; valid: boolean };
  /** The document the figures below were computed from */
  document: TopologyDocument;
  structure: StructureSummary;
  demand: ResourceDemand;
  plan: DeploymentPlan;
  comparison: DeploymentPlan[];
  summary: {
    topologyName: string;
    nodeCount: number;
    vcpus: number;
    memoryGB: number;
    machineType: string;
    instanceCount: number;
    monthlyCost: number;
    discountedMonthlyCost: number;
    repairsApplied: number;
    topologyValid: boolean;
  };
}

/**
 * Run the full analysis pipeline on a topology.
 * A broken topology is repaired first unless `repairIfBroken` is false,
 * in which case the figures come from the document as given.
 */
export function completeAnalysis(
  document: TopologyDocument,
  optimizer: DeploymentOptimizer,
  options: CompleteAnalysisOptions = {}
): CompleteAnalysis {
  const validation = validate(document);

  let action: AnalysisAction = 'validated';
  let analyzed = document;
  let repaired: CompleteAnalysis['repair'];
  if (!validation.valid) {
    if (options.repairIfBroken ?? true) {
      const result = repair(document);
      analyzed = result.document;
      repaired = { report: result.report, valid: result.after.valid };
      action = 'repaired';
    } else {
      action = 'analyzed-with-violations';
    }
  }

  const structure = analyzeStructure(analyzed);
  const demand = extractDemand(analyzed, options.demand);
  const plan = optimizer.optimize(demand, options.policy);
  const comparison = optimizer.compare(demand);

  return {
    action,
    validation,
    repair: repaired,
    document: analyzed,
    structure,
    demand,
    plan,
    comparison,
    summary: {
      topologyName: structure.name,
      nodeCount: structure.nodeCount,
      vcpus: demand.vcpus,
      memoryGB: demand.memoryGB,
      machineType: plan.machineType,
      instanceCount: plan.instanceCount,
      monthlyCost: plan.effectiveMonthlyCost,
      discountedMonthlyCost: plan.monthlyCost.discounted,
      repairsApplied: repaired?.report.length ?? 0,
      topologyValid: structure.valid,
    },
  };
}
