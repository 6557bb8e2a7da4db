/**
 * Whole-topology planning tools: complete analysis, recommendations and deployment commands
 */

import { completeAnalysis } from '../analyzers/complete.js';
import { planOptions, recommendDeployment } from '../recommendations/engine.js';
import { generateDeploymentCommands } from '../recommendations/commands.js';
import { loadTopology, saveRepairedTopology, type SavedTopology } from './input.js';
import { demandOptions, type ToolContext } from './context.js';
import { failureResponse, jsonResponse } from './response.js';
import type {
  CompleteTopologyAnalysisArgs,
  GenerateDeploymentCommandsArgs,
  GetDeploymentRecommendationsArgs,
  ToolCallResponse,
  TopologySource,
} from '../types/tools.js';
import type { DeploymentOption } from '../recommendations/engine.js';

/**
 * Validate, repair if needed, then size and price a topology in one call
 */
export async function completeTopologyAnalysisTool(
  args: CompleteTopologyAnalysisArgs,
  context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const { document, source } = await loadTopology(args);
    const analysis = completeAnalysis(document, context.optimizer, {
      repairIfBroken: args.repairIfBroken,
      policy: { highAvailability: args.highAvailability, discounted: args.discounted },
      demand: demandOptions(context),
    });

    let saved: SavedTopology | undefined;
    if (analysis.action === 'repaired') {
      saved = await saveRepairedTopology(analysis.document, args.outputFile, context);
    }

    context.logger.info('Topology analysis complete', {
      source,
      action: analysis.action,
      machineType: analysis.plan.machineType,
    });

    return jsonResponse({
      source,
      action: analysis.action,
      summary: analysis.summary,
      validation: analysis.validation,
      repair: analysis.repair,
      structure: analysis.structure,
      demand: analysis.demand,
      plan: analysis.plan,
      comparison: analysis.comparison,
      outputFile: saved?.outputFile,
      repairedYaml: saved?.repairedYaml,
    });
  } catch (error) {
    return failureResponse('complete topology analysis', error);
  }
}

/**
 * Demand of a topology, repaired in memory when broken
 */
async function topologyDemand(args: TopologySource, context: ToolContext) {
  const { document, source } = await loadTopology(args);
  const analysis = completeAnalysis(document, context.optimizer, { demand: demandOptions(context) });
  return { source, analysis };
}

/**
 * Rank deployment options for a topology within an optional budget
 */
export async function getDeploymentRecommendationsTool(
  args: GetDeploymentRecommendationsArgs,
  context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const { source, analysis } = await topologyDemand(args, context);
    const recommendation = recommendDeployment(analysis.demand, context.optimizer, {
      budget: args.budget,
      priority: args.priority,
    });

    return jsonResponse({
      source,
      topologyName: analysis.summary.topologyName,
      action: analysis.action,
      demand: { vcpus: analysis.demand.vcpus, memoryGB: analysis.demand.memoryGB },
      ...recommendation,
    });
  } catch (error) {
    return failureResponse('get deployment recommendations', error);
  }
}

/**
 * gcloud commands for the chosen, or else the recommended, deployment option
 */
export async function generateDeploymentCommandsTool(
  args: GenerateDeploymentCommandsArgs,
  context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const { source, analysis } = await topologyDemand(args, context);

    let chosen: DeploymentOption | undefined;
    if (args.option !== undefined) {
      chosen = planOptions(analysis.demand, context.optimizer).find(option => option.name === args.option);
    }
    chosen ??= recommendDeployment(analysis.demand, context.optimizer, {
      budget: args.budget,
      priority: args.priority,
    }).recommended;

    const generated = generateDeploymentCommands(chosen.plan, {
      zone: args.zone,
      projectId: args.projectId,
      namePrefix: args.namePrefix,
      topologyFile: args.topologyFile,
    });

    return jsonResponse({
      source,
      option: chosen.name,
      machineType: chosen.plan.machineType,
      instanceCount: chosen.plan.instanceCount,
      effectiveMonthlyCost: chosen.plan.effectiveMonthlyCost,
      ...generated,
      script: generated.commands.join('\n'),
    });
  } catch (error) {
    return failureResponse('generate deployment commands', error);
  }
}
