/**
 * Demand extraction, deployment optimization and pricing tools
 */

import { extractDemand } from '../estimators/demand.js';
import { getPricingInformation } from '../pricing/price-table.js';
import { loadTopology } from './input.js';
import { demandOptions, type ToolContext } from './context.js';
import { failureResponse, jsonResponse } from './response.js';
import type {
  CompareDeploymentOptionsArgs,
  ExtractResourceDemandArgs,
  GetPricingInformationArgs,
  OptimizeDeploymentArgs,
  ToolCallResponse,
} from '../types/tools.js';

/**
 * Aggregate CPU and memory demand of a topology
 */
export async function extractResourceDemandTool(
  args: ExtractResourceDemandArgs,
  context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const { document, source } = await loadTopology(args);
    const options = demandOptions(context, args);
    const demand = extractDemand(document, options);

    return jsonResponse({ source, ...demand, overhead: options });
  } catch (error) {
    return failureResponse('extract resource demand', error);
  }
}

/**
 * Cheapest deployment plan for a demand
 */
export async function optimizeDeploymentTool(
  args: OptimizeDeploymentArgs,
  context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const plan = context.optimizer.optimize(
      { vcpus: args.vcpus, memoryGB: args.memoryGB },
      { highAvailability: args.highAvailability, discounted: args.discounted }
    );
    context.logger.debug('Deployment optimized', { machineType: plan.machineType, strategy: plan.strategy });

    return jsonResponse({ plan });
  } catch (error) {
    return failureResponse('optimize deployment', error);
  }
}

/**
 * On-demand, discounted and high-availability plans side by side
 */
export async function compareDeploymentOptionsTool(
  args: CompareDeploymentOptionsArgs,
  context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const plans = context.optimizer.compare({ vcpus: args.vcpus, memoryGB: args.memoryGB });
    return jsonResponse({
      demand: { vcpus: args.vcpus, memoryGB: args.memoryGB },
      plans,
    });
  } catch (error) {
    return failureResponse('compare deployment options', error);
  }
}

/**
 * Price table metadata and offers, or a single machine type
 */
export async function getPricingInformationTool(
  args: GetPricingInformationArgs,
  context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const info = getPricingInformation(context.priceTable, args.machineType);
    return jsonResponse(args.machineType === undefined ? info : { metadata: context.priceTable.metadata, offer: info });
  } catch (error) {
    return failureResponse('get pricing information', error);
  }
}
