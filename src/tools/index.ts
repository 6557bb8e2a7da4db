/**
 * Tools registry and handlers
 * Central module for all MCP tools
 */

import type { z } from 'zod';
import {
  Capability,
  CompareDeploymentOptionsArgsSchema,
  CompleteTopologyAnalysisArgsSchema,
  ExtractResourceDemandArgsSchema,
  GenerateDeploymentCommandsArgsSchema,
  GetDeploymentRecommendationsArgsSchema,
  GetPricingInformationArgsSchema,
  OptimizeDeploymentArgsSchema,
  RepairTopologyArgsSchema,
  TOOL_NAMES,
  TopologySourceArgsSchema,
  type ToolCallResponse,
  type ToolDescriptor,
  type ToolName,
} from '../types/tools.js';
import { validateToolArgs, formatValidationErrors } from './validation.js';
import { errorResponse } from './response.js';
import type { ToolContext } from './context.js';
import { analyzeTopologyStructureTool, repairTopologyTool, validateTopologyTool } from './topology.js';
import {
  compareDeploymentOptionsTool,
  extractResourceDemandTool,
  getPricingInformationTool,
  optimizeDeploymentTool,
} from './pricing.js';
import {
  completeTopologyAnalysisTool,
  generateDeploymentCommandsTool,
  getDeploymentRecommendationsTool,
} from './planning.js';

const TOPOLOGY_SOURCE_PROPERTIES = {
  topologyFile: {
    type: 'string',
    description: 'Path to a ContainerLab topology file (exactly one of topologyFile or topologyYaml)',
  },
  topologyYaml: {
    type: 'string',
    description: 'Inline ContainerLab topology YAML (exactly one of topologyFile or topologyYaml)',
  },
};

const DEMAND_PROPERTIES = {
  vcpus: { type: 'number', minimum: 0, description: 'Required vCPUs' },
  memoryGB: { type: 'number', minimum: 0, description: 'Required memory in GB' },
};

const POLICY_PROPERTIES = {
  highAvailability: {
    type: 'boolean',
    description: 'Deploy two instances of the selected machine type (default: false)',
  },
  discounted: {
    type: 'boolean',
    description: 'Price with discounted (spot) instances (default: false)',
  },
};

const RECOMMENDATION_PROPERTIES = {
  budget: { type: 'number', exclusiveMinimum: 0, description: 'Optional: maximum monthly spend in USD' },
  priority: {
    type: 'string',
    enum: ['cost', 'performance', 'balanced'],
    description: 'What to favour when several options fit (default: balanced)',
  },
};

/**
 * Get all available MCP tools
 */
export function listAllTools(): ToolDescriptor[] {
  return [
    {
      name: 'validate_topology',
      description: 'Validate a ContainerLab topology. Returns structural violations (missing sections, kinds, images, malformed nodes or links) and warnings.',
      inputSchema: {
        type: 'object',
        properties: { ...TOPOLOGY_SOURCE_PROPERTIES },
      },
    },
    {
      name: 'repair_topology',
      description: 'Repair a broken ContainerLab topology. Returns the repaired YAML and every fix applied, optionally writing it to outputFile.',
      inputSchema: {
        type: 'object',
        properties: {
          ...TOPOLOGY_SOURCE_PROPERTIES,
          outputFile: {
            type: 'string',
            description: 'Optional: path to write the repaired topology to',
          },
        },
      },
    },
    {
      name: 'analyze_topology_structure',
      description: 'Summarise a topology: node and link counts, nodes per kind and multi-component (chassis) nodes.',
      inputSchema: {
        type: 'object',
        properties: { ...TOPOLOGY_SOURCE_PROPERTIES },
      },
    },
    {
      name: 'extract_resource_demand',
      description: 'Aggregate the vCPU and memory demand of a topology, node by node, including components and per-node overhead.',
      inputSchema: {
        type: 'object',
        properties: {
          ...TOPOLOGY_SOURCE_PROPERTIES,
          overheadCpuPerNode: {
            type: 'number',
            minimum: 0,
            description: 'Optional: vCPUs added per node (default: configured overhead)',
          },
          overheadMemoryGBPerNode: {
            type: 'number',
            minimum: 0,
            description: 'Optional: memory in GB added per node (default: configured overhead)',
          },
        },
      },
    },
    {
      name: 'optimize_deployment',
      description: 'Select the cheapest machine type meeting a vCPU and memory demand. Returns the plan with hourly and monthly costs.',
      inputSchema: {
        type: 'object',
        properties: { ...DEMAND_PROPERTIES, ...POLICY_PROPERTIES },
        required: ['vcpus', 'memoryGB'],
      },
    },
    {
      name: 'compare_deployment_options',
      description: 'Compare on-demand, discounted and high-availability plans for a demand, sorted by on-demand monthly cost.',
      inputSchema: {
        type: 'object',
        properties: { ...DEMAND_PROPERTIES },
        required: ['vcpus', 'memoryGB'],
      },
    },
    {
      name: 'get_pricing_information',
      description: 'Get price table metadata and machine offers, or the prices of a single machine type.',
      inputSchema: {
        type: 'object',
        properties: {
          machineType: {
            type: 'string',
            description: 'Optional: machine type to look up (e.g., "n2-standard-4")',
          },
        },
      },
    },
    {
      name: 'complete_topology_analysis',
      description: 'Validate, repair if broken, analyse structure, extract demand and price a topology in one call.',
      inputSchema: {
        type: 'object',
        properties: {
          ...TOPOLOGY_SOURCE_PROPERTIES,
          ...POLICY_PROPERTIES,
          repairIfBroken: {
            type: 'boolean',
            description: 'Repair a broken topology before sizing it (default: true)',
          },
          outputFile: {
            type: 'string',
            description: 'Optional: path to write the repaired topology to',
          },
        },
      },
    },
    {
      name: 'get_deployment_recommendations',
      description: 'Recommend a deployment option for a topology within an optional monthly budget.',
      inputSchema: {
        type: 'object',
        properties: { ...TOPOLOGY_SOURCE_PROPERTIES, ...RECOMMENDATION_PROPERTIES },
      },
    },
    {
      name: 'generate_deployment_commands',
      description: 'Generate gcloud commands that create the VMs for a topology, install ContainerLab and deploy the topology.',
      inputSchema: {
        type: 'object',
        properties: {
          ...TOPOLOGY_SOURCE_PROPERTIES,
          ...RECOMMENDATION_PROPERTIES,
          option: {
            type: 'string',
            enum: ['on-demand-standard', 'spot-standard', 'high-availability'],
            description: 'Optional: deployment option to generate commands for (default: the recommended one)',
          },
          projectId: { type: 'string', description: 'Optional: Google Cloud project ID' },
          zone: { type: 'string', description: 'Optional: zone such as "us-east4-a"' },
          namePrefix: { type: 'string', description: 'Optional: VM name prefix (default: clab-vm)' },
        },
      },
    },
  ];
}

type ToolHandler<T> = (args: T, context: ToolContext) => Promise<ToolCallResponse>;

/**
 * Validate arguments against a schema before handing them to the tool
 */
async function run<S extends z.ZodTypeAny>(
  schema: S,
  args: unknown,
  context: ToolContext,
  handler: ToolHandler<z.output<S>>
): Promise<ToolCallResponse> {
  const validation = validateToolArgs(schema, args ?? {});
  if (!validation.success) {
    return errorResponse('Invalid tool arguments', { details: formatValidationErrors(validation.errors) });
  }
  return handler(validation.data, context);
}

/**
 * Call a tool by name
 */
export async function callTool(name: string, args: unknown, context: ToolContext): Promise<ToolCallResponse> {
  if (!isValidToolName(name)) {
    return errorResponse(`Unknown tool: ${name}`, { availableTools: [...TOOL_NAMES] });
  }

  context.logger.debug('Calling tool', { tool: name });

  switch (name) {
    case 'validate_topology':
      return run(TopologySourceArgsSchema, args, context, validateTopologyTool);

    case 'repair_topology':
      return run(RepairTopologyArgsSchema, args, context, repairTopologyTool);

    case 'analyze_topology_structure':
      return run(TopologySourceArgsSchema, args, context, analyzeTopologyStructureTool);

    case 'extract_resource_demand':
      return run(ExtractResourceDemandArgsSchema, args, context, extractResourceDemandTool);

    case 'optimize_deployment':
      return run(OptimizeDeploymentArgsSchema, args, context, optimizeDeploymentTool);

    case 'compare_deployment_options':
      return run(CompareDeploymentOptionsArgsSchema, args, context, compareDeploymentOptionsTool);

    case 'get_pricing_information':
      return run(GetPricingInformationArgsSchema, args, context, getPricingInformationTool);

    case 'complete_topology_analysis':
      return run(CompleteTopologyAnalysisArgsSchema, args, context, completeTopologyAnalysisTool);

    case 'get_deployment_recommendations':
      return run(GetDeploymentRecommendationsArgsSchema, args, context, getDeploymentRecommendationsTool);

    case 'generate_deployment_commands':
      return run(GenerateDeploymentCommandsArgsSchema, args, context, generateDeploymentCommandsTool);
  }
}

/**
 * Check if a tool name is valid
 */
export function isValidToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(toolName => toolName === name);
}

/**
 * Tool serving each analysis capability
 */
export const CAPABILITY_TOOLS: Record<Capability, ToolName> = {
  [Capability.VALIDATE]: 'validate_topology',
  [Capability.REPAIR]: 'repair_topology',
  [Capability.ANALYZE_STRUCTURE]: 'analyze_topology_structure',
  [Capability.EXTRACT_DEMAND]: 'extract_resource_demand',
  [Capability.OPTIMIZE]: 'optimize_deployment',
  [Capability.COMPARE]: 'compare_deployment_options',
};

/**
 * Dispatch a capability to the tool that serves it
 */
export async function invokeCapability(
  capability: Capability,
  args: unknown,
  context: ToolContext
): Promise<ToolCallResponse> {
  return callTool(CAPABILITY_TOOLS[capability], args, context);
}

export { createToolContext, type ToolContext } from './context.js';
