/**
 * MCP Tool type definitions
 */

import { z } from 'zod';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * Tool descriptor interface
 */
export interface ToolDescriptor {
  name: ToolName;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Tool call response interface - uses MCP SDK type
 */
export type ToolCallResponse = CallToolResult;

export const TOOL_NAMES = [
  'validate_topology',
  'repair_topology',
  'analyze_topology_structure',
  'extract_resource_demand',
  'optimize_deployment',
  'compare_deployment_options',
  'get_pricing_information',
  'complete_topology_analysis',
  'get_deployment_recommendations',
  'generate_deployment_commands',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/**
 * Analysis capabilities an orchestrator can dispatch to
 */
export enum Capability {
  VALIDATE = 'validate',
  REPAIR = 'repair',
  ANALYZE_STRUCTURE = 'analyzeStructure',
  EXTRACT_DEMAND = 'extractDemand',
  OPTIMIZE = 'optimize',
  COMPARE = 'compare',
}

/**
 * Topology source shared by every topology tool: a file path or inline YAML, exactly one
 */
const TopologySourceShape = {
  topologyFile: z.string().min(1).optional(),
  topologyYaml: z.string().min(1).optional(),
};

function exactlyOneSource(args: { topologyFile?: string; topologyYaml?: string }): boolean {
  return (args.topologyFile === undefined) !== (args.topologyYaml === undefined);
}

const EXACTLY_ONE_SOURCE = {
  message: 'Provide exactly one of topologyFile or topologyYaml',
  path: ['topologyFile'],
};

export type TopologySource = { topologyFile?: string; topologyYaml?: string };

const DemandShape = {
  vcpus: z.number().nonnegative(),
  memoryGB: z.number().nonnegative(),
};

const PolicyShape = {
  highAvailability: z.boolean().optional().default(false),
  discounted: z.boolean().optional().default(false),
};

export const PerformancePrioritySchema = z.enum(['cost', 'performance', 'balanced']);
export const DeploymentOptionNameSchema = z.enum(['on-demand-standard', 'spot-standard', 'high-availability']);

/**
 * validate_topology / analyze_topology_structure arguments schema
 */
export const TopologySourceArgsSchema = z.object(TopologySourceShape).refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

export type TopologySourceArgs = z.infer<typeof TopologySourceArgsSchema>;

/**
 * repair_topology arguments schema
 */
export const RepairTopologyArgsSchema = z
  .object({
    ...TopologySourceShape,
    outputFile: z.string().min(1).optional(),
  })
  .refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

export type RepairTopologyArgs = z.infer<typeof RepairTopologyArgsSchema>;

/**
 * extract_resource_demand arguments schema; overheads override the configured ones
 */
export const ExtractResourceDemandArgsSchema = z
  .object({
    ...TopologySourceShape,
    overheadCpuPerNode: z.number().nonnegative().optional(),
    overheadMemoryGBPerNode: z.number().nonnegative().optional(),
  })
  .refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

export type ExtractResourceDemandArgs = z.infer<typeof ExtractResourceDemandArgsSchema>;

/**
 * optimize_deployment arguments schema
 */
export const OptimizeDeploymentArgsSchema = z.object({
  ...DemandShape,
  ...PolicyShape,
});

export type OptimizeDeploymentArgs = z.infer<typeof OptimizeDeploymentArgsSchema>;

/**
 * compare_deployment_options arguments schema
 */
export const CompareDeploymentOptionsArgsSchema = z.object(DemandShape);

export type CompareDeploymentOptionsArgs = z.infer<typeof CompareDeploymentOptionsArgsSchema>;

/**
 * get_pricing_information arguments schema
 */
export const GetPricingInformationArgsSchema = z.object({
  machineType: z.string().min(1).optional(),
});

export type GetPricingInformationArgs = z.infer<typeof GetPricingInformationArgsSchema>;

/**
 * complete_topology_analysis arguments schema
 */
export const CompleteTopologyAnalysisArgsSchema = z
  .object({
    ...TopologySourceShape,
    ...PolicyShape,
    repairIfBroken: z.boolean().optional().default(true),
    outputFile: z.string().min(1).optional(),
  })
  .refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

export type CompleteTopologyAnalysisArgs = z.infer<typeof CompleteTopologyAnalysisArgsSchema>;

/**
 * get_deployment_recommendations arguments schema
 */
export const GetDeploymentRecommendationsArgsSchema = z
  .object({
    ...TopologySourceShape,
    budget: z.number().positive().optional(),
    priority: PerformancePrioritySchema.optional().default('balanced'),
  })
  .refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

export type GetDeploymentRecommendationsArgs = z.infer<typeof GetDeploymentRecommendationsArgsSchema>;

/**
 * generate_deployment_commands arguments schema
 */
export const GenerateDeploymentCommandsArgsSchema = z
  .object({
    ...TopologySourceShape,
    option: DeploymentOptionNameSchema.optional(),
    budget: z.number().positive().optional(),
    priority: PerformancePrioritySchema.optional().default('balanced'),
    projectId: z.string().min(1).optional(),
    zone: z.string().regex(/^[a-z]+-[a-z]+\d+-[a-z]$/, 'Expected a zone such as us-east4-a').optional(),
    namePrefix: z
      .string()
      .regex(/^[a-z][-a-z0-9]{0,50}$/, 'Must start with a lowercase letter; lowercase letters, digits and hyphens only')
      .optional(),
  })
  .refine(exactlyOneSource, EXACTLY_ONE_SOURCE);

export type GenerateDeploymentCommandsArgs = z.infer<typeof GenerateDeploymentCommandsArgsSchema>;
