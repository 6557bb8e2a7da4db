/**
 * Topology validation, repair and structure tools
 */

import { validate } from '../validators/topology.js';
import { repair } from '../validators/repair.js';
import { analyzeStructure } from '../analyzers/structure.js';
import { loadTopology, saveRepairedTopology } from './input.js';
import { failureResponse, jsonResponse } from './response.js';
import type { ToolContext } from './context.js';
import type { RepairTopologyArgs, ToolCallResponse, TopologySourceArgs } from '../types/tools.js';

/**
 * Validate a topology and list its violations
 */
export async function validateTopologyTool(args: TopologySourceArgs, context: ToolContext): Promise<ToolCallResponse> {
  try {
    const { document, source } = await loadTopology(args);
    const result = validate(document);
    context.logger.debug('Topology validated', { source, valid: result.valid });

    return jsonResponse({
      source,
      valid: result.valid,
      violationCount: result.violations.length,
      violations: result.violations,
      warnings: result.warnings,
    });
  } catch (error) {
    return failureResponse('validate topology', error);
  }
}

/**
 * Repair a topology, returning the fixed YAML and the applied fixes
 */
export async function repairTopologyTool(args: RepairTopologyArgs, context: ToolContext): Promise<ToolCallResponse> {
  try {
    const { document, source } = await loadTopology(args);
    const result = repair(document);
    const saved = await saveRepairedTopology(result.document, args.outputFile, context);

    if (result.report.length > 0) {
      context.logger.info('Topology repaired', { source, fixes: result.report.length });
    }

    return jsonResponse({
      source,
      action: result.report.length > 0 ? 'repaired' : 'unchanged',
      fixCount: result.report.length,
      fixes: result.report,
      valid: result.after.valid,
      remainingViolations: result.after.violations,
      warnings: result.after.warnings,
      outputFile: saved.outputFile,
      repairedYaml: saved.repairedYaml,
    });
  } catch (error) {
    return failureResponse('repair topology', error);
  }
}

/**
 * Summarise nodes, links and multi-component nodes of a topology
 */
export async function analyzeTopologyStructureTool(
  args: TopologySourceArgs,
  _context: ToolContext
): Promise<ToolCallResponse> {
  try {
    const { document, source } = await loadTopology(args);
    return jsonResponse({ source, ...analyzeStructure(document) });
  } catch (error) {
    return failureResponse('analyze topology structure', error);
  }
}
