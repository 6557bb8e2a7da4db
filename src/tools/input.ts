/**
 * Topology input and output for tools
 */

import { parseTopology, readTopologyFile, serializeTopology, writeTopologyFile } from '../topology/document.js';
import { ErrorCode, ToolError } from '../errors/index.js';
import type { ToolContext } from './context.js';
import type { TopologySource } from '../types/tools.js';
import type { TopologyDocument } from '../types/topology.js';

export interface LoadedTopology {
  document: TopologyDocument;
  /** File path, or "inline" for YAML passed in the call */
  source: string;
}

/**
 * Read the topology named by `topologyFile` or parse `topologyYaml`
 */
export async function loadTopology(args: TopologySource): Promise<LoadedTopology> {
  if (args.topologyFile !== undefined) {
    return { document: await readTopologyFile(args.topologyFile), source: args.topologyFile };
  }
  if (args.topologyYaml !== undefined) {
    return { document: parseTopology(args.topologyYaml, 'inline'), source: 'inline' };
  }
  throw new ToolError('Provide exactly one of topologyFile or topologyYaml', ErrorCode.TOOL_INVALID_INPUT);
}

export interface SavedTopology {
  repairedYaml: string;
  outputFile?: string;
}

/**
 * Serialize a repaired document and write it to `outputFile` when one is given
 */
export async function saveRepairedTopology(
  document: TopologyDocument,
  outputFile: string | undefined,
  context: ToolContext
): Promise<SavedTopology> {
  const repairedYaml = serializeTopology(document);
  if (outputFile === undefined) {
    return { repairedYaml };
  }

  if (!context.analysis.writeRepairedFiles) {
    throw new ToolError('Writing repaired topology files is disabled by configuration', ErrorCode.TOOL_INVALID_INPUT, {
      outputFile,
    });
  }

  await writeTopologyFile(outputFile, document);
  context.logger.info('Repaired topology written', { outputFile });
  return { repairedYaml, outputFile };
}
