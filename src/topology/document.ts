/**
 * Topology document parsing, serialization and copying
 */

import { readFile, writeFile } from 'fs/promises';
import * as yaml from 'js-yaml';
import { ParseError, ErrorCode, toError } from '../errors/index.js';
import type { TopologyDocument, YamlMapping, YamlValue } from '../types/topology.js';

export function isMapping(value: YamlValue | undefined): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set `key` as an own property, including keys such as `__proto__`
 * that plain assignment would route to the prototype
 */
export function setOwn(mapping: YamlMapping, key: string, value: YamlValue): void {
  Object.defineProperty(mapping, key, { value, enumerable: true, writable: true, configurable: true });
}

// Upper bound on values produced while expanding aliases
const MAX_YAML_VALUES = 100_000;

interface Conversion {
  ancestors: Set<object>;
  remaining: number;
}

function toYamlValue(value: unknown, path: string, state: Conversion): YamlValue {
  state.remaining -= 1;
  if (state.remaining < 0) {
    throw new ParseError(`Topology document expands to more than ${MAX_YAML_VALUES} values`, { path });
  }
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'object') {
    throw new ParseError(`Unsupported YAML value at ${path || 'document root'}`, { path });
  }
  if (state.ancestors.has(value)) {
    throw new ParseError(`Recursive alias at ${path || 'document root'}`, { path });
  }

  state.ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item, index) => toYamlValue(item, `${path}[${index}]`, state));
    }
    const mapping: YamlMapping = {};
    for (const [key, item] of Object.entries(value)) {
      setOwn(mapping, key, toYamlValue(item, path ? `${path}.${key}` : key, state));
    }
    return mapping;
  } finally {
    state.ancestors.delete(value);
  }
}

/**
 * Parse topology YAML text. Timestamps stay strings and duplicate keys are rejected.
 */
export function parseTopology(text: string, source = 'inline'): TopologyDocument {
  let loaded: unknown;
  try {
    loaded = yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: source });
  } catch (error) {
    const cause = toError(error);
    throw new ParseError(`Invalid topology YAML in ${source}: ${cause.message}`, { source }, cause);
  }

  const document = toYamlValue(loaded ?? null, '', { ancestors: new Set(), remaining: MAX_YAML_VALUES });
  if (!isMapping(document)) {
    throw new ParseError(`Topology document ${source} must be a YAML mapping`, {
      source,
      rootType: Array.isArray(document) ? 'list' : document === null ? 'empty' : typeof document,
    });
  }
  return document;
}

/**
 * Serialize a topology document back to YAML, preserving key order
 */
export function serializeTopology(document: TopologyDocument): string {
  return yaml.dump(document, { lineWidth: -1, noRefs: true });
}

function cloneValue(value: YamlValue): YamlValue {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isMapping(value)) {
    return cloneDocument(value);
  }
  return value;
}

/**
 * Deep copy of a document; analysis never mutates its input
 */
export function cloneDocument(document: YamlMapping): YamlMapping {
  const copy: YamlMapping = {};
  for (const [key, value] of Object.entries(document)) {
    setOwn(copy, key, cloneValue(value));
  }
  return copy;
}

/**
 * Read and parse a topology file
 */
export async function readTopologyFile(path: string): Promise<TopologyDocument> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const cause = toError(error);
    throw new ParseError(
      `Failed to read topology file ${path}: ${cause.message}`,
      { path },
      cause,
      ErrorCode.TOPOLOGY_READ_ERROR
    );
  }
  return parseTopology(text, path);
}

/**
 * Serialize a document and write it to disk
 */
export async function writeTopologyFile(path: string, document: TopologyDocument): Promise<void> {
  try {
    await writeFile(path, serializeTopology(document), 'utf-8');
  } catch (error) {
    const cause = toError(error);
    throw new ParseError(
      `Failed to write topology file ${path}: ${cause.message}`,
      { path },
      cause,
      ErrorCode.TOPOLOGY_WRITE_ERROR
    );
  }
}
