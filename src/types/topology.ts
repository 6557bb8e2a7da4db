/**
 * Topology document type definitions
 */

export type YamlScalar = string | number | boolean | null;
export type YamlValue = YamlScalar | YamlValue[] | YamlMapping;
export interface YamlMapping {
  [key: string]: YamlValue;
}

/**
 * Parsed topology file. Only the root is guaranteed to be a mapping,
 * everything below it is checked by the validator.
 */
export type TopologyDocument = YamlMapping;

export interface ResourceBlock {
  cpu?: number;
  memoryGB?: number;
}

export interface ComponentSpec {
  name: string;
  type: string;
  count: number;
  resources?: ResourceBlock;
  components: ComponentSpec[];
}

/**
 * A node with its kind, image and type resolved through kinds/defaults
 */
export interface NodeSpec {
  name: string;
  kind?: string;
  image?: string;
  type?: string;
  resources?: ResourceBlock;
  components: ComponentSpec[];
  /** Resource fields that were present but could not be parsed */
  resourceIssues: string[];
}

export interface LinkEndpoint {
  node: string;
  interface: string;
}

export interface LinkSpec {
  index: number;
  endpoints: LinkEndpoint[];
}

export interface TopologyView {
  name: string;
  nodes: NodeSpec[];
  links: LinkSpec[];
}

export type ViolationKind =
  | 'missing-topology-section'
  | 'missing-nodes-section'
  | 'missing-kind'
  | 'missing-image'
  | 'malformed-node'
  | 'malformed-links-section'
  | 'malformed-link'
  | 'unknown-link-endpoint';

export interface Violation {
  kind: ViolationKind;
  field: string;
  message: string;
}

export interface ValidationWarning {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  violations: Violation[];
  warnings: ValidationWarning[];
}

export interface RepairFix {
  readonly kind: ViolationKind;
  readonly field: string;
  readonly description: string;
}

export type RepairReport = readonly RepairFix[];

export interface RepairResult {
  document: TopologyDocument;
  report: RepairReport;
  before: ValidationResult;
  after: ValidationResult;
}

export interface MultiComponentNode {
  name: string;
  kind: string;
  componentCount: number;
  components: string[];
}

export interface StructureSummary {
  name: string;
  nodeCount: number;
  linkCount: number;
  nodesByKind: Record<string, number>;
  multiComponentNodes: MultiComponentNode[];
  valid: boolean;
  violations: Violation[];
  warnings: ValidationWarning[];
}
