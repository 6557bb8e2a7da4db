/**
 * Unit tests for the topology structure analyzer
 */

import { describe, it, expect } from '@jest/globals';
import { analyzeStructure, countComponents } from './structure.js';
import { topology, VALID_TOPOLOGY_YAML, BROKEN_TOPOLOGY_YAML } from '../__tests__/utils.js';

const CHASSIS_YAML = `name: chassis
topology:
  nodes:
    pe1:
      kind: nokia_sros
      image: ghcr.io/nokia/sros
      components:
        - slot: A
          type: cpm2
        - slot: 1
          type: iom-1
          count: 2
          components:
            - type: me6-100gb-qsfp28
              count: 2
    ce1:
      kind: linux
      image: alpine
  links:
    - endpoints: ["pe1:1/1/1", "ce1:eth1"]
`;

describe('Structure Analyzer', () => {
  it('should summarise a valid topology', () => {
    const summary = analyzeStructure(topology(VALID_TOPOLOGY_YAML));

    expect(summary).toEqual({
      name: 'lab',
      nodeCount: 3,
      linkCount: 2,
      nodesByKind: { nokia_srlinux: 2, linux: 1 },
      multiComponentNodes: [],
      valid: true,
      violations: [],
      warnings: [],
    });
  });

  it('should report multi-component nodes with nested counts', () => {
    const summary = analyzeStructure(topology(CHASSIS_YAML));

    expect(summary.multiComponentNodes).toEqual([
      { name: 'pe1', kind: 'nokia_sros', componentCount: 7, components: ['A', '1 x2'] },
    ]);
  });

  it('should report violations without changing the document', () => {
    const doc = topology(BROKEN_TOPOLOGY_YAML);
    const summary = analyzeStructure(doc);

    expect(summary.valid).toBe(false);
    expect(summary.nodeCount).toBe(0);
    expect(summary.violations.map(v => v.kind)).toEqual(['missing-topology-section']);
    expect(doc).toEqual(topology(BROKEN_TOPOLOGY_YAML));
  });

  it('should count unnamed kinds as unknown', () => {
    const summary = analyzeStructure(topology('topology:\n  nodes:\n    a: {}\n    b: frr\n'));

    expect(summary.nodesByKind).toEqual({ unknown: 1, frr: 1 });
    expect(summary.linkCount).toBe(0);
  });

  it('should count kinds named after object prototype members', () => {
    const summary = analyzeStructure(
      topology('topology:\n  nodes:\n    a: {kind: constructor}\n    b: {kind: toString}\n    c: {kind: constructor}\n')
    );

    expect(summary.nodesByKind).toEqual({ constructor: 2, toString: 1 });
  });

  describe('countComponents', () => {
    it('should multiply nested components by their parent count', () => {
      expect(
        countComponents([
          { name: 'iom', type: 'iom', count: 2, components: [{ name: 'mda', type: 'mda', count: 3, components: [] }] },
        ])
      ).toBe(8);
    });
  });
});
