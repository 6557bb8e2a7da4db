/**
 * Unit tests for the topology reader
 */

import { describe, it, expect } from '@jest/globals';
import {
  nodeConfig,
  parseEndpoint,
  readComponents,
  readLinks,
  readResources,
  readTopology,
  scalarString,
} from './reader.js';
import { topology } from '../__tests__/utils.js';

describe('Topology Reader', () => {
  describe('scalarString', () => {
    it('should accept numbers and non-blank strings', () => {
      expect(scalarString(7750)).toBe('7750');
      expect(scalarString('ixrd3')).toBe('ixrd3');
      expect(scalarString('  ')).toBeUndefined();
      expect(scalarString(true)).toBeUndefined();
    });
  });

  describe('readResources', () => {
    it('should parse the compact form', () => {
      expect(readResources({ resources: '4cpu,8gb' }, 'topology.nodes.r1')).toEqual({
        block: { cpu: 4, memoryGB: 8 },
        issues: [],
      });
    });

    it('should prefer the resources block over node-level figures', () => {
      const reading = readResources({ resources: { cpu: 2 }, cpu: 8, memory: '16GB' });

      expect(reading.block).toEqual({ cpu: 2, memoryGB: 16 });
    });

    it('should report unparseable figures by field path', () => {
      expect(readResources({ resources: { cpu: 'lots' } }, 'topology.nodes.x')).toEqual({
        issues: ['topology.nodes.x.resources.cpu'],
      });
      expect(readResources({ resources: '4cpu,fast' }).issues).toEqual(['resources']);
    });

    it('should accept alternative keys', () => {
      expect(readResources({ resource: { cores: 3, ram: '2048Mi' } }).block).toEqual({ cpu: 3, memoryGB: 2 });
    });
  });

  describe('readComponents', () => {
    it('should read component lists and component-type keys', () => {
      expect(readComponents({ cpm: 2, components: [{ type: 'iom-e', count: 2 }] })).toEqual([
        { name: 'iom-e', type: 'iom-e', count: 2, components: [] },
        { name: 'cpm', type: 'cpm', count: 2, components: [] },
      ]);
    });

    it('should read named components with their own resources', () => {
      expect(readComponents({ sros: { 'cpm-a': { type: 'cpm', cpu: 3 } } })).toEqual([
        { name: 'cpm-a', type: 'cpm', count: 1, resources: { cpu: 3 }, components: [] },
      ]);
    });

    it('should read plain string entries', () => {
      expect(readComponents({ modules: ['sfm-1'] })).toEqual([
        { name: 'sfm-1', type: 'sfm-1', count: 1, components: [] },
      ]);
    });
  });

  describe('nodeConfig', () => {
    it('should read a bare string as the kind', () => {
      expect(nodeConfig('nokia_srlinux')).toEqual({ kind: 'nokia_srlinux' });
    });

    it('should read other non-mappings as empty', () => {
      expect(nodeConfig(null)).toEqual({});
      expect(nodeConfig(['a'])).toEqual({});
      expect(nodeConfig(undefined)).toEqual({});
    });
  });

  describe('readTopology', () => {
    it('should inherit kind, image and type from defaults and kinds', () => {
      const view = readTopology(
        topology(`topology:
  defaults:
    kind: nokia_srlinux
  kinds:
    nokia_srlinux:
      image: srl:latest
      type: ixrd3
  nodes:
    leaf1: {}
`)
      );

      expect(view.name).toBe('unnamed');
      expect(view.nodes).toEqual([
        {
          name: 'leaf1',
          kind: 'nokia_srlinux',
          image: 'srl:latest',
          type: 'ixrd3',
          components: [],
          resourceIssues: [],
        },
      ]);
    });

    it('should let node fields override inherited ones', () => {
      const view = readTopology(
        topology(`name: lab
topology:
  defaults:
    image: alpine
  nodes:
    h1:
      kind: linux
      image: ubuntu
`)
      );

      expect(view.name).toBe('lab');
      expect(view.nodes[0]?.image).toBe('ubuntu');
    });
  });

  describe('parseEndpoint', () => {
    it('should parse node:interface strings', () => {
      expect(parseEndpoint('srl1:e1-1')).toEqual({ node: 'srl1', interface: 'e1-1' });
      expect(parseEndpoint('a:b:c')).toEqual({ node: 'a', interface: 'b:c' });
    });

    it('should parse mapping endpoints', () => {
      expect(parseEndpoint({ node: 'a', interface: 'eth1' })).toEqual({ node: 'a', interface: 'eth1' });
      expect(parseEndpoint({ node: 'a' })).toBeUndefined();
    });

    it('should reject incomplete strings', () => {
      expect(parseEndpoint('srl1')).toBeUndefined();
      expect(parseEndpoint(':e1')).toBeUndefined();
      expect(parseEndpoint('srl1:')).toBeUndefined();
    });
  });

  describe('readLinks', () => {
    it('should skip malformed links and keep their indexes', () => {
      const links = readLinks(
        topology(`topology:
  nodes: {}
  links:
    - endpoints: ["a:e1", "b:e1"]
    - endpoints: ["a"]
    - junk
    - endpoints: ["a:e2", { node: c, interface: eth0 }]
`)
      );

      expect(links).toEqual([
        { index: 0, endpoints: [{ node: 'a', interface: 'e1' }, { node: 'b', interface: 'e1' }] },
        { index: 3, endpoints: [{ node: 'a', interface: 'e2' }, { node: 'c', interface: 'eth0' }] },
      ]);
    });
  });
});
