import { describe, expect, it } from 'vitest';
import { computeTopologyLayers, groupByLayer } from './index.js';

const ids = (...names: string[]) => names.map((id) => ({ id }));

describe('computeTopologyLayers', () => {
  it('returns an empty result for an empty graph', () => {
    expect(computeTopologyLayers([], [])).toEqual({ layerAssignments: new Map(), layerCount: 0 });
  });

  it('puts independent parameters in layer 0', () => {
    const result = computeTopologyLayers(ids('SWH', 'DW', 'RG'), []);
    expect(result.layerCount).toBe(1);
    expect(Array.from(result.layerAssignments.values())).toEqual([0, 0, 0]);
  });

  it('places each parameter one layer below its deepest input', () => {
    // SWH -> AQ -> D[3], and SWH -> D[3] directly
    const nodes = ids('SWH', 'AQ', 'D[3]');
    const edges = [
      { from: 'SWH', to: 'AQ' },
      { from: 'SWH', to: 'D[3]' },
      { from: 'AQ', to: 'D[3]' },
    ];
    const result = computeTopologyLayers(nodes, edges);
    expect(result.layerAssignments).toEqual(
      new Map([
        ['SWH', 0],
        ['AQ', 1],
        ['D[3]', 2],
      ]),
    );
    expect(result.layerCount).toBe(3);
  });

  it('ignores edges to unknown nodes and repeated edges', () => {
    const edges = [
      { from: 'SW', to: 'SWH' },
      { from: 'SW', to: 'SWH' },
      { from: 'SW', to: 'SFO1' },
      { from: 'TD', to: 'SWH' },
    ];
    const result = computeTopologyLayers(ids('SW', 'SWH'), edges);
    expect(result.layerCount).toBe(2);
    expect(result.layerAssignments.get('SWH')).toBe(1);
  });

  it('parks cycle members in layer 0', () => {
    const result = computeTopologyLayers(ids('A', 'X', 'Y'), [
      { from: 'A', to: 'X' },
      { from: 'X', to: 'Y' },
      { from: 'Y', to: 'X' },
    ]);
    expect(result.layerAssignments.get('A')).toBe(0);
    expect(result.layerAssignments.get('X')).toBe(0);
    expect(result.layerAssignments.get('Y')).toBe(0);
  });

  it('keeps a node with a self edge in layer 0', () => {
    expect(computeTopologyLayers(ids('A'), [{ from: 'A', to: 'A' }]).layerAssignments.get('A')).toBe(0);
  });
});

describe('groupByLayer', () => {
  it('groups ids by layer in input order', () => {
    const nodes = ids('SWH', 'DW', 'AQ', 'D[3]');
    const edges = [
      { from: 'SWH', to: 'AQ' },
      { from: 'AQ', to: 'D[3]' },
    ];
    expect(groupByLayer(nodes, computeTopologyLayers(nodes, edges))).toEqual([['SWH', 'DW'], ['AQ'], ['D[3]']]);
  });
});
