import { describe, it, expect, expectTypeOf } from 'vitest';
import { TopologicalSorter } from '../TopologicalSorter.js';
import { GraphBuilder } from '../GraphBuilder.js';
import { CycleDetectedError, ScopeError } from '../../errors/WorkflowError.js';
import { GraphErrorCode } from '../../errors/ErrorCodes.js';
import { graphOf, link, thrownBy, tool } from './fixtures.js';
import type { ToolScope, WorkflowGraph } from '../../types/graph-types.js';

function expectValidOrder(graph: WorkflowGraph, order: string[]): void {
  expect([...order].sort()).toEqual([...graph.nodes.keys()].sort());
  for (const connection of graph.connections) {
    expect(order.indexOf(connection.sourceId)).toBeLessThan(order.indexOf(connection.targetId));
  }
}

describe('TopologicalSorter', () => {
  describe('sequence', () => {
    it('orders unconnected tools by ascending id', () => {
      expect(TopologicalSorter.sequence(graphOf(['1', '2', '3']))).toEqual(['1', '2', '3']);
    });

    it('compares ids numerically', () => {
      expect(TopologicalSorter.sequence(graphOf(['10', '9', '2']))).toEqual(['2', '9', '10']);
    });

    it('emits the smallest ready tool first', () => {
      const graph = graphOf(['1', '2', '3', '4', '5'], ['5>1', '3>2']);

      expect(TopologicalSorter.sequence(graph)).toEqual(['3', '2', '4', '5', '1']);
    });

    it('places every tool after its upstream tools', () => {
      const graph = graphOf(
        ['1', '2', '3', '4', '5', '6', '7', '8'],
        ['8>1', '7>2', '1>2', '2>3', '6>3', '3>4', '5>4']
      );

      expectValidOrder(graph, TopologicalSorter.sequence(graph));
    });

    it('does not depend on input order', () => {
      const nodes = ['4', '1', '3', '2'].map((id) => tool(id));
      const connections = [link('1', '3'), link('2', '3'), link('3', '4')];

      const forward = TopologicalSorter.sequence(GraphBuilder.build(nodes, connections));
      const reversed = TopologicalSorter.sequence(
        GraphBuilder.build([...nodes].reverse(), [...connections].reverse())
      );

      expect(forward).toEqual(['1', '2', '3', '4']);
      expect(reversed).toEqual(forward);
    });

    it('counts parallel connections once each', () => {
      expect(TopologicalSorter.sequence(graphOf(['2', '1'], ['1>2', '1>2']))).toEqual(['1', '2']);
    });

    it('returns an empty order for an empty graph', () => {
      expect(TopologicalSorter.sequence(graphOf([]))).toEqual([]);
    });

    it('throws with every tool on the cycle', () => {
      const error = thrownBy(
        () => TopologicalSorter.sequence(graphOf(['1', '2', '3'], ['1>2', '2>3', '3>1'])),
        CycleDetectedError
      );

      expect([...error.nodeIds]).toEqual(['1', '2', '3']);
      expect(error.cyclePath).toEqual(['1', '2', '3', '1']);
      expect(error.code).toBe(GraphErrorCode.VALIDATION_CYCLE_DETECTED);
      expect(error.message).toBe('Circular connection detected: 1 → 2 → 3 → 1');
    });

    it('leaves tools downstream of a cycle out of the error', () => {
      const graph = graphOf(['1', '2', '3', '4', '5'], ['1>2', '2>3', '3>2', '3>4']);
      const error = thrownBy(() => TopologicalSorter.sequence(graph), CycleDetectedError);

      expect([...error.nodeIds]).toEqual(['2', '3']);
      expect(error.cyclePath).toEqual(['2', '3', '2']);
    });

    it('treats a self-loop as a cycle', () => {
      const error = thrownBy(
        () => TopologicalSorter.sequence(graphOf(['1', '2'], ['1>1', '1>2'])),
        CycleDetectedError
      );

      expect([...error.nodeIds]).toEqual(['1']);
      expect(error.cyclePath).toEqual(['1', '1']);
    });

    describe('with a scope', () => {
      it('orders only the tools in scope', () => {
        const graph = graphOf(['1', '2', '3'], ['1>2', '2>3']);

        expect(TopologicalSorter.sequence(graph, ['3', '1'])).toEqual(['1', '3']);
      });

      it('ignores connections leaving the scope', () => {
        const graph = graphOf(['1', '2', '3'], ['3>1', '2>3']);

        expect(TopologicalSorter.sequence(graph, ['1', '2'])).toEqual(['1', '2']);
      });

      it('ignores a cycle that the scope cuts', () => {
        const graph = graphOf(['1', '2', '3'], ['1>2', '2>3', '3>1']);

        expect(TopologicalSorter.sequence(graph, ['1', '2'])).toEqual(['1', '2']);
      });

      it('ignores ids that are not tools', () => {
        expect(TopologicalSorter.sequence(graphOf(['1', '2']), ['2', '99'])).toEqual(['2']);
      });

      it('rejects unknown ids in strict mode', () => {
        const error = thrownBy(
          () => TopologicalSorter.sequence(graphOf(['1', '2']), ['2', '99', '98', '99'], { strict: true }),
          ScopeError
        );

        expect(error.unknownIds).toEqual(['98', '99']);
        expect(error.code).toBe(GraphErrorCode.VALIDATION_UNKNOWN_SCOPE_ID);
      });

      it('matches scope ids whole, from an array or a set', () => {
        const graph = graphOf(['1', '2', '12'], ['1>12']);

        expect(TopologicalSorter.sequence(graph, ['12'])).toEqual(['12']);
        expect(TopologicalSorter.sequence(graph, new Set(['12', '1']))).toEqual(['1', '12']);
        expectTypeOf<string>().not.toMatchTypeOf<ToolScope>();
      });

      it('returns an empty order for an empty scope', () => {
        expect(TopologicalSorter.sequence(graphOf(['1', '2']), [])).toEqual([]);
      });
    });
  });

  describe('phases', () => {
    it('groups tools by longest upstream path', () => {
      const result = TopologicalSorter.phases(graphOf(['1', '2', '3', '4'], ['1>2', '2>3', '4>3']));

      expect(result.phases).toEqual([['1', '4'], ['2'], ['3']]);
      expect(result.phaseCount).toBe(3);
      expect(result.toolPhases.get('3')).toBe(2);
      expect(result.toolPhases.get('4')).toBe(0);
    });

    it('sorts each phase by id', () => {
      const result = TopologicalSorter.phases(graphOf(['1', '12', '3', '2'], ['1>12', '1>3', '1>2']));

      expect(result.phases).toEqual([['1'], ['2', '3', '12']]);
    });

    it('respects the scope', () => {
      const result = TopologicalSorter.phases(graphOf(['1', '2', '3'], ['1>2', '2>3']), ['1', '3']);

      expect(result.phases).toEqual([['1', '3']]);
    });

    it('throws on a cycle', () => {
      const error = thrownBy(
        () => TopologicalSorter.phases(graphOf(['1', '2'], ['1>2', '2>1'])),
        CycleDetectedError
      );

      expect([...error.nodeIds]).toEqual(['1', '2']);
    });
  });
});
