import { describe, it, expect } from 'vitest';
import { ChildResolver } from '../ChildResolver.js';
import { GraphBuilder } from '../GraphBuilder.js';
import { ContainerCycleError } from '../../errors/WorkflowError.js';
import { GraphErrorCode } from '../../errors/ErrorCodes.js';
import { thrownBy, tool } from './fixtures.js';

const nested = GraphBuilder.build(
  [
    tool('1', 'Input'),
    tool('10', 'ToolContainer'),
    tool('11', 'ToolContainer', '10'),
    tool('12', 'Filter', '11'),
    tool('13', 'BrowseV2', '10'),
    tool('14', 'Filter', '10'),
  ],
  []
);

describe('ChildResolver', () => {
  describe('childrenOf', () => {
    it('returns direct and transitive children of nested containers', () => {
      const graph = GraphBuilder.build(
        [tool('10', 'ToolContainer'), tool('11', 'ToolContainer', '10'), tool('12', 'Filter', '11')],
        []
      );

      expect([...ChildResolver.childrenOf(graph, '10', false)]).toEqual(['11']);
      expect([...ChildResolver.childrenOf(graph, '10', true)]).toEqual(['11', '12']);
    });

    it('lists direct children in ascending order', () => {
      expect([...ChildResolver.childrenOf(nested, '10', false)]).toEqual(['11', '13', '14']);
    });

    it('includes every tool type in the transitive closure', () => {
      expect([...ChildResolver.childrenOf(nested, '10', true)]).toEqual(['11', '12', '13', '14']);
    });

    it('is empty for an unknown container', () => {
      expect(ChildResolver.childrenOf(nested, '999', false).size).toBe(0);
      expect(ChildResolver.childrenOf(nested, '999', true).size).toBe(0);
    });

    it('is empty for a tool with no children', () => {
      expect(ChildResolver.childrenOf(nested, '1', true).size).toBe(0);
    });

    it('rejects a container holding itself', () => {
      const graph = GraphBuilder.build([tool('5', 'ToolContainer', '5')], []);
      const error = thrownBy(() => ChildResolver.childrenOf(graph, '5', true), ContainerCycleError);

      expect(error.containerId).toBe('5');
      expect(error.cyclePath).toEqual(['5', '5']);
      expect(error.code).toBe(GraphErrorCode.VALIDATION_CONTAINER_CYCLE);
    });

    it('answers a direct lookup on a self-contained container', () => {
      const graph = GraphBuilder.build([tool('5', 'ToolContainer', '5')], []);

      expect([...ChildResolver.childrenOf(graph, '5', false)]).toEqual(['5']);
    });

    it('rejects containers holding each other', () => {
      const graph = GraphBuilder.build(
        [tool('20', 'ToolContainer', '21'), tool('21', 'ToolContainer', '20')],
        []
      );
      const error = thrownBy(() => ChildResolver.childrenOf(graph, '20', true), ContainerCycleError);

      expect(error.cyclePath).toEqual(['20', '21', '20']);
      expect(error.message).toBe('Container "20" contains itself: 20 ⊃ 21 ⊃ 20');
    });
  });

  describe('childToolsOf', () => {
    it('leaves out containers and browse tools by default', () => {
      expect(ChildResolver.childToolsOf(nested, '10')).toEqual(['12', '14']);
    });

    it('keeps every type with an empty exclusion list', () => {
      expect(ChildResolver.childToolsOf(nested, '10', { excludeTypes: [] })).toEqual(['11', '12', '13', '14']);
    });

    it('matches excluded types case-insensitively', () => {
      expect(ChildResolver.childToolsOf(nested, '10', { excludeTypes: ['toolcontainer'] })).toEqual([
        '12',
        '13',
        '14',
      ]);
    });
  });

  describe('expandSelection', () => {
    it('replaces containers with their child tools and drops duplicates', () => {
      expect(ChildResolver.expandSelection(nested, ['1', '10', '14', '12'])).toEqual(['1', '12', '14']);
    });

    it('keeps ids that are not containers', () => {
      expect(ChildResolver.expandSelection(nested, ['14', '99'])).toEqual(['14', '99']);
    });
  });

  describe('containerAncestors', () => {
    it('lists enclosing containers innermost first', () => {
      expect(ChildResolver.containerAncestors(nested, '12')).toEqual(['11', '10']);
    });

    it('is empty for a top-level or unknown tool', () => {
      expect(ChildResolver.containerAncestors(nested, '1')).toEqual([]);
      expect(ChildResolver.containerAncestors(nested, '999')).toEqual([]);
    });

    it('rejects a looping containment chain', () => {
      const graph = GraphBuilder.build([tool('5', 'ToolContainer', '5')], []);
      const error = thrownBy(() => ChildResolver.containerAncestors(graph, '5'), ContainerCycleError);

      expect(error.cyclePath).toEqual(['5', '5']);
    });
  });
});
