import { describe, it, expect } from 'vitest';
import { GraphTraversal } from '../GraphTraversal.js';
import { GraphBuilder } from '../GraphBuilder.js';
import { graphOf, link, tool } from './fixtures.js';

// 1 → 2 ⇉ (3, 4) → 5 → 6
const branching = GraphBuilder.build(
  [tool('1', 'Input'), tool('2'), tool('3', 'Formula'), tool('4', 'Formula'), tool('5', 'Join'), tool('6', 'Output')],
  [
    link('1', '2'),
    link('2', '3', 'True'),
    link('2', '4', 'False'),
    link('3', '5', undefined, 'Left'),
    link('4', '5', undefined, 'Right'),
    link('5', '6', 'Join'),
  ]
);

describe('GraphTraversal', () => {
  it('lists neighbours in connection order', () => {
    expect(GraphTraversal.nextTools(branching, '2')).toEqual(['3', '4']);
    expect(GraphTraversal.previousTools(branching, '5')).toEqual(['3', '4']);
    expect(GraphTraversal.nextTools(branching, '6')).toEqual([]);
  });

  it('lists a neighbour once for parallel connections', () => {
    const graph = GraphBuilder.build([tool('1'), tool('2')], [link('1', '2', 'True'), link('1', '2', 'False')]);

    expect(GraphTraversal.nextTools(graph, '1')).toEqual(['2']);
  });

  describe('frame names', () => {
    it('names one frame per output anchor', () => {
      expect(GraphTraversal.outputFrameNames(branching, '2')).toEqual(['df_2_True', 'df_2_False']);
      expect(GraphTraversal.outputFrameNames(branching, '1')).toEqual(['df_1_Output']);
      expect(GraphTraversal.outputFrameNames(branching, '6')).toEqual([]);
    });

    it('pairs input frames with the anchors they feed', () => {
      expect(GraphTraversal.inputFrameNames(branching, '5')).toEqual([
        { frameName: 'df_3_Output', inputPort: 'Left' },
        { frameName: 'df_4_Output', inputPort: 'Right' },
      ]);
      expect(GraphTraversal.inputFrameNames(branching, '2')).toEqual([
        { frameName: 'df_1_Output', inputPort: 'Input' },
      ]);
    });
  });

  describe('linearChains', () => {
    it('returns a single chain for a straight pipeline', () => {
      expect(GraphTraversal.linearChains(graphOf(['1', '2', '3'], ['1>2', '2>3']))).toEqual([['1', '2', '3']]);
    });

    it('breaks chains at branches and merges', () => {
      expect(GraphTraversal.linearChains(branching)).toEqual([
        ['1', '2'],
        ['2', '3', '5'],
        ['2', '4', '5'],
        ['5', '6'],
      ]);
    });

    it('stops once a cycle returns to its start', () => {
      expect(GraphTraversal.linearChains(graphOf(['1', '2', '3'], ['1>2', '2>3', '3>1']))).toEqual([
        ['1', '2', '3', '1'],
      ]);
    });
  });

  describe('toolsWithoutInput', () => {
    it('returns connected tools that receive nothing', () => {
      expect(GraphTraversal.toolsWithoutInput(branching)).toEqual(['1']);
    });

    it('skips tools without any connection', () => {
      expect(GraphTraversal.toolsWithoutInput(graphOf(['1', '2', '3'], ['2>3']))).toEqual(['2']);
    });
  });
});
