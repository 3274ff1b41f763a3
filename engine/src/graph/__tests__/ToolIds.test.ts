import { describe, it, expect } from 'vitest';
import { adjustOrder, compareToolIds, parseToolIdList, sortToolIds } from '../ToolIds.js';

describe('ToolIds', () => {
  describe('compareToolIds', () => {
    it('orders integer ids numerically', () => {
      expect(sortToolIds(['10', '9', '2', '1'])).toEqual(['1', '2', '9', '10']);
    });

    it('puts integer ids before other ids', () => {
      expect(sortToolIds(['a', '10', 'B', '2'])).toEqual(['2', '10', 'B', 'a']);
    });

    it('treats zero-padded ids as text', () => {
      expect(sortToolIds(['10', '007', '2'])).toEqual(['2', '10', '007']);
    });

    it('returns 0 for equal ids', () => {
      expect(compareToolIds('42', '42')).toBe(0);
    });
  });

  describe('adjustOrder', () => {
    it('orders ids by sequence position', () => {
      expect(adjustOrder(['7', '2', '5'], ['2', '5', '7'])).toEqual(['2', '5', '7']);
    });

    it('puts ids missing from the sequence last in input order', () => {
      expect(adjustOrder(['99', '7', '2', '98'], ['2', '5', '7'])).toEqual(['2', '7', '99', '98']);
    });

    it('drops repeated ids', () => {
      expect(adjustOrder(['7', '7', 'x', '2', 'x'], ['2', '7'])).toEqual(['2', '7', 'x']);
    });
  });

  describe('parseToolIdList', () => {
    it('strips brackets and quotes', () => {
      expect(parseToolIdList(`[644, '645', "646"]`)).toEqual(['644', '645', '646']);
    });

    it('accepts a plain comma list', () => {
      expect(parseToolIdList('3,7 , 12')).toEqual(['3', '7', '12']);
    });

    it('drops empty entries', () => {
      expect(parseToolIdList(' , ,')).toEqual([]);
    });
  });
});
