import { describe, it, expect } from 'vitest';
import { coerceScalar, flattenConfiguration } from '../ConfigurationFlattener.js';

describe('coerceScalar', () => {
  it('converts Alteryx booleans', () => {
    expect(coerceScalar('True')).toBe(true);
    expect(coerceScalar('False')).toBe(false);
    expect(coerceScalar('true')).toBe('true');
  });

  it('converts numbers that print back unchanged', () => {
    expect(coerceScalar('42')).toBe(42);
    expect(coerceScalar('-1.5')).toBe(-1.5);
  });

  it('keeps other text as strings', () => {
    expect(coerceScalar('007')).toBe('007');
    expect(coerceScalar('1e3')).toBe('1e3');
    expect(coerceScalar('NaN')).toBe('NaN');
    expect(coerceScalar('Infinity')).toBe('Infinity');
    expect(coerceScalar(' ')).toBe(' ');
    expect(coerceScalar('')).toBe('');
  });
});

describe('flattenConfiguration', () => {
  it('flattens elements, attributes and repeated elements into paths', () => {
    const configuration = flattenConfiguration({
      Mode: 'Simple',
      Fields: {
        Field: [
          { '@_name': 'Amount', '@_selected': 'True' },
          { '@_name': 'Region', '@_selected': 'False' },
        ],
      },
    });

    expect(configuration).toEqual({
      Mode: 'Simple',
      'Fields.Field[0]@name': 'Amount',
      'Fields.Field[0]@selected': true,
      'Fields.Field[1]@name': 'Region',
      'Fields.Field[1]@selected': false,
    });
  });

  it('keeps text beside child elements under #text', () => {
    expect(flattenConfiguration({ Expression: { '@_type': 'sql', '#text': '[A] > 1', Alias: 'big' } })).toEqual({
      'Expression@type': 'sql',
      'Expression#text': '[A] > 1',
      'Expression.Alias': 'big',
    });
  });

  it('stores text of a leaf element with attributes under its own path', () => {
    expect(flattenConfiguration({ File: { '@_FileFormat': '19', '#text': 'orders.yxdb' } })).toEqual({
      'File@FileFormat': 19,
      File: 'orders.yxdb',
    });
  });

  it('stores root text under #text', () => {
    expect(flattenConfiguration('raw')).toEqual({ '#text': 'raw' });
  });

  it('is empty for a missing or empty configuration', () => {
    expect(flattenConfiguration(undefined)).toEqual({});
    expect(flattenConfiguration('')).toEqual({});
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(flattenConfiguration({ Mode: 'Custom' }))).toBe(true);
  });
});
