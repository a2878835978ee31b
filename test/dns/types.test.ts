import { describe, it, expect } from 'vitest';
import { QUERY_TYPES, isQueryType, parseQueryType } from '../../src/dns/types.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('query types', () => {
  it('should parse types case-insensitively', () => {
    expect(parseQueryType('aaaa')).toBe('AAAA');
    expect(parseQueryType('Mx')).toBe('MX');
  });

  it('should know the zone transfer types', () => {
    expect(isQueryType('AXFR')).toBe(true);
    expect(isQueryType('IXFR')).toBe(true);
    expect(QUERY_TYPES).toContain('SOA');
  });

  it('should reject unknown types with the list of known ones', () => {
    expect(() => parseQueryType('BOGUS')).toThrow('Unknown record type: BOGUS');
    try {
      parseQueryType('BOGUS');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err instanceof ConfigurationError && err.suggestions[0]).toMatch(/^Use one of: A, AAAA, AXFR/);
    }
  });
});
