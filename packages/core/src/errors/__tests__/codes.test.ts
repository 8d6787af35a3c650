import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode, type Severity } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    const mappedCodes = Object.keys(EXIT_CODES);
    expect(mappedCodes.length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are within valid 1-255 range', () => {
    for (const exit of Object.values(EXIT_CODES)) {
      expect(exit).toBeGreaterThanOrEqual(1);
      expect(exit).toBeLessThanOrEqual(255);
    }
  });

  test('getExitCode reads the table', () => {
    expect(getExitCode(ErrorCode.CONFIGURATION_ERROR)).toBe(50);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });

  test('Severity type is exported and constrained', () => {
    const sev: Severity = 'error';
    expect(sev).toBe('error');
  });
});
