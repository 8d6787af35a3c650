import { describe, it, expect } from 'vitest';
/**
 * Tests for the error hierarchy and ErrorList
 */

import {
  ConfigurationError,
  ErrorList,
  FeatureError,
  GenerationError,
  RefResolutionError,
  SchemaError,
  isTranslationError,
} from '../errors.js';
import { ErrorCode, getExitCode } from '../../errors/codes.js';

describe('Error Hierarchy', () => {
  describe('defaults', () => {
    it('gives each class its default code', () => {
      expect(new SchemaError({ message: 'm' }).errorCode).toBe(ErrorCode.INVALID_KEYWORD_VALUE);
      expect(new RefResolutionError({ message: 'm' }).errorCode).toBe(ErrorCode.INVALID_REFERENCE);
      expect(new FeatureError({ message: 'm' }).errorCode).toBe(ErrorCode.UNSUPPORTED_FEATURE);
      expect(new GenerationError({ message: 'm' }).errorCode).toBe(ErrorCode.GENERATION_FAILED);
      expect(new ConfigurationError({ message: 'm' }).errorCode).toBe(
        ErrorCode.CONFIGURATION_ERROR
      );
    });

    it('names errors after their class', () => {
      const error = new SchemaError({ message: 'bad', errorCode: ErrorCode.INVALID_REGEX });

      expect(error.name).toBe('SchemaError');
      expect(error.severity).toBe('error');
      expect(error.errorCode).toBe(ErrorCode.INVALID_REGEX);
      expect(error).toBeInstanceOf(Error);
      expect(isTranslationError(error)).toBe(true);
      expect(isTranslationError(new Error('plain'))).toBe(false);
    });
  });

  describe('locations', () => {
    it('prefixes the message with the pointer as a fragment', () => {
      const error = new SchemaError({ message: 'invalid uint', context: { pointer: '/minLength' } });

      expect(error.location).toBe('#/minLength');
      expect(error.describe()).toBe('#/minLength: invalid uint');
    });

    it('uses # for the document root and nothing without a pointer', () => {
      expect(new SchemaError({ message: 'm', context: { pointer: '' } }).describe()).toBe('#: m');
      expect(new SchemaError({ message: 'm' }).describe()).toBe('m');
    });

    it('exposes the reference text of reference errors', () => {
      const error = new RefResolutionError({
        message: 'not found',
        context: { pointer: '/$ref', ref: '#/$defs/x' },
      });

      expect(error.ref).toBe('#/$defs/x');
    });
  });

  describe('serialization', () => {
    it('omits the stack and value in prod', () => {
      const cause = new Error('root cause');
      const error = new ConfigurationError({
        message: 'invalid id',
        context: { value: 'not a uri', pointer: '' },
        cause,
      });

      const dev = error.toJSON('dev');
      const prod = error.toJSON('prod');

      expect(dev.context).toEqual({ value: 'not a uri', pointer: '' });
      expect(dev.stack).toBeDefined();
      expect(dev.cause).toEqual({ name: 'Error', message: 'root cause' });
      expect(prod.context).toEqual({ pointer: '' });
      expect(prod.stack).toBeUndefined();
    });

    it('converts to a user error', () => {
      const error = new FeatureError({
        message: 'unknown keyword "foo"',
        errorCode: ErrorCode.UNKNOWN_KEYWORD,
        context: { pointer: '/foo' },
      });

      expect(error.toUserError()).toEqual({
        message: 'unknown keyword "foo"',
        code: ErrorCode.UNKNOWN_KEYWORD,
        severity: 'error',
        location: '#/foo',
      });
      expect(error.getExitCode()).toBe(getExitCode(ErrorCode.UNKNOWN_KEYWORD));
    });
  });

  describe('ErrorList', () => {
    it('lists every error on its own line', () => {
      const list = new ErrorList([
        new SchemaError({ message: 'a', context: { pointer: '/x' } }),
        new FeatureError({ message: 'b', errorCode: ErrorCode.UNKNOWN_FORMAT }),
      ]);

      expect(list.message).toBe('#/x: a\nb');
      expect(list.describe()).toBe(list.message);
      expect(list.errorCode).toBe(ErrorCode.INVALID_KEYWORD_VALUE);
    });

    it('drops duplicates and flattens nested lists', () => {
      const a = new SchemaError({ message: 'a', context: { pointer: '/x' } });
      const again = new SchemaError({ message: 'a', context: { pointer: '/x' } });
      const b = new SchemaError({ message: 'b' });

      const list = new ErrorList([a, new ErrorList([again, b])]);

      expect(list.errors).toEqual([a, b]);
      expect(list.message).toBe('#/x: a\nb');
    });

    it('reports an internal error when empty', () => {
      expect(new ErrorList([]).errorCode).toBe(ErrorCode.INTERNAL_ERROR);
    });
  });
});
