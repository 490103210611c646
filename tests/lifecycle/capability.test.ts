import { describe, it, expect } from 'vitest';
import {
  newCapability,
  cloneCapability,
  cloneCapabilities,
  validateCapability
} from '../../src/lifecycle/capability.js';
import { ErrorCode, PlatformError, isValidation } from '../../src/errors/index.js';

describe('Capability', () => {
  describe('newCapability()', () => {
    it('should create a capability with all fields', () => {
      const cap = newCapability('summarize', '1.0.0', 'Summarizes text', { model: 'small' });
      expect(cap).toEqual({
        name: 'summarize',
        version: '1.0.0',
        description: 'Summarizes text',
        metadata: { model: 'small' }
      });
    });

    it('should default description to empty and omit absent metadata', () => {
      const cap = newCapability('summarize', '1.0.0');
      expect(cap.description).toBe('');
      expect(cap.metadata).toBeUndefined();
      expect('metadata' in cap).toBe(false);
    });

    it('should normalize empty metadata to absent', () => {
      const cap = newCapability('summarize', '1.0.0', '', {});
      expect(cap.metadata).toBeUndefined();
    });

    it('should copy the metadata map', () => {
      const metadata = { model: 'small' };
      const cap = newCapability('summarize', '1.0.0', '', metadata);
      metadata.model = 'large';
      expect(cap.metadata).toEqual({ model: 'small' });
    });

    it('should reject an empty name', () => {
      expect(() => newCapability('', '1.0.0')).toThrow('capability name must not be empty');
      try {
        newCapability('', '1.0.0');
      } catch (error) {
        expect(isValidation(error)).toBe(true);
      }
    });

    it('should reject an empty version and name the capability', () => {
      let caught: unknown;
      try {
        newCapability('translate', '');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(PlatformError);
      expect(caught).toMatchObject({
        code: ErrorCode.Validation,
        message: 'capability "translate" version must not be empty'
      });
    });
  });

  describe('cloneCapability()', () => {
    it('should produce an independent metadata map', () => {
      const original = newCapability('summarize', '1.0.0', 'desc', { model: 'small' });
      const copy = cloneCapability(original);

      expect(copy).toEqual(original);
      expect(copy.metadata).not.toBe(original.metadata);

      const metadata = copy.metadata ?? {};
      metadata.model = 'large';
      expect(copy.metadata).toEqual({ model: 'large' });
      expect(original.metadata).toEqual({ model: 'small' });
    });

    it('should keep absent metadata absent', () => {
      const copy = cloneCapability({ name: 'a', version: '1', description: '' });
      expect(copy.metadata).toBeUndefined();
    });
  });

  describe('cloneCapabilities()', () => {
    it('should return an empty array for an empty list', () => {
      expect(cloneCapabilities([])).toEqual([]);
    });
  });

  describe('validateCapability()', () => {
    it('should accept raw values with name and version', () => {
      expect(() => validateCapability({ name: 'raw', version: '2.0.0' })).not.toThrow();
    });

    it('should reject raw values missing a version', () => {
      expect(() => validateCapability({ name: 'raw', version: '' })).toThrow(
        'capability "raw" version must not be empty'
      );
    });
  });
});
