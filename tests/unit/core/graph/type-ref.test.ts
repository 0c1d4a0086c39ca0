/**
 * Tests for type references.
 */
import { describe, it, expect } from 'vitest';
import {
  formatTypeRef,
  isPrimitive,
  isVoid,
  nestedArguments,
  packageNameOf,
  parseTypeRef,
  referencedNames,
  simpleNameOf,
} from '../../../../src/core/graph/type-ref.js';
import { ErrorCodes, SystemError } from '../../../../src/utils/errors.js';

describe('type references', () => {
  describe('parseTypeRef', () => {
    it('should parse a plain name', () => {
      expect(parseTypeRef('com.acme.Order')).toEqual({ name: 'com.acme.Order', arguments: [], arrayDimensions: 0 });
    });

    it('should parse nested generic arguments and array dimensions', () => {
      const ref = parseTypeRef('java.util.Map<java.lang.String, java.util.List<com.acme.Order>>[]');

      expect(ref.name).toBe('java.util.Map');
      expect(ref.arrayDimensions).toBe(1);
      expect(ref.arguments.map((a) => a.name)).toEqual(['java.lang.String', 'java.util.List']);
      expect(ref.arguments[1]?.arguments[0]?.name).toBe('com.acme.Order');
    });

    it('should keep only the bound of a bounded wildcard', () => {
      const ref = parseTypeRef('java.util.List<? extends com.acme.Order>');

      expect(ref.arguments[0]?.name).toBe('com.acme.Order');
    });

    it('should keep an unbounded wildcard as ?', () => {
      expect(parseTypeRef('java.util.List<?>').arguments[0]?.name).toBe('?');
    });

    it('should count multi-dimensional arrays', () => {
      expect(parseTypeRef('int[][]').arrayDimensions).toBe(2);
    });

    it('should reject an unterminated argument list', () => {
      try {
        parseTypeRef('java.util.List<');
        expect.fail('expected an error');
      } catch (error) {
        expect(error).toBeInstanceOf(SystemError);
        if (error instanceof SystemError) {
          expect(error.code).toBe(ErrorCodes.INVALID_TYPE_REF);
          expect(error.message).toBe("Invalid type reference 'java.util.List<' at 15: expected a type name");
        }
      }
    });

    it('should reject trailing characters', () => {
      expect(() => parseTypeRef('com.acme.Order>')).toThrow("unexpected '>'");
    });
  });

  describe('referencedNames', () => {
    it('should list the raw name and every argument depth first', () => {
      const ref = parseTypeRef('java.util.Map<java.lang.String, java.util.List<com.acme.Order>>');

      expect(referencedNames(ref)).toEqual(['java.util.Map', 'java.lang.String', 'java.util.List', 'com.acme.Order']);
    });

    it('should drop wildcards', () => {
      expect(referencedNames(parseTypeRef('java.util.List<?>'))).toEqual(['java.util.List']);
    });
  });

  describe('nestedArguments', () => {
    it('should exclude the outer type', () => {
      const names = nestedArguments(parseTypeRef('java.util.List<java.util.Set<com.acme.Tag>>')).map((a) => a.name);

      expect(names).toEqual(['java.util.Set', 'com.acme.Tag']);
    });
  });

  describe('formatTypeRef', () => {
    it('should print the canonical textual form', () => {
      const text = 'java.util.Map<java.lang.String, com.acme.Order[]>';

      expect(formatTypeRef(parseTypeRef(text))).toBe(text);
    });
  });

  describe('predicates and names', () => {
    it('should recognise primitives but not primitive arrays', () => {
      expect(isPrimitive(parseTypeRef('int'))).toBe(true);
      expect(isPrimitive(parseTypeRef('int[]'))).toBe(false);
      expect(isPrimitive(parseTypeRef('java.lang.Integer'))).toBe(false);
    });

    it('should recognise void', () => {
      expect(isVoid(parseTypeRef('void'))).toBe(true);
    });

    it('should split simple and package names', () => {
      expect(simpleNameOf('com.acme.Order')).toBe('Order');
      expect(packageNameOf('com.acme.Order')).toBe('com.acme');
      expect(packageNameOf('Order')).toBe('');
    });
  });
});
