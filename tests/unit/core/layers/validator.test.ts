/**
 * Tests for layer boundary validator.
 */
import { describe, it, expect } from 'vitest';
import { LayerBoundaryValidator } from '../../../../src/core/layers/validator.js';
import type { LayerDefinition } from '../../../../src/core/layers/types.js';
import { buildGraph, classDecl } from '../../../helpers/source-model.js';

const ORDER = 'com.acme.orders.domain.Order';
const ENTITY = 'com.acme.orders.infrastructure.OrderJpaEntity';
const MAPPER = 'com.acme.orders.infrastructure.OrderMapper';

describe('LayerBoundaryValidator', () => {
  const graph = buildGraph([
    classDecl(ORDER, { fields: [{ name: 'row', type: ENTITY }] }),
    classDecl(ENTITY),
    classDecl(MAPPER, { fields: [{ name: 'order', type: ORDER }] }),
  ]);

  describe('validate with inferred layers', () => {
    it('should report domain types depending on infrastructure', () => {
      const validator = new LayerBoundaryValidator();

      expect(validator.validate(graph)).toEqual([
        {
          fromType: ORDER,
          toType: ENTITY,
          fromLayer: 'domain',
          toLayer: 'infrastructure',
          message: "Layer 'domain' cannot depend on 'infrastructure'",
        },
      ]);
    });

    it('should pass for graphs that respect the layering', () => {
      const clean = buildGraph([classDecl(ORDER), classDecl(MAPPER, { fields: [{ name: 'order', type: ORDER }] })]);

      expect(new LayerBoundaryValidator().validate(clean)).toEqual([]);
    });
  });

  describe('validate with configured layers', () => {
    const layers: LayerDefinition[] = [
      { name: 'domain', packages: ['**.domain'], can_depend_on: [] },
      { name: 'infra', packages: ['**.infrastructure'], can_depend_on: ['domain'] },
    ];

    it('should report dependencies on layers that are not allowed', () => {
      expect(new LayerBoundaryValidator(layers).validate(graph)).toEqual([
        {
          fromType: ORDER,
          toType: ENTITY,
          fromLayer: 'domain',
          toLayer: 'infra',
          message: "Layer 'domain' cannot depend on 'infra' (allowed: none)",
        },
      ]);
    });

    it('should list the allowed layers in the message', () => {
      const strict: LayerDefinition[] = [
        { name: 'domain', packages: ['**.domain'], can_depend_on: ['shared'] },
        { name: 'infra', packages: ['**.infrastructure'], can_depend_on: [] },
      ];

      const messages = new LayerBoundaryValidator(strict).validate(graph).map((v) => v.message);

      expect(messages).toEqual([
        "Layer 'domain' cannot depend on 'infra' (allowed: shared)",
        "Layer 'infra' cannot depend on 'domain' (allowed: none)",
      ]);
    });

    it('should ignore types outside every layer', () => {
      const validator = new LayerBoundaryValidator([{ name: 'domain', packages: ['**.domain'], can_depend_on: [] }]);

      expect(validator.validate(graph)).toEqual([]);
    });
  });

  describe('findLayer', () => {
    it('should treat dots as package separators', () => {
      const validator = new LayerBoundaryValidator([
        { name: 'domain', packages: ['*.*.*.domain', '*.*.*.domain.**'], can_depend_on: [] },
      ]);

      expect(validator.findLayer('com.acme.orders.domain')?.name).toBe('domain');
      expect(validator.findLayer('com.acme.orders.domain.model')?.name).toBe('domain');
      expect(validator.findLayer('com.acme.domain')).toBeUndefined();
    });

    it('should return the first matching layer', () => {
      const validator = new LayerBoundaryValidator([
        { name: 'first', packages: ['com.acme.**'], can_depend_on: [] },
        { name: 'second', packages: ['**.domain'], can_depend_on: [] },
      ]);

      expect(validator.findLayer('com.acme.orders.domain')?.name).toBe('first');
    });
  });

  describe('getLayers', () => {
    it('should resolve dependency rules into sets', () => {
      const validator = new LayerBoundaryValidator([
        { name: 'infra', packages: ['**.infrastructure'], can_depend_on: ['domain'] },
      ]);

      expect(validator.getLayers()).toEqual([
        { name: 'infra', patterns: ['**.infrastructure'], canDependOn: new Set(['domain']) },
      ]);
    });
  });
});
