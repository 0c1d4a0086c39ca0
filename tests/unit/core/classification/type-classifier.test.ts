/**
 * Tests for the TypeClassifier class.
 */
import { describe, it, expect } from 'vitest';
import { CONFIGURATION_CRITERIA, TypeClassifier } from '../../../../src/core/classification/type-classifier.js';
import { CriteriaProfile } from '../../../../src/core/classification/profile.js';
import {
  ORDER,
  ORDER_ID,
  ORDER_REPOSITORY,
  PLACE_ORDER_SERVICE,
  buildGraph,
  interfaceDecl,
  orderingTypes,
  typeNamed,
} from '../../../helpers/source-model.js';

describe('TypeClassifier', () => {
  const graph = buildGraph(orderingTypes());

  describe('classify', () => {
    it('should classify every type of the graph', () => {
      const results = new TypeClassifier().classify(graph);

      expect(results.stats()).toEqual({
        total: 9,
        classified: 9,
        unclassified: 0,
        conflicts: 0,
        byKind: {
          AGGREGATE_ROOT: 1,
          IDENTIFIER: 1,
          ENTITY: 1,
          VALUE_OBJECT: 3,
          DOMAIN_EVENT: 1,
          REPOSITORY: 1,
          APPLICATION_SERVICE: 1,
        },
      });
    });

    it('should classify interfaces as ports before trying domain roles', () => {
      const results = new TypeClassifier().classify(graph);

      expect(results.get(typeNamed(graph, ORDER_REPOSITORY).id)).toMatchObject({
        target: 'PORT',
        kind: 'REPOSITORY',
      });
      expect(results.get(typeNamed(graph, ORDER).id)).toMatchObject({ target: 'DOMAIN', kind: 'AGGREGATE_ROOT' });
    });

    it('should fall back to the domain classifier for interfaces that are not ports', () => {
      const name = 'com.acme.orders.domain.PricingPolicy';
      const local = buildGraph([interfaceDecl(name, { annotations: ['DomainService'] })]);
      const results = new TypeClassifier().classify(local);

      expect(results.get(typeNamed(local, name).id)).toMatchObject({
        status: 'CLASSIFIED',
        target: 'DOMAIN',
        kind: 'DOMAIN_SERVICE',
      });
    });

    it('should skip excluded types', () => {
      const results = new TypeClassifier({ exclude: ['com.acme.orders.application.*'] }).classify(graph);

      expect(results.size).toBe(8);
      expect(results.get(typeNamed(graph, PLACE_ORDER_SERVICE).id)).toBeUndefined();
    });

    it('should apply explicit configuration entries', () => {
      const results = new TypeClassifier({
        explicit: { [ORDER_ID]: 'VALUE_OBJECT', [ORDER_REPOSITORY]: 'USE_CASE' },
      }).classify(graph);

      expect(results.get(typeNamed(graph, ORDER_ID).id)).toMatchObject({
        status: 'CLASSIFIED',
        target: 'DOMAIN',
        kind: 'VALUE_OBJECT',
        criteriaName: CONFIGURATION_CRITERIA,
        priority: Number.MAX_SAFE_INTEGER,
        confidence: 'EXPLICIT',
        justification: 'Configured as VALUE_OBJECT',
        conflicts: [],
      });
      expect(results.get(typeNamed(graph, ORDER_REPOSITORY).id)).toMatchObject({
        target: 'PORT',
        kind: 'USE_CASE',
        portDirection: 'DRIVING',
      });
    });

    it('should report ties between incompatible roles under the strict policy', () => {
      const profile = CriteriaProfile.of({ 'domain.relationship.embeddedValueObject': 80 });

      const strict = new TypeClassifier({ profile, decisionPolicy: 'strict' }).classify(graph);
      const lenient = new TypeClassifier({ profile }).classify(graph);

      expect(strict.get(typeNamed(graph, ORDER_ID).id)?.status).toBe('CONFLICT');
      expect(strict.stats().conflicts).toBe(1);
      expect(lenient.get(typeNamed(graph, ORDER_ID).id)).toMatchObject({
        status: 'CLASSIFIED',
        kind: 'VALUE_OBJECT',
      });
    });
    it('should keep port conflicts instead of falling back to domain roles', () => {
      const name = 'com.acme.orders.PaymentAccess';
      const local = buildGraph([interfaceDecl(name, { annotations: ['Repository', 'SecondaryPort'] })]);
      const results = new TypeClassifier({ decisionPolicy: 'strict' }).classify(local);
      const result = results.get(typeNamed(local, name).id);

      expect(result).toMatchObject({ status: 'CONFLICT', target: 'PORT' });
      expect(result?.status === 'CONFLICT' ? result.conflicts.map((c) => c.competingKind) : []).toEqual([
        'REPOSITORY',
        'GATEWAY',
      ]);
      expect(results.stats().conflicts).toBe(1);
    });
  });
});
