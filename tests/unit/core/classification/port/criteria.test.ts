/**
 * Tests for the port classification criteria.
 */
import { describe, it, expect } from 'vitest';
import {
  commandPattern,
  defaultPortCriteria,
  eventPublisherNaming,
  explicitRepository,
  injectedAsDependency,
  isPortCandidate,
  namingUseCase,
  packageIn,
  packageOut,
  queryPattern,
  signatureBasedDrivenPort,
} from '../../../../../src/core/classification/port/criteria.js';
import type { PortCriteria } from '../../../../../src/core/classification/port/criteria.js';
import type { MatchResult } from '../../../../../src/core/classification/criteria.js';
import type { PortKind } from '../../../../../src/core/classification/port/kinds.js';
import type { ApplicationGraph } from '../../../../../src/core/graph/graph.js';
import {
  ORDER,
  ORDER_REPOSITORY,
  buildGraph,
  classDecl,
  interfaceDecl,
  orderingTypes,
  typeNamed,
} from '../../../../helpers/source-model.js';

const run = (criteria: PortCriteria, graph: ApplicationGraph, name: string): MatchResult<PortKind> =>
  criteria.evaluate(typeNamed(graph, name), graph.query());

describe('port criteria', () => {
  const ordering = buildGraph(orderingTypes());

  describe('explicitRepository', () => {
    it('should match an annotated interface', () => {
      const graph = buildGraph([interfaceDecl('com.acme.billing.Invoices', { annotations: ['Repository'] })]);

      expect(run(explicitRepository, graph, 'com.acme.billing.Invoices')).toMatchObject({
        matched: true,
        confidence: 'EXPLICIT',
        justification: 'Annotated as Repository',
      });
    });

    it('should match an interface extending a Repository marker', () => {
      const graph = buildGraph([
        interfaceDecl('com.acme.billing.Invoices', {
          interfaces: ['org.springframework.data.repository.Repository<com.acme.billing.Invoice, java.lang.Long>'],
        }),
      ]);

      expect(run(explicitRepository, graph, 'com.acme.billing.Invoices')).toMatchObject({
        matched: true,
        justification: 'Extends Repository',
      });
    });

    it('should not match unmarked interfaces', () => {
      expect(run(explicitRepository, ordering, ORDER_REPOSITORY).matched).toBe(false);
    });
  });

  describe('naming criteria', () => {
    it('should match use case suffixes', () => {
      const graph = buildGraph([interfaceDecl('com.acme.orders.application.PlaceOrderUseCase')]);

      expect(run(namingUseCase, graph, 'com.acme.orders.application.PlaceOrderUseCase')).toMatchObject({
        matched: true,
        confidence: 'HIGH',
        justification: 'PlaceOrderUseCase ends with UseCase',
      });
    });

    it('should match event publishers', () => {
      const graph = buildGraph([interfaceDecl('com.acme.orders.application.OrderEventPublisher')]);

      expect(run(eventPublisherNaming, graph, 'com.acme.orders.application.OrderEventPublisher')).toMatchObject({
        matched: true,
        justification: 'OrderEventPublisher ends with EventPublisher',
      });
    });
  });

  describe('commandPattern', () => {
    it('should match interfaces whose methods are all void commands', () => {
      const graph = buildGraph([
        interfaceDecl('com.acme.orders.OrderOperations', {
          methods: [
            { name: 'cancelOrder', parameters: [{ name: 'id', type: 'java.lang.String' }] },
            { name: 'placeOrder', parameters: [{ name: 'id', type: 'java.lang.String' }] },
          ],
        }),
      ]);

      expect(run(commandPattern, graph, 'com.acme.orders.OrderOperations')).toMatchObject({
        matched: true,
        justification: 'Every method is a void command',
      });
    });

    it('should match the command handler suffix', () => {
      const graph = buildGraph([interfaceDecl('com.acme.orders.CancelOrderCommandHandler')]);

      expect(run(commandPattern, graph, 'com.acme.orders.CancelOrderCommandHandler')).toMatchObject({
        matched: true,
        justification: 'CancelOrderCommandHandler is named like a command port',
      });
    });

    it('should not match interfaces without methods', () => {
      const graph = buildGraph([interfaceDecl('com.acme.orders.Marker')]);

      expect(run(commandPattern, graph, 'com.acme.orders.Marker').matched).toBe(false);
    });
  });

  describe('queryPattern', () => {
    it('should match interfaces whose methods are all lookups', () => {
      const graph = buildGraph([
        interfaceDecl('com.acme.orders.OrderLookup', {
          methods: [
            { name: 'findOrder', returnType: 'java.lang.String', parameters: [{ name: 'id', type: 'java.lang.String' }] },
            { name: 'countOrders', returnType: 'int' },
          ],
        }),
      ]);

      expect(run(queryPattern, graph, 'com.acme.orders.OrderLookup')).toMatchObject({
        matched: true,
        justification: 'Every method is a value-returning lookup',
      });
    });

    it('should not match when a method is void', () => {
      const graph = buildGraph([
        interfaceDecl('com.acme.orders.OrderLookup', {
          methods: [{ name: 'findOrder', returnType: 'java.lang.String' }, { name: 'listOrders' }],
        }),
      ]);

      expect(run(queryPattern, graph, 'com.acme.orders.OrderLookup').matched).toBe(false);
    });
  });

  describe('injectedAsDependency', () => {
    it('should match an unimplemented interface held by a class', () => {
      expect(run(injectedAsDependency, ordering, ORDER_REPOSITORY)).toMatchObject({
        matched: true,
        justification: 'Injected into PlaceOrderService with no implementation',
      });
    });

    it('should not match implemented interfaces', () => {
      const graph = buildGraph([
        ...orderingTypes(),
        classDecl('com.acme.orders.infrastructure.JpaOrderRepository', { interfaces: [ORDER_REPOSITORY] }),
      ]);

      expect(run(injectedAsDependency, graph, ORDER_REPOSITORY).matched).toBe(false);
    });
  });

  describe('signatureBasedDrivenPort', () => {
    it('should match an interface persisting identified types', () => {
      const result = run(signatureBasedDrivenPort, ordering, ORDER_REPOSITORY);

      expect(result).toMatchObject({ matched: true, justification: 'Persists Order via save' });
      if (result.matched) {
        expect(result.evidence[0]?.relatedNodes.map((id) => id.value)).toEqual([typeNamed(ordering, ORDER).id.value]);
      }
    });

    it('should not match without a persistence method', () => {
      const graph = buildGraph([
        ...orderingTypes(),
        interfaceDecl('com.acme.orders.domain.OrderPrinter', {
          methods: [{ name: 'print', parameters: [{ name: 'order', type: ORDER }] }],
        }),
      ]);

      expect(run(signatureBasedDrivenPort, graph, 'com.acme.orders.domain.OrderPrinter').matched).toBe(false);
    });
  });

  describe('package criteria', () => {
    const graph = buildGraph([
      interfaceDecl('com.acme.orders.ports.in.PlaceOrder'),
      interfaceDecl('com.acme.orders.ports.out.SendReceipt'),
    ]);

    it('should match inbound package segments', () => {
      expect(run(packageIn, graph, 'com.acme.orders.ports.in.PlaceOrder')).toMatchObject({
        matched: true,
        confidence: 'LOW',
        justification: 'Declared in package segment "in"',
      });
      expect(run(packageIn, graph, 'com.acme.orders.ports.out.SendReceipt').matched).toBe(false);
    });

    it('should match outbound package segments', () => {
      expect(run(packageOut, graph, 'com.acme.orders.ports.out.SendReceipt')).toMatchObject({
        matched: true,
        justification: 'Declared in package segment "out"',
      });
    });
  });

  describe('defaultPortCriteria', () => {
    it('should carry a direction on every criterion', () => {
      const criteria = defaultPortCriteria();

      expect(criteria).toHaveLength(13);
      expect(criteria.every((c) => c.direction === 'DRIVING' || c.direction === 'DRIVEN')).toBe(true);
    });
  });

  describe('isPortCandidate', () => {
    it('should accept interfaces only', () => {
      expect(isPortCandidate(typeNamed(ordering, ORDER_REPOSITORY))).toBe(true);
      expect(isPortCandidate(typeNamed(ordering, ORDER))).toBe(false);
    });
  });
});
