/**
 * Tests for the graph query facade.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { GraphQuery } from '../../../../src/core/graph/query.js';
import type { TypeNode } from '../../../../src/core/graph/types.js';
import {
  ADDRESS,
  MONEY,
  ORDER,
  ORDER_ID,
  ORDER_LINE,
  ORDER_PLACED,
  ORDER_REPOSITORY,
  ORDER_STATUS,
  PLACE_ORDER_SERVICE,
  buildGraph,
  classDecl,
  interfaceDecl,
  orderingTypes,
} from '../../../helpers/source-model.js';

describe('DefaultGraphQuery', () => {
  let query: GraphQuery;

  const typeOf = (name: string): TypeNode => {
    const type = query.type(name);
    if (!type) {
      throw new Error(`missing type ${name}`);
    }
    return type;
  };
  const names = (types: readonly TypeNode[]): string[] => types.map((t) => t.qualifiedName);

  beforeEach(() => {
    query = buildGraph(orderingTypes()).query();
  });

  describe('type lookups', () => {
    it('should filter types by form', () => {
      expect(names(query.records())).toEqual([ADDRESS, MONEY, ORDER_ID, ORDER_PLACED]);
      expect(names(query.interfaces())).toEqual([ORDER_REPOSITORY]);
      expect(names(query.enums())).toEqual([ORDER_STATUS]);
    });

    it('should list types of a package', () => {
      expect(names(query.typesInPackage('com.acme.orders.application'))).toEqual([PLACE_ORDER_SERVICE]);
      expect(query.typesInPackage('com.acme.unknown')).toEqual([]);
    });

    it('should report the detected style', () => {
      expect(query.packageOrganizationStyle()).toBe('BY_LAYER');
    });
  });

  describe('relationships', () => {
    it('should find interfaces using a type in their signatures', () => {
      expect(names(query.usersInSignatureOf(typeOf(ORDER)))).toEqual([ORDER_REPOSITORY]);
      expect(query.usersInSignatureOf(typeOf(MONEY))).toEqual([]);
    });

    it('should find the fields referencing a type through type arguments', () => {
      expect(query.fieldsReferencing(typeOf(ORDER_LINE)).map((f) => f.id.value)).toEqual([`field:${ORDER}#lines`]);
    });

    it('should find distinct containers of a type', () => {
      expect(names(query.containersOf(typeOf(ORDER_ID)))).toEqual([ORDER, ORDER_PLACED]);
    });

    it('should resolve the declaring type of a member', () => {
      const field = query.fieldsOf(typeOf(ORDER_LINE))[0];

      expect(field && query.declaringTypeOf(field)?.qualifiedName).toBe(ORDER_LINE);
    });

    it('should find implementors and subtypes', () => {
      const local = buildGraph([
        interfaceDecl('com.acme.pay.Gateway'),
        classDecl('com.acme.pay.BaseGateway', { modifiers: ['abstract'], interfaces: ['com.acme.pay.Gateway'] }),
        classDecl('com.acme.pay.CardGateway', { superType: 'com.acme.pay.BaseGateway' }),
      ]).query();
      const gateway = local.type('com.acme.pay.Gateway');
      const base = local.type('com.acme.pay.BaseGateway');

      expect(gateway && names(local.implementorsOf(gateway))).toEqual(['com.acme.pay.BaseGateway']);
      expect(base && names(local.subtypesOf(base))).toEqual(['com.acme.pay.CardGateway']);
      expect(names(local.abstractTypes())).toEqual(['com.acme.pay.BaseGateway', 'com.acme.pay.Gateway']);
    });
  });

  describe('transitive dependencies', () => {
    it('should follow REFERENCES edges', () => {
      expect(names(query.transitiveDependencies(typeOf(PLACE_ORDER_SERVICE)))).toEqual([
        ADDRESS,
        MONEY,
        ORDER,
        ORDER_ID,
        ORDER_LINE,
        ORDER_REPOSITORY,
        ORDER_STATUS,
      ]);
    });

    it('should detect cyclic dependencies', () => {
      const cyclic = buildGraph([
        classDecl('com.acme.cyc.A', { fields: [{ name: 'b', type: 'com.acme.cyc.B' }] }),
        classDecl('com.acme.cyc.B', { fields: [{ name: 'a', type: 'com.acme.cyc.A' }] }),
      ]).query();
      const a = cyclic.type('com.acme.cyc.A');

      expect(a && cyclic.hasCyclicDependency(a)).toBe(true);
      expect(query.hasCyclicDependency(typeOf(ORDER))).toBe(false);
    });
  });
});
