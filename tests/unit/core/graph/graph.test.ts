/**
 * Tests for the ApplicationGraph store.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { derivedEdge, rawEdge } from '../../../../src/core/graph/edges.js';
import { ApplicationGraph, defaultMetadata } from '../../../../src/core/graph/graph.js';
import { NodeId } from '../../../../src/core/graph/ids.js';
import { createFieldNode, createMethodNode, createTypeNode } from '../../../../src/core/graph/nodes.js';
import { parseTypeRef } from '../../../../src/core/graph/type-ref.js';
import { ErrorCodes, GraphInvariantError } from '../../../../src/utils/errors.js';

const ORDER = 'com.acme.Order';
const LINE = 'com.acme.OrderLine';

const expectInvariant = (action: () => void, code: string): void => {
  try {
    action();
    expect.fail('expected a GraphInvariantError');
  } catch (error) {
    expect(error).toBeInstanceOf(GraphInvariantError);
    if (error instanceof GraphInvariantError) {
      expect(error.code).toBe(code);
    }
  }
};

describe('ApplicationGraph', () => {
  let graph: ApplicationGraph;

  beforeEach(() => {
    graph = new ApplicationGraph(defaultMetadata('com.acme'));
    graph.addNode(createTypeNode({ qualifiedName: ORDER, form: 'CLASS' }));
    graph.addNode(createTypeNode({ qualifiedName: LINE, form: 'CLASS' }));
  });

  describe('addNode', () => {
    it('should index types by id and by qualified name', () => {
      expect(graph.typeNode(ORDER)?.simpleName).toBe('Order');
      expect(graph.typeNode(NodeId.forType(LINE))?.packageName).toBe('com.acme');
      expect(graph.typeCount).toBe(2);
    });

    it('should reject duplicate ids', () => {
      expectInvariant(
        () => graph.addNode(createTypeNode({ qualifiedName: ORDER, form: 'RECORD' })),
        ErrorCodes.DUPLICATE_NODE
      );
    });

    it('should reject members of unknown types', () => {
      expectInvariant(
        () => graph.addNode(createFieldNode('com.acme.Missing', 'id', parseTypeRef('long'))),
        ErrorCodes.DANGLING_EDGE
      );
    });

    it('should keep members apart from types', () => {
      graph.addNode(createFieldNode(ORDER, 'lines', parseTypeRef(`java.util.List<${LINE}>`)));
      graph.addNode(createMethodNode(ORDER, 'total', parseTypeRef('long'), []));

      expect(graph.memberCount).toBe(2);
      expect(graph.fieldsOf(NodeId.forType(ORDER)).map((f) => f.name)).toEqual(['lines']);
      expect(graph.methodsOf(NodeId.forType(ORDER)).map((m) => m.name)).toEqual(['total']);
      expect(graph.typeNode(NodeId.forField(ORDER, 'lines'))).toBeUndefined();
    });
  });

  describe('addEdge', () => {
    it('should expose edges by endpoint and kind', () => {
      const edge = rawEdge(NodeId.forType(ORDER), NodeId.forType(LINE), 'REFERENCES');
      graph.addEdge(edge);

      expect(graph.edgesFrom(NodeId.forType(ORDER))).toEqual([edge]);
      expect(graph.edgesTo(NodeId.forType(LINE))).toEqual([edge]);
      expect(graph.edges('REFERENCES')).toHaveLength(1);
      expect(graph.edges('EXTENDS')).toHaveLength(0);
      expect(graph.containsEdge(NodeId.forType(ORDER), NodeId.forType(LINE), 'REFERENCES')).toBe(true);
      expect(graph.containsEdge(NodeId.forType(LINE), NodeId.forType(ORDER), 'REFERENCES')).toBe(false);
    });

    it('should reject edges to missing nodes', () => {
      expectInvariant(
        () => graph.addEdge(rawEdge(NodeId.forType(ORDER), NodeId.forType('com.acme.Missing'), 'REFERENCES')),
        ErrorCodes.DANGLING_EDGE
      );
      expect(graph.edgeCount).toBe(0);
    });

    it('should reject raw edges that carry a proof', () => {
      const edge = Object.assign(rawEdge(NodeId.forType(ORDER), NodeId.forType(LINE), 'REFERENCES'), {
        proof: { sourceId: NodeId.forType(ORDER), via: 'field:lines', rule: 'COLLECTION_UNWRAP' },
      });

      expectInvariant(() => graph.addEdge(edge), ErrorCodes.PROOF_MISMATCH);
      expect(graph.edgeCount).toBe(0);
    });

    it('should reject derived edges without a proof', () => {
      const edge = derivedEdge(NodeId.forType(ORDER), NodeId.forType(LINE), 'USES_IN_SIGNATURE', {
        sourceId: NodeId.forType(ORDER),
        via: 'method:place',
        rule: 'SIGNATURE_USAGE',
      });
      Reflect.deleteProperty(edge, 'proof');

      expectInvariant(() => graph.addEdge(edge), ErrorCodes.PROOF_MISMATCH);
      expect(graph.edgeCount).toBe(0);
    });

    it('should split raw and derived edges', () => {
      graph.addNode(createFieldNode(ORDER, 'lines', parseTypeRef(`java.util.List<${LINE}>`)));
      graph.addEdge(rawEdge(NodeId.forType(ORDER), NodeId.forType(LINE), 'REFERENCES'));
      graph.addEdge(
        derivedEdge(NodeId.forType(ORDER), NodeId.forType(LINE), 'USES_AS_COLLECTION_ELEMENT', {
          sourceId: NodeId.forField(ORDER, 'lines'),
          via: 'field:lines',
          rule: 'COLLECTION_UNWRAP',
        })
      );

      expect(graph.rawEdges().map((e) => e.kind)).toEqual(['REFERENCES']);
      expect(graph.derivedEdges().map((e) => e.kind)).toEqual(['USES_AS_COLLECTION_ELEMENT']);
    });

    it('should maintain subtype and implementor indexes', () => {
      graph.addNode(createTypeNode({ qualifiedName: 'com.acme.Priced', form: 'INTERFACE' }));
      graph.addEdge(rawEdge(NodeId.forType(LINE), NodeId.forType('com.acme.Priced'), 'IMPLEMENTS'));
      graph.addEdge(rawEdge(NodeId.forType(LINE), NodeId.forType(ORDER), 'EXTENDS'));

      const line = graph.typeNode(LINE);
      expect(line && graph.supertypeOf(line)?.qualifiedName).toBe(ORDER);
      expect(line && graph.interfacesOf(line).map((t) => t.simpleName)).toEqual(['Priced']);
    });
  });

  describe('query', () => {
    it('should return the same facade on every call', () => {
      expect(graph.query()).toBe(graph.query());
    });

    it('should expose the metadata it was created with', () => {
      expect(graph.metadata.basePackage).toBe('com.acme');
      expect(graph.metadata.style).toBe('UNKNOWN');
    });
  });
});
