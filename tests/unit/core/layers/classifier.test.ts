/**
 * Tests for layer inference.
 */
import { describe, it, expect } from 'vitest';
import { LayerClassifier, isInferredLayerViolation } from '../../../../src/core/layers/classifier.js';
import { buildGraph, classDecl, typeNamed } from '../../../helpers/source-model.js';

describe('LayerClassifier', () => {
  const classifier = new LayerClassifier();

  const layerOf = (qualifiedName: string, annotations: string[] = []) => {
    const graph = buildGraph([classDecl(qualifiedName, { annotations })]);
    return classifier.classify(typeNamed(graph, qualifiedName));
  };

  describe('classify', () => {
    it('should use annotations first', () => {
      expect(layerOf('com.acme.orders.domain.OrderEndpoint', ['RestController'])).toBe('presentation');
    });

    it('should use package segments before name suffixes', () => {
      expect(layerOf('com.acme.orders.domain.PricingService')).toBe('domain');
      expect(layerOf('com.acme.orders.infrastructure.JpaOrders')).toBe('infrastructure');
    });

    it('should match package segments case-insensitively', () => {
      expect(layerOf('com.acme.orders.Application.Checkout')).toBe('application');
    });

    it('should fall back to name suffixes', () => {
      expect(layerOf('com.acme.orders.OrderController')).toBe('presentation');
      expect(layerOf('com.acme.orders.PaymentGateway')).toBe('infrastructure');
    });

    it('should return unknown without any indicator', () => {
      expect(layerOf('com.acme.util.Clock')).toBe('unknown');
    });
  });
});

describe('isInferredLayerViolation', () => {
  it('should forbid the domain from depending on outer layers', () => {
    expect(isInferredLayerViolation('domain', 'infrastructure')).toBe(true);
    expect(isInferredLayerViolation('domain', 'application')).toBe(true);
    expect(isInferredLayerViolation('domain', 'presentation')).toBe(true);
  });

  it('should forbid the application layer from depending on presentation', () => {
    expect(isInferredLayerViolation('application', 'presentation')).toBe(true);
    expect(isInferredLayerViolation('application', 'domain')).toBe(false);
  });

  it('should allow everything else', () => {
    expect(isInferredLayerViolation('domain', 'domain')).toBe(false);
    expect(isInferredLayerViolation('domain', 'unknown')).toBe(false);
    expect(isInferredLayerViolation('infrastructure', 'domain')).toBe(false);
    expect(isInferredLayerViolation('presentation', 'application')).toBe(false);
  });
});
