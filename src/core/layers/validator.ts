/**
 * Layer boundary validator - checks REFERENCES edges against layer rules.
 */
import { minimatch } from 'minimatch';
import type { ApplicationGraph } from '../graph/graph.js';
import type { TypeNode } from '../graph/types.js';
import { isInferredLayerViolation, LayerClassifier } from './classifier.js';
import type { LayerDefinition, LayerViolation, ResolvedLayer } from './types.js';

/**
 * Validates layer boundary rules.
 *
 * With configured layers, package names are matched against glob patterns
 * (dots act as separators):
 * ```yaml
 * layers:
 *   - name: domain
 *     packages: ["*.*.*.domain", "*.*.*.domain.**"]
 *     can_depend_on: []
 *   - name: application
 *     packages: ["**.application"]
 *     can_depend_on: [domain]
 * ```
 * Without configured layers, layers are inferred by {@link LayerClassifier}.
 */
export class LayerBoundaryValidator {
  private readonly layers: ResolvedLayer[];
  private readonly classifier = new LayerClassifier();

  constructor(layerConfigs: readonly LayerDefinition[] = []) {
    this.layers = layerConfigs.map((config) => ({
      name: config.name,
      patterns: config.packages,
      canDependOn: new Set(config.can_depend_on),
    }));
  }

  validate(graph: ApplicationGraph): LayerViolation[] {
    const violations: LayerViolation[] = [];
    for (const edge of graph.edges('REFERENCES')) {
      const from = graph.typeNode(edge.from);
      const to = graph.typeNode(edge.to);
      if (!from || !to) {
        continue;
      }
      const violation = this.layers.length > 0 ? this.checkConfigured(from, to) : this.checkInferred(from, to);
      if (violation) {
        violations.push(violation);
      }
    }
    return violations;
  }

  getLayers(): ResolvedLayer[] {
    return [...this.layers];
  }

  /**
   * First configured layer whose patterns match the package (order matters).
   */
  findLayer(packageName: string): ResolvedLayer | undefined {
    const path = packageName.replace(/\./g, '/');
    return this.layers.find((layer) =>
      layer.patterns.some((pattern) => minimatch(path, pattern.replace(/\./g, '/')))
    );
  }

  private checkConfigured(from: TypeNode, to: TypeNode): LayerViolation | undefined {
    const fromLayer = this.findLayer(from.packageName);
    const toLayer = this.findLayer(to.packageName);
    if (!fromLayer || !toLayer || fromLayer.name === toLayer.name || fromLayer.canDependOn.has(toLayer.name)) {
      return undefined;
    }
    const allowed = Array.from(fromLayer.canDependOn);
    return {
      fromType: from.qualifiedName,
      toType: to.qualifiedName,
      fromLayer: fromLayer.name,
      toLayer: toLayer.name,
      message: `Layer '${fromLayer.name}' cannot depend on '${toLayer.name}' (allowed: ${allowed.length > 0 ? allowed.join(', ') : 'none'})`,
    };
  }

  private checkInferred(from: TypeNode, to: TypeNode): LayerViolation | undefined {
    const fromLayer = this.classifier.classify(from);
    const toLayer = this.classifier.classify(to);
    if (!isInferredLayerViolation(fromLayer, toLayer)) {
      return undefined;
    }
    return {
      fromType: from.qualifiedName,
      toType: to.qualifiedName,
      fromLayer,
      toLayer,
      message: `Layer '${fromLayer}' cannot depend on '${toLayer}'`,
    };
  }
}
