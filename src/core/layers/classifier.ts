/**
 * Infers the architectural layer of a type from annotations, package
 * segments and type-name suffixes, in that order.
 */
import { endsWithAny, packageSegments } from '../classification/heuristics.js';
import { hasAnyAnnotation } from '../graph/nodes.js';
import type { TypeNode } from '../graph/types.js';
import type { ArchitecturalLayer } from './types.js';

type KnownLayer = Exclude<ArchitecturalLayer, 'unknown'>;

interface LayerIndicators {
  layer: KnownLayer;
  segments: readonly string[];
  suffixes: readonly string[];
  annotations: readonly string[];
}

/** Checked top to bottom; the first layer with a hit wins. */
const INDICATORS: readonly LayerIndicators[] = [
  {
    layer: 'presentation',
    segments: ['presentation', 'ui', 'web', 'rest', 'api', 'controller', 'graphql', 'grpc'],
    suffixes: ['Controller', 'Resolver', 'Endpoint', 'Resource', 'View', 'ViewModel'],
    annotations: ['Controller', 'RestController', 'ControllerAdvice', 'Path'],
  },
  {
    layer: 'application',
    segments: ['application', 'usecase', 'service', 'command', 'query', 'handler'],
    suffixes: ['Service', 'UseCase', 'CommandHandler', 'QueryHandler', 'Handler', 'Facade'],
    annotations: ['Service', 'Stateless'],
  },
  {
    layer: 'domain',
    segments: ['domain', 'model', 'entity', 'valueobject', 'aggregate'],
    suffixes: ['Entity', 'ValueObject', 'AggregateRoot', 'DomainService', 'DomainEvent'],
    annotations: [],
  },
  {
    layer: 'infrastructure',
    segments: ['infrastructure', 'adapter', 'persistence', 'repository', 'messaging', 'external'],
    suffixes: ['Repository', 'RepositoryImpl', 'Adapter', 'Gateway', 'Client', 'Publisher', 'Consumer'],
    annotations: ['Repository', 'Entity'],
  },
];

export class LayerClassifier {
  classify(type: TypeNode): ArchitecturalLayer {
    return this.byAnnotations(type) ?? this.byPackage(type) ?? this.byName(type) ?? 'unknown';
  }

  private byAnnotations(type: TypeNode): KnownLayer | undefined {
    return INDICATORS.find((i) => hasAnyAnnotation(type, i.annotations))?.layer;
  }

  private byPackage(type: TypeNode): KnownLayer | undefined {
    const segments = new Set(packageSegments(type).map((s) => s.toLowerCase()));
    return INDICATORS.find((i) => i.segments.some((s) => segments.has(s)))?.layer;
  }

  private byName(type: TypeNode): KnownLayer | undefined {
    return INDICATORS.find((i) => endsWithAny(type.simpleName, i.suffixes))?.layer;
  }
}

/**
 * Forbidden dependencies between inferred layers: the domain depends on no
 * other layer, and the application layer not on presentation.
 */
export function isInferredLayerViolation(from: ArchitecturalLayer, to: ArchitecturalLayer): boolean {
  if (from === 'domain') {
    return to === 'application' || to === 'infrastructure' || to === 'presentation';
  }
  return from === 'application' && to === 'presentation';
}
