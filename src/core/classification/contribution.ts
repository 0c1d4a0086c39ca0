/**
 * One criterion's opinion about a node.
 */
import type { ConfidenceLevel, Evidence } from './types.js';

export class Contribution<K extends string> {
  private constructor(
    public readonly kind: K,
    public readonly criteriaName: string,
    public readonly priority: number,
    public readonly confidence: ConfidenceLevel,
    public readonly justification: string,
    public readonly evidence: readonly Evidence[],
    private readonly attributes: ReadonlyMap<string, unknown>
  ) {}

  static of<K extends string>(
    kind: K,
    criteriaName: string,
    priority: number,
    confidence: ConfidenceLevel,
    justification: string,
    evidence: readonly Evidence[] = []
  ): Contribution<K> {
    return new Contribution(kind, criteriaName, priority, confidence, justification, [...evidence], new Map());
  }

  /**
   * Copy of this contribution with one more metadata entry.
   */
  withMetadata(key: string, value: unknown): Contribution<K> {
    const attributes = new Map(this.attributes);
    attributes.set(key, value);
    return new Contribution(
      this.kind,
      this.criteriaName,
      this.priority,
      this.confidence,
      this.justification,
      this.evidence,
      attributes
    );
  }

  metadata(key: string): unknown {
    return this.attributes.get(key);
  }

  hasMetadata(key: string): boolean {
    return this.attributes.has(key);
  }

  metadataKeys(): string[] {
    return Array.from(this.attributes.keys());
  }
}
