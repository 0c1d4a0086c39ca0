/**
 * Compatibility between roles proposed for the same type.
 *
 * Compatible roles may coexist on one type (an aggregate root is also an
 * entity); a losing contribution with a compatible role only warns.
 */
import type { DomainKind } from './domain/kinds.js';
import type { PortKind } from './port/kinds.js';

export class CompatibilityPolicy<K extends string> {
  private constructor(private readonly predicate: (a: K, b: K) => boolean) {}

  /** Only identical roles are compatible. */
  static noneCompatible<K extends string>(): CompatibilityPolicy<K> {
    return new CompatibilityPolicy<K>(() => false);
  }

  static domainDefault(): CompatibilityPolicy<DomainKind> {
    return CompatibilityPolicy.fromPairs<DomainKind>([['AGGREGATE_ROOT', 'ENTITY']]);
  }

  static portDefault(): CompatibilityPolicy<PortKind> {
    return CompatibilityPolicy.noneCompatible<PortKind>();
  }

  /** Each pair is compatible in both directions. */
  static fromPairs<K extends string>(pairs: ReadonlyArray<readonly [K, K]>): CompatibilityPolicy<K> {
    const keys = new Set<string>();
    for (const [a, b] of pairs) {
      keys.add(`${a}|${b}`);
      keys.add(`${b}|${a}`);
    }
    return new CompatibilityPolicy<K>((a, b) => keys.has(`${a}|${b}`));
  }

  /** The predicate is applied both ways round. */
  static custom<K extends string>(predicate: (a: K, b: K) => boolean): CompatibilityPolicy<K> {
    return new CompatibilityPolicy<K>((a, b) => predicate(a, b) || predicate(b, a));
  }

  areCompatible(a: K, b: K): boolean {
    return a === b || this.predicate(a, b);
  }
}
