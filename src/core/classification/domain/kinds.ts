/**
 * Tactical DDD roles a type can play.
 */
export const DOMAIN_KINDS = [
  'AGGREGATE_ROOT',
  'ENTITY',
  'VALUE_OBJECT',
  'IDENTIFIER',
  'DOMAIN_EVENT',
  'DOMAIN_SERVICE',
  'APPLICATION_SERVICE',
] as const;

export type DomainKind = (typeof DOMAIN_KINDS)[number];

export function isDomainKind(value: string): value is DomainKind {
  return DOMAIN_KINDS.some((kind) => kind === value);
}
