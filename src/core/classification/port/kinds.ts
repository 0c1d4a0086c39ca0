/**
 * Port roles and directions.
 */
export const PORT_KINDS = [
  'REPOSITORY',
  'USE_CASE',
  'GATEWAY',
  'QUERY',
  'COMMAND',
  'EVENT_PUBLISHER',
  'GENERIC',
] as const;

export type PortKind = (typeof PORT_KINDS)[number];

/** DRIVING ports are called by the outside world, DRIVEN ports call out. */
export type PortDirection = 'DRIVING' | 'DRIVEN';

/** Contribution metadata key carrying the port direction */
export const DIRECTION_KEY = 'direction';

export function isPortKind(value: string): value is PortKind {
  return PORT_KINDS.some((kind) => kind === value);
}

export function isPortDirection(value: unknown): value is PortDirection {
  return value === 'DRIVING' || value === 'DRIVEN';
}
