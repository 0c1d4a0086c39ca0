/**
 * Criteria profiles: per-criterion priority overrides.
 *
 * Profile file format:
 * ```yaml
 * priorities:
 *   domain.naming.domainEvent: 90
 *   port.package.in: 40
 * ```
 */
import { z } from 'zod';
import { ConfigError, ErrorCodes, HexprobeError } from '../../utils/errors.js';
import { readFile } from '../../utils/file-system.js';
import { formatZodError, parseYaml } from '../../utils/yaml.js';
import { criteriaKey, type ClassificationCriteria } from './criteria.js';

type PrioritySource = Pick<ClassificationCriteria<string>, 'id' | 'name' | 'priority'>;

export class CriteriaProfile {
  private constructor(private readonly overrides: ReadonlyMap<string, number>) {}

  /** No overrides: every criterion keeps its default priority. */
  static legacy(): CriteriaProfile {
    return new CriteriaProfile(new Map());
  }

  static of(overrides: Record<string, number>): CriteriaProfile {
    return new CriteriaProfile(new Map(Object.entries(overrides)));
  }

  /**
   * New profile with the given overrides layered over this one.
   */
  withOverrides(overrides: Record<string, number> | ReadonlyMap<string, number>): CriteriaProfile {
    const merged = new Map(this.overrides);
    const entries = overrides instanceof Map ? overrides.entries() : Object.entries(overrides);
    for (const [key, value] of entries) {
      merged.set(key, value);
    }
    return new CriteriaProfile(merged);
  }

  resolvePriority(criteria: PrioritySource): number {
    return this.overrides.get(criteriaKey(criteria)) ?? criteria.priority;
  }

  hasOverride(key: string): boolean {
    return this.overrides.has(key);
  }

  get size(): number {
    return this.overrides.size;
  }
}

// ---------------------------------------------------------------------------
// YAML profiles
// ---------------------------------------------------------------------------

const ProfileDocumentSchema = z
  .object({
    priorities: z
      .record(
        z.string(),
        z.number({ invalid_type_error: 'expected integer' }).transform((n) => Math.trunc(n)),
        { invalid_type_error: 'priorities must be a map' }
      )
      .nullish(),
  })
  .nullish();

/**
 * Parse a YAML profile. An empty document or an empty `priorities` key
 * yields a profile without overrides; fractional priorities are truncated.
 */
export function parseYamlProfile(content: string): CriteriaProfile {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.INVALID_PROFILE,
      `Invalid criteria profile: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ProfileDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_PROFILE,
      `Invalid criteria profile: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return CriteriaProfile.of(result.data?.priorities ?? {});
}

export async function loadYamlProfile(filePath: string): Promise<CriteriaProfile> {
  try {
    return parseYamlProfile(await readFile(filePath));
  } catch (error) {
    if (error instanceof HexprobeError) {
      throw new ConfigError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load criteria profile: ${filePath}`,
      { filePath, error }
    );
  }
}
