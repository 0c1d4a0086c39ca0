/**
 * Loading and validation of source model documents (YAML or JSON).
 */
import { ErrorCodes, SystemError } from '../../utils/errors.js';
import { formatZodError, loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import { SourceModelSchema, type SourceModel, type SourceModelInput } from './schema.js';

/**
 * Validate an in-memory source model and apply defaults.
 */
export function createSourceModel(input: SourceModelInput): SourceModel {
  const result = SourceModelSchema.safeParse(input);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_SOURCE_MODEL,
      `Invalid source model: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

export function parseSourceModel(content: string): SourceModel {
  return parseYamlWithSchema(content, SourceModelSchema, ErrorCodes.INVALID_SOURCE_MODEL);
}

export async function loadSourceModel(filePath: string): Promise<SourceModel> {
  return loadYamlWithSchema(filePath, SourceModelSchema, ErrorCodes.INVALID_SOURCE_MODEL);
}
