/**
 * JSON parsing and schema-validated loading for configuration files.
 */
import { z } from 'zod';
import { ConfigError, ErrorCodes } from './errors.js';
import { fileExistsSync, readFileSync } from './file-system.js';

/**
 * Parse JSON content into an unknown value.
 */
export function parseJson(content: string, source: string = '<inline>'): unknown {
  try {
    const value: unknown = JSON.parse(content);
    return value;
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID_JSON,
      `Invalid JSON in ${source}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { source }
    );
  }
}

/**
 * Parse and validate JSON content with a Zod schema.
 */
export function parseJsonWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T,
  source: string = '<inline>'
): z.infer<T> {
  const parsed = parseJson(content, source);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID_SCHEMA,
      `Invalid configuration in ${source}: ${formatZodError(result.error)}`,
      { source, errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a JSON file with a Zod schema.
 * Synchronous: configuration is read once, before any analysis runs.
 */
export function loadJsonWithSchemaSync<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): z.infer<T> {
  if (!fileExistsSync(filePath)) {
    throw new ConfigError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Config file not found: ${filePath}`,
      { filePath }
    );
  }
  return parseJsonWithSchema(readFileSync(filePath), schema, filePath);
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
