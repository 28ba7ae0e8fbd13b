/**
 * @arch shiftmap.infra.fs
 *
 * YAML parsing utilities. JSON documents parse through the same path.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes, getErrorMessage } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${getErrorMessage(error)}`,
      { error: getErrorMessage(error) }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 * Validation failures are raised with the given error code.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T,
  invalidCode: string = ErrorCodes.PARSE_ERROR
): z.output<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      invalidCode,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T,
  invalidCode: string = ErrorCodes.PARSE_ERROR
): Promise<z.output<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_READ_ERROR,
      `Failed to read file: ${filePath}`,
      { filePath, error: getErrorMessage(error) }
    );
  }

  try {
    return parseYamlWithSchema(content, schema, invalidCode);
  } catch (error) {
    if (error instanceof SystemError) {
      // Re-throw with file path context
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.map(String).join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
