import { z, ZodError, ZodSchema } from 'zod';
import { SchemaValidationError } from '../errors/index.js';

/**
 * Registry Validation Schemas
 *
 * Zod schemas for the release group registry and technical keyword lists,
 * whether embedded or supplied by the user.
 */

const nameSchema = z.string()
  .trim()
  .min(1, 'Name must not be empty')
  .max(255, 'Name must be 255 characters or less');

/**
 * Release group registry: array of group names in canonical casing
 */
export const releaseGroupRegistrySchema = z.array(nameSchema);

/**
 * Technical keyword list: array of non-empty tokens
 */
export const technicalKeywordSchema = z.array(
  z.string().trim().min(1, 'Keyword must not be empty')
);

/**
 * Parse data against a schema, converting Zod failures into SchemaValidationError
 */
export function parseWithSchema<T>(schema: ZodSchema<T>, data: unknown, source: string): T {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const errors = error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new SchemaValidationError(
        errors,
        `Invalid data in ${source}: ${errors.map(e => `[${e.path}] ${e.message}`).join('; ')}`,
        { operation: 'parseWithSchema', metadata: { source } }
      );
    }
    throw error;
  }
}
