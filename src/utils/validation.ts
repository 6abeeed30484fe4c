import { z } from 'zod';
import path from 'path';

const SAFE_IDENTIFIER = /^[a-zA-Z0-9_-]+$/;

/**
 * Project ID validation schema; the ID names a directory under the work dir
 */
export const ProjectIdSchema = z.string()
  .min(1, 'Project ID is required')
  .max(100, 'Project ID too long')
  .regex(SAFE_IDENTIFIER, 'Project ID contains invalid characters');

/**
 * Scene IDs end up in clip file names
 */
export const SceneIdSchema = z.union([
  z.number().int().nonnegative(),
  z.string().min(1).max(100).regex(SAFE_IDENTIFIER, 'Scene ID contains invalid characters'),
]);

/**
 * Validate file path to prevent directory traversal
 */
export function validateFilePath(filePath: string, allowedBasePath: string): boolean {
  const resolvedPath = path.resolve(filePath);
  const resolvedBasePath = path.resolve(allowedBasePath);

  return resolvedPath === resolvedBasePath || resolvedPath.startsWith(resolvedBasePath + path.sep);
}

/**
 * Flatten zod issues into "path: message" lines
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.errors.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}

/**
 * Input sanitization for logs
 */
export function sanitizeForLog(input: string): string {
  return input
    .replace(/(JWT_SECRET=)[^\s]+/g, '$1***')
    .replace(/Bearer\s+[a-zA-Z0-9._-]+/g, 'Bearer ***')
    .replace(/password=[^&\s]+/g, 'password=***')
    .replace(/token=[^&\s]+/g, 'token=***');
}
