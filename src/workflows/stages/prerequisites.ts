import { existsSync } from 'node:fs';
import { PrerequisiteError } from '../../errors/index';

/**
 * Throws a PrerequisiteError when a required directory or file is absent
 */
export function requirePath(path: string, description: string): void {
  if (!existsSync(path)) {
    throw new PrerequisiteError(`${description} not found: ${path}`, path);
  }
}
