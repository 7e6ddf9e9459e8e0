/**
 * @fileoverview Default session state template
 *
 * New sessions start from a versioned JSON document. The bundled template
 * lives in `templates/default-state.json`; deployments may point
 * `state.templatePath` at their own.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { SessionState } from '../types/state.js';
import { WayfarerError } from '../errors/errors.js';
import { ErrorCodes } from '../errors/codes.js';
import { stateTemplateSchema, type StateTemplate } from './schemas.js';
import { formatValidationMessage, zodErrorToIssues } from '../utils/validation.js';

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(
  new URL('../../templates/default-state.json', import.meta.url)
);

/**
 * Read and validate a state template
 */
export function loadStateTemplate(path: string = DEFAULT_TEMPLATE_PATH): StateTemplate {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new WayfarerError(`Cannot read state template at ${path}`, {
      code: ErrorCodes.TEMPLATE_INVALID,
      category: 'configuration',
      context: { path },
      cause: error,
    });
  }

  const result = stateTemplateSchema.safeParse(raw);
  if (!result.success) {
    throw new WayfarerError(
      `Invalid state template at ${path}: ${formatValidationMessage(zodErrorToIssues(result.error))}`,
      { code: ErrorCodes.TEMPLATE_INVALID, category: 'configuration', context: { path } }
    );
  }
  return result.data;
}

/**
 * Independent copy of the template state for a new session
 */
export function createInitialState(template: StateTemplate): SessionState {
  return structuredClone(template.state);
}
