/**
 * Barrel export for all checklist type definitions.
 *
 * Consumers should import from this module:
 *   import type { ChecklistDocument, BulletStyle } from './types/index.js';
 */

export type {
  BulletKind,
  BulletStyle,
  ChecklistCategory,
  ChecklistDocument,
  ChecklistSchema,
} from './checklist.js';

export { CHECKLIST_SCHEMAS, DEFAULT_TITLE, isChecklistSchema } from './checklist.js';
