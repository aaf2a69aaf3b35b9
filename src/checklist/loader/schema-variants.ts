/**
 * Source schema strategies.
 *
 * Both XML layouts share the <category>/<item> structure and differ only in
 * where the title and column count live:
 *
 *   elements:   <checklist><title>Trip</title><columns>2</columns>...</checklist>
 *   attributes: <checklist title="Trip">...</checklist>
 *
 * In the attributes layout the column count is fixed by the caller; a
 * `columns` root attribute is only read when the caller fixes none.
 */

import type { ChecklistSchema } from '../types/index.js';
import { textOf } from './xml-tree.js';
import type { RootNode } from './xml-tree.js';

/** Raw column count text and where it was read from (for error messages) */
export interface ColumnSource {
  raw: string;
  field: string;
}

export interface SchemaVariant {
  readonly name: ChecklistSchema;
  /** Title text, or undefined when the source has none */
  readTitle(root: RootNode): string | undefined;
  /**
   * Column count text to parse, or undefined when the count comes from
   * the caller (`fixedColumnCount`, then 1).
   */
  readColumns(root: RootNode, fixedColumnCount: number | undefined): ColumnSource | undefined;
}

const elementsVariant: SchemaVariant = {
  name: 'elements',
  readTitle: (root) => (root.title === undefined ? undefined : textOf(root.title)),
  readColumns: (root) =>
    root.columns === undefined
      ? undefined
      : { raw: textOf(root.columns), field: '<columns> element' },
};

const attributesVariant: SchemaVariant = {
  name: 'attributes',
  readTitle: (root) => root['@_title']?.trim(),
  readColumns: (root, fixedColumnCount) => {
    if (fixedColumnCount !== undefined || root['@_columns'] === undefined) return undefined;
    return { raw: root['@_columns'], field: 'columns attribute' };
  },
};

const VARIANTS: Record<ChecklistSchema, SchemaVariant> = {
  elements: elementsVariant,
  attributes: attributesVariant,
};

export function getSchemaVariant(schema: ChecklistSchema): SchemaVariant {
  return VARIANTS[schema];
}
