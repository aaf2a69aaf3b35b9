/**
 * XML parsing and shape validation for checklist sources.
 *
 * fast-xml-parser turns the text into a plain object tree; Zod then checks
 * that the parts the loader reads have the expected shape. Attributes carry
 * an `@_` prefix, mixed text content lives under `#text`, and `category` /
 * `item` elements are always arrays so single children need no special case.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Node schemas
// ---------------------------------------------------------------------------

/** Element whose text is read: either bare text or an object with #text */
const TextNodeSchema = z.union([
  z.string(),
  z.object({ '#text': z.string().optional() }).passthrough(),
]);

/** Empty elements (`<x/>`, `<x></x>`) parse to '' and are read as having no children */
const emptyAsObject = (value: unknown): unknown => (typeof value === 'string' ? {} : value);

const CategoryNodeSchema = z.preprocess(
  emptyAsObject,
  z.object({
    '@_name': z.string().optional(),
    '@_bullet_style': z.string().optional(),
    '@_bulletStyle': z.string().optional(),
    item: z.array(TextNodeSchema).optional(),
  }).passthrough(),
);

const RootNodeSchema = z.preprocess(
  emptyAsObject,
  z.object({
    '@_title': z.string().optional(),
    '@_columns': z.string().optional(),
    title: TextNodeSchema.optional(),
    columns: TextNodeSchema.optional(),
    category: z.array(CategoryNodeSchema).optional(),
  }).passthrough(),
);

export type TextNode = z.infer<typeof TextNodeSchema>;
export type CategoryNode = z.infer<typeof CategoryNodeSchema>;
export type RootNode = z.infer<typeof RootNodeSchema>;

/** Outcome of reading the XML text into a validated root node */
export type XmlTreeResult =
  | { ok: true; rootName: string; root: RootNode }
  | { ok: false; reason: string };

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const ARRAY_TAGS = new Set(['category', 'item']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // decimal and hex character references (&#233; &#xE9;)
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) =>
    !isAttribute && ARRAY_TAGS.has(tagName),
});

const DocumentSchema = z.record(z.unknown());

/** Trimmed text content of an element */
export function textOf(node: TextNode): string {
  const text = typeof node === 'string' ? node : node['#text'] ?? '';
  return text.trim();
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parses checklist XML into its root node.
 *
 * Fails (never throws) when the text is not well-formed XML, has no single
 * root element, or the elements the loader reads have an unexpected shape
 * (e.g. two <title> elements).
 */
export function parseXmlTree(xml: string): XmlTreeResult {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { ok: false, reason: `${msg} (line ${line}, column ${col})` };
  }

  const parsed: unknown = parser.parse(xml);
  const documentNode = DocumentSchema.safeParse(parsed);
  if (!documentNode.success) {
    return { ok: false, reason: 'document has no root element' };
  }

  const entries = Object.entries(documentNode.data);
  if (entries.length !== 1) {
    return { ok: false, reason: `expected a single root element, found ${entries.length}` };
  }

  const [[rootName, rootValue]] = entries;
  const root = RootNodeSchema.safeParse(rootValue);
  if (!root.success) {
    return { ok: false, reason: `unexpected structure in <${rootName}>: ${describeIssues(root.error)}` };
  }

  return { ok: true, rootName, root: root.data };
}
