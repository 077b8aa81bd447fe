import { HEAD_FIELDS, OPML_VERSION, OUTLINE_ATTRIBUTES } from '../config/opmlFields';
import { JsonConversionError } from '../errors';
import { bindOutlineAttribute, setAttribute } from '../model/document';
import { Head, OpmlDocument, Outline } from '../types/opml';

export type OutlineJson = Outline;

/** Generic tree view of a document, suitable for JSON.stringify. */
export interface OpmlJson {
  version: string;
  head: Head | null;
  body: { outlines: OutlineJson[] };
}

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function copyHead(head: Head): Head {
  const copy: Head = {};
  for (const field of HEAD_FIELDS) {
    const value = head[field];
    if (value !== undefined) copy[field] = value;
  }
  return copy;
}

/**
 * Walk `roots` iteratively, handing each source outline to `convert` and
 * attaching the result to its converted parent.
 */
function mapTree<S>(
  roots: readonly S[],
  rootPath: string,
  childrenOf: (source: S, path: string) => readonly S[],
  convert: (source: S, path: string) => Outline
): Outline[] {
  const result: Outline[] = [];
  const stack: Array<{ source: S; path: string; into: Outline[] }> = [];
  for (let i = roots.length - 1; i >= 0; i--) {
    stack.push({ source: roots[i], path: `${rootPath}[${i}]`, into: result });
  }

  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;
    const outline = convert(item.source, item.path);
    item.into.push(outline);
    const children = childrenOf(item.source, item.path);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ source: children[i], path: `${item.path}.outlines[${i}]`, into: outline.outlines });
    }
  }

  return result;
}

function copyOutline(outline: Outline): Outline {
  const copy: Outline = { text: outline.text, attributes: { ...outline.attributes }, outlines: [] };
  for (const spec of OUTLINE_ATTRIBUTES) {
    if (spec.kind === 'string') {
      const value = outline[spec.name];
      if (value !== undefined) copy[spec.name] = value;
    } else if (spec.kind === 'flag') {
      const value = outline[spec.name];
      if (value !== undefined) copy[spec.name] = value;
    }
  }
  return copy;
}

/** Detached JSON view with fields in canonical order and absent fields omitted. */
export function toJson(document: OpmlDocument): OpmlJson {
  return {
    version: OPML_VERSION,
    head: document.head ? copyHead(document.head) : null,
    body: {
      outlines: mapTree(document.body.outlines, 'body.outlines', (o) => o.outlines, copyOutline),
    },
  };
}

function readHead(value: unknown): Head | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new JsonConversionError('head', 'expected an object or null');
  }
  const head: Head = {};
  for (const field of HEAD_FIELDS) {
    const fieldValue = value[field];
    if (fieldValue === undefined) continue;
    if (typeof fieldValue !== 'string') {
      throw new JsonConversionError(`head.${field}`, 'expected a string');
    }
    head[field] = fieldValue;
  }
  return head;
}

function readAttributes(value: unknown, path: string): Record<string, string> {
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw new JsonConversionError(path, 'expected an object of strings');
  }
  const attributes: Record<string, string> = {};
  for (const [name, attributeValue] of Object.entries(value)) {
    if (typeof attributeValue !== 'string') {
      throw new JsonConversionError(`${path}.${name}`, 'expected a string');
    }
    setAttribute(attributes, name, attributeValue);
  }
  return attributes;
}

function childArray(value: unknown, path: string): readonly unknown[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new JsonConversionError(path, 'expected an array');
  }
  return value;
}

function readOutline(value: unknown, path: string): Outline {
  if (!isObject(value)) {
    throw new JsonConversionError(path, 'expected an object');
  }
  const text = value.text;
  if (typeof text !== 'string' || text === '') {
    throw new JsonConversionError(`${path}.text`, 'expected a non-empty string');
  }

  const outline: Outline = { text, attributes: {}, outlines: [] };
  for (const [name, attributeValue] of Object.entries(readAttributes(value.attributes, `${path}.attributes`))) {
    bindOutlineAttribute(outline, name, attributeValue);
  }

  for (const spec of OUTLINE_ATTRIBUTES) {
    const fieldValue = value[spec.name];
    if (spec.kind === 'text' || fieldValue === undefined) continue;
    if (spec.kind === 'string') {
      if (typeof fieldValue !== 'string') {
        throw new JsonConversionError(`${path}.${spec.name}`, 'expected a string');
      }
      outline[spec.name] = fieldValue;
      delete outline.attributes[spec.name];
    } else {
      if (typeof fieldValue !== 'boolean') {
        throw new JsonConversionError(`${path}.${spec.name}`, 'expected a boolean');
      }
      outline[spec.name] = fieldValue;
      delete outline.attributes[spec.name];
    }
  }

  return outline;
}

/**
 * Build a document from a value in the shape produced by toJson. Throws
 * JsonConversionError naming the first offending path.
 */
export function fromJson(value: unknown): OpmlDocument {
  if (!isObject(value)) {
    throw new JsonConversionError('document', 'expected an object');
  }
  const { version, body: bodyValue } = value;
  if (version !== undefined && typeof version !== 'string') {
    throw new JsonConversionError('version', 'expected a string');
  }
  if (!isObject(bodyValue)) {
    throw new JsonConversionError('body', 'expected an object');
  }

  const head = readHead(value.head);
  const roots = childArray(bodyValue.outlines, 'body.outlines');
  const outlines = mapTree(
    roots,
    'body.outlines',
    (source, path) => childArray(isObject(source) ? source.outlines : undefined, `${path}.outlines`),
    readOutline
  );

  const body = { outlines };
  return head ? { head, body } : { body };
}
