import { HEAD_FIELDS, OUTLINE_ATTRIBUTES, outlineAttributeSpec } from '../config/opmlFields';
import { OpmlParseError } from '../errors';
import { Body, Head, HeadField, OpmlDocument, Outline, OutlineFields } from '../types/opml';

/** An empty document: empty head, no outlines. */
export function createDocument(): OpmlDocument {
  return { head: {}, body: { outlines: [] } };
}

/** Store an entry as an own property, including names such as `__proto__`. */
export function setAttribute(attributes: Record<string, string>, name: string, value: string): void {
  Object.defineProperty(attributes, name, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Bind one raw outline attribute. Named string fields take any value; flags
 * bind only when they read `true` or `false` and are otherwise kept verbatim
 * with the unknown attributes. `text` is left to the caller.
 */
export function bindOutlineAttribute(outline: Outline, name: string, value: string): void {
  const spec = outlineAttributeSpec(name);
  if (!spec) {
    setAttribute(outline.attributes, name, value);
  } else if (spec.kind === 'string') {
    outline[spec.name] = value;
  } else if (spec.kind === 'flag') {
    if (value === 'true' || value === 'false') {
      outline[spec.name] = value === 'true';
    } else {
      setAttribute(outline.attributes, name, value);
    }
  }
}

/**
 * Build an outline. Fields left undefined stay absent on the result.
 * Entries of `attributes` that name an outline field are bound to it the way
 * the parser binds them; an explicit field wins over such an entry.
 * Throws MissingOutlineText when `text` is empty.
 */
export function createOutline(text: string, fields: OutlineFields = {}): Outline {
  if (text === '') {
    throw new OpmlParseError('MissingOutlineText', 'outline text must not be empty');
  }

  const outline: Outline = { text, attributes: {}, outlines: [] };
  for (const [name, value] of Object.entries(fields.attributes ?? {})) {
    bindOutlineAttribute(outline, name, value);
  }
  for (const spec of OUTLINE_ATTRIBUTES) {
    if (spec.kind === 'string') {
      const value = fields[spec.name];
      if (value === undefined) continue;
      outline[spec.name] = value;
      delete outline.attributes[spec.name];
    } else if (spec.kind === 'flag') {
      const value = fields[spec.name];
      if (value === undefined) continue;
      outline[spec.name] = value;
      delete outline.attributes[spec.name];
    }
  }
  return outline;
}

export function addOutline(parent: Body | Outline, outline: Outline): Outline {
  parent.outlines.push(outline);
  return outline;
}

/** Append a feed entry (`text` + `xmlUrl`) to a body or a grouping outline. */
export function addFeed(parent: Body | Outline, text: string, xmlUrl: string): Outline {
  return addOutline(parent, createOutline(text, { xmlUrl }));
}

/** Set a head field, or clear it with `undefined`. Creates the head if needed. */
export function setHeadField(document: OpmlDocument, field: HeadField, value: string | undefined): Head {
  const head = document.head ?? {};
  if (value === undefined) {
    delete head[field];
  } else {
    head[field] = value;
  }
  document.head = head;
  return head;
}

/** Every outline in the tree, parents before children, siblings in document order. */
export function flattenOutlines(outlines: readonly Outline[]): Outline[] {
  const result: Outline[] = [];
  const stack: Outline[] = [...outlines].reverse();

  while (stack.length > 0) {
    const outline = stack.pop();
    if (!outline) break;
    result.push(outline);
    for (let i = outline.outlines.length - 1; i >= 0; i--) {
      stack.push(outline.outlines[i]);
    }
  }

  return result;
}

export function categoriesOf(outline: Outline): string[] {
  if (outline.category === undefined) {
    return [];
  }
  return outline.category
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

function sameAttributes(a: Record<string, string>, b: Record<string, string>): boolean {
  const left = Object.entries(a);
  const right = Object.entries(b);
  if (left.length !== right.length) return false;
  return left.every(([name, value], i) => right[i][0] === name && right[i][1] === value);
}

function sameFields(a: Outline, b: Outline): boolean {
  return OUTLINE_ATTRIBUTES.every((spec) => a[spec.name] === b[spec.name])
    && sameAttributes(a.attributes, b.attributes);
}

/** Structural equality; child order and unknown attribute order both count. */
export function outlinesEqual(a: Outline, b: Outline): boolean {
  const pending: Array<[Outline, Outline]> = [[a, b]];

  while (pending.length > 0) {
    const pair = pending.pop();
    if (!pair) break;
    const [left, right] = pair;
    if (!sameFields(left, right) || left.outlines.length !== right.outlines.length) {
      return false;
    }
    left.outlines.forEach((child, i) => pending.push([child, right.outlines[i]]));
  }

  return true;
}

export function headsEqual(a: Head | undefined, b: Head | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return HEAD_FIELDS.every((field) => a[field] === b[field]);
}

export function documentsEqual(a: OpmlDocument, b: OpmlDocument): boolean {
  if (!headsEqual(a.head, b.head)) return false;
  if (a.body.outlines.length !== b.body.outlines.length) return false;
  return a.body.outlines.every((outline, i) => outlinesEqual(outline, b.body.outlines[i]));
}
