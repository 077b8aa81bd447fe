import { HEAD_FIELDS, OPML_VERSION, OUTLINE_ATTRIBUTES, outlineAttributeSpec } from '../config/opmlFields';
import { Head, OpmlDocument, Outline } from '../types/opml';
import { XmlAttribute, XmlWriteEvent } from '../types/xml';
import { WriteOptions, writeXml } from '../xml/xmlWriter';

export type SerializeOptions = WriteOptions;

/**
 * Named fields first, in canonical order, then the remaining attributes in
 * insertion order. A leftover attribute is dropped when the named field of
 * the same name is set, so an attribute is never written twice.
 */
export function outlineAttributes(outline: Outline): XmlAttribute[] {
  const attributes: XmlAttribute[] = [];

  for (const spec of OUTLINE_ATTRIBUTES) {
    const value = outline[spec.name];
    if (value !== undefined) {
      attributes.push({ name: spec.name, value: String(value) });
    }
  }

  for (const [name, value] of Object.entries(outline.attributes)) {
    const spec = outlineAttributeSpec(name);
    if (spec && (spec.kind === 'text' || outline[spec.name] !== undefined)) {
      continue;
    }
    attributes.push({ name, value });
  }

  return attributes;
}

function* headEvents(head: Head): Generator<XmlWriteEvent> {
  yield { type: 'open', name: 'head', attributes: [] };
  for (const field of HEAD_FIELDS) {
    const value = head[field];
    if (value !== undefined) {
      yield { type: 'open', name: field, attributes: [] };
      yield { type: 'text', value };
      yield { type: 'close', name: field };
    }
  }
  yield { type: 'close', name: 'head' };
}

function* outlineEvents(roots: readonly Outline[]): Generator<XmlWriteEvent> {
  // null marks the point where the most recently opened outline closes
  const stack: Array<Outline | null> = [...roots].reverse();

  while (stack.length > 0) {
    const outline = stack.pop();
    if (outline === undefined) break;
    if (outline === null) {
      yield { type: 'close', name: 'outline' };
      continue;
    }
    yield { type: 'open', name: 'outline', attributes: outlineAttributes(outline) };
    stack.push(null);
    for (let i = outline.outlines.length - 1; i >= 0; i--) {
      stack.push(outline.outlines[i]);
    }
  }
}

export function* documentEvents(document: OpmlDocument): Generator<XmlWriteEvent> {
  yield { type: 'open', name: 'opml', attributes: [{ name: 'version', value: OPML_VERSION }] };
  if (document.head) {
    yield* headEvents(document.head);
  }
  yield { type: 'open', name: 'body', attributes: [] };
  yield* outlineEvents(document.body.outlines);
  yield { type: 'close', name: 'body' };
  yield { type: 'close', name: 'opml' };
}

/**
 * Serialize a document as OPML 2.0. Cannot fail for a document whose
 * outlines all have text; it does not re-validate.
 */
export function toXml(document: OpmlDocument, options: SerializeOptions = {}): string {
  return writeXml(documentEvents(document), options);
}
