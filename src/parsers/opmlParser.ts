import { isHeadField, SUPPORTED_VERSIONS } from '../config/opmlFields';
import { OpmlParseError } from '../errors';
import { bindOutlineAttribute } from '../model/document';
import { Body, Head, HeadField, OpmlDocument, Outline } from '../types/opml';
import { XmlEvent, XmlOpenEvent } from '../types/xml';
import { readXml } from '../xml/xmlReader';

export interface ParseOptions {
  /** Deepest outline nesting accepted; root outlines are at depth 1. Unlimited when unset. */
  maxDepth?: number;
  /** Reject `<opml version>` values other than 1.0, 1.1 and 2.0. */
  strictVersion?: boolean;
  /** Reject a `<body>` without any `<outline>`. */
  requireOutlines?: boolean;
}

type Frame =
  | { kind: 'opml' }
  | { kind: 'head' }
  | { kind: 'headField'; field: HeadField; text: string }
  | { kind: 'body'; body: Body }
  | { kind: 'outline'; outline: Outline; depth: number }
  | { kind: 'ignored' };

function contextOf(event: XmlEvent, element: string) {
  return { line: event.line, column: event.column, element };
}

/** Build an outline from its start tag. Requires a non-empty `text`. */
function outlineFromTag(event: XmlOpenEvent): Outline {
  const text = event.attributes.find((a) => a.name === 'text');
  if (!text || text.value === '') {
    throw new OpmlParseError(
      'MissingOutlineText',
      text ? 'outline has an empty text attribute' : 'outline has no text attribute',
      contextOf(event, 'outline')
    );
  }

  const outline: Outline = { text: text.value, attributes: {}, outlines: [] };

  for (const { name, value } of event.attributes) {
    bindOutlineAttribute(outline, name, value);
  }

  return outline;
}

/**
 * Parse OPML text into a document. The outline tree is built with an
 * explicit frame stack, so nesting depth is not bounded by the call stack.
 * Throws OpmlParseError; never returns a partial document.
 */
export function parseOpml(text: string, options: ParseOptions = {}): OpmlDocument {
  const events = readXml(text);
  const stack: Frame[] = [];
  let sawRoot = false;
  let head: Head | undefined;
  let body: Body | undefined;

  for (const event of events) {
    const top: Frame | undefined = stack[stack.length - 1];

    if (event.type === 'text') {
      if (top?.kind === 'headField') {
        top.text += event.value;
      }
      continue;
    }

    if (event.type === 'close') {
      const frame = stack.pop();
      if (frame?.kind === 'headField' && head) {
        head[frame.field] = frame.text;
      }
      continue;
    }

    if (!top) {
      if (sawRoot || event.name !== 'opml') {
        throw new OpmlParseError(
          'MissingRootElement',
          `expected <opml> as the document element, found <${event.name}>`,
          contextOf(event, event.name)
        );
      }
      sawRoot = true;
      const version = event.attributes.find((a) => a.name === 'version');
      if (options.strictVersion && version && !SUPPORTED_VERSIONS.includes(version.value)) {
        throw new OpmlParseError(
          'UnsupportedVersion',
          `unsupported OPML version "${version.value}"`,
          contextOf(event, 'opml')
        );
      }
      stack.push({ kind: 'opml' });
      continue;
    }

    switch (top.kind) {
      case 'opml':
        if (event.name === 'head') {
          if (head) {
            throw new OpmlParseError('DuplicateHeadElement', 'more than one <head> element', contextOf(event, 'head'));
          }
          head = {};
          stack.push({ kind: 'head' });
        } else if (event.name === 'body') {
          if (body) {
            throw new OpmlParseError('DuplicateBodyElement', 'more than one <body> element', contextOf(event, 'body'));
          }
          body = { outlines: [] };
          stack.push({ kind: 'body', body });
        } else {
          stack.push({ kind: 'ignored' });
        }
        break;

      case 'head':
        // first occurrence of a field wins
        if (isHeadField(event.name) && head?.[event.name] === undefined) {
          stack.push({ kind: 'headField', field: event.name, text: '' });
        } else {
          stack.push({ kind: 'ignored' });
        }
        break;

      case 'body':
      case 'outline': {
        if (event.name !== 'outline') {
          stack.push({ kind: 'ignored' });
          break;
        }
        const depth = top.kind === 'outline' ? top.depth + 1 : 1;
        if (options.maxDepth !== undefined && depth > options.maxDepth) {
          throw new OpmlParseError(
            'OutlineDepthExceeded',
            `outline nesting deeper than ${options.maxDepth}`,
            contextOf(event, 'outline')
          );
        }
        const outline = outlineFromTag(event);
        const parent = top.kind === 'outline' ? top.outline : top.body;
        parent.outlines.push(outline);
        stack.push({ kind: 'outline', outline, depth });
        break;
      }

      default:
        stack.push({ kind: 'ignored' });
    }
  }

  if (!sawRoot) {
    throw new OpmlParseError('MissingRootElement', 'document has no <opml> element');
  }
  if (!body) {
    throw new OpmlParseError('MissingBodyElement', '<opml> has no <body> element', { element: 'opml' });
  }
  if (options.requireOutlines && body.outlines.length === 0) {
    throw new OpmlParseError('BodyHasNoOutlines', '<body> contains no <outline> elements', { element: 'body' });
  }

  return head ? { head, body } : { body };
}
