import { XmlAttribute, XmlWriteEvent } from '../types/xml';

export interface WriteOptions {
  /** Indentation unit. When set, element-only content is broken over lines. */
  indent?: string;
  /** Prepend `<?xml version="1.0" encoding="UTF-8"?>`. */
  declaration?: boolean;
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function escapeText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/** Also encodes tab, CR and LF, which attribute value normalization would turn into spaces. */
export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;');
}

interface OpenElement {
  name: string;
  hasElements: boolean;
  hasText: boolean;
}

function startTag(name: string, attributes: XmlAttribute[]): string {
  const attrs = attributes.map((a) => ` ${a.name}="${escapeAttribute(a.value)}"`).join('');
  return `<${name}${attrs}`;
}

/**
 * Write a balanced event sequence as XML text. Empty elements are
 * self-closed. Throws on an unbalanced sequence.
 */
export function writeXml(events: Iterable<XmlWriteEvent>, options: WriteOptions = {}): string {
  const indent = options.indent ?? '';
  const parts: string[] = [];
  const stack: OpenElement[] = [];
  // start tag still waiting for its '>' or '/>'
  let pending: string | null = null;

  const flushPending = () => {
    if (pending !== null) {
      parts.push(`${pending}>`);
      pending = null;
    }
  };

  const newline = (depth: number) => {
    if (indent) {
      parts.push(`\n${indent.repeat(depth)}`);
    }
  };

  for (const event of events) {
    const current = stack[stack.length - 1];

    if (event.type === 'open') {
      flushPending();
      if (current) {
        current.hasElements = true;
        if (!current.hasText) {
          newline(stack.length);
        }
      }
      pending = startTag(event.name, event.attributes);
      stack.push({ name: event.name, hasElements: false, hasText: false });
      continue;
    }

    if (event.type === 'text') {
      if (!current) {
        throw new Error('Text written outside of any element');
      }
      if (event.value === '') {
        continue;
      }
      flushPending();
      current.hasText = true;
      parts.push(escapeText(event.value));
      continue;
    }

    if (!current || current.name !== event.name) {
      throw new Error(`Unbalanced close of <${event.name}>`);
    }
    stack.pop();
    if (pending !== null) {
      parts.push(`${pending}/>`);
      pending = null;
    } else {
      if (current.hasElements && !current.hasText) {
        newline(stack.length);
      }
      parts.push(`</${event.name}>`);
    }
  }

  if (stack.length > 0) {
    throw new Error(`Unclosed element <${stack[stack.length - 1].name}>`);
  }

  const body = parts.join('');
  if (!options.declaration) {
    return body;
  }
  return indent ? `${XML_DECLARATION}\n${body}` : `${XML_DECLARATION}${body}`;
}
