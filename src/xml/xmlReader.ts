import * as sax from 'sax';
import { OpmlParseError } from '../errors';
import { XmlAttribute, XmlEvent } from '../types/xml';

/**
 * Tokenize `text` into open/text/close events using sax in strict mode.
 * Comments, processing instructions and the doctype are dropped. Attributes
 * keep document order; sax drops a repeated attribute name, so the first
 * occurrence wins. Throws an OpmlParseError of kind MalformedXml on the first
 * well-formedness error.
 */
export function readXml(text: string): XmlEvent[] {
  const parser = sax.parser(true, { position: true });
  const events: XmlEvent[] = [];

  const position = () => ({ line: parser.line + 1, column: parser.column });

  // collected per attribute: sax keeps them on a plain object, which loses `__proto__`
  let attributes: XmlAttribute[] = [];

  parser.onattribute = (attribute: { name: string; value: string }) => {
    if (!attributes.some((a) => a.name === attribute.name)) {
      attributes.push({ name: attribute.name, value: attribute.value });
    }
  };

  parser.onopentag = (node: sax.Tag | sax.QualifiedTag) => {
    events.push({ type: 'open', name: node.name, attributes, ...position() });
    attributes = [];
  };

  parser.ontext = (value: string) => {
    events.push({ type: 'text', value, ...position() });
  };

  parser.oncdata = (value: string) => {
    events.push({ type: 'text', value, ...position() });
  };

  parser.onclosetag = (name: string) => {
    events.push({ type: 'close', name, ...position() });
  };

  parser.onerror = (err: Error) => {
    // sax appends "\nLine: ..\nColumn: ..\nChar: .." to its messages
    const detail = err.message.split('\n')[0];
    throw new OpmlParseError('MalformedXml', detail, position());
  };

  parser.write(text).close();

  return events;
}
