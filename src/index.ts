export { parseOpml } from './parsers/opmlParser';
export type { ParseOptions } from './parsers/opmlParser';
export { toXml, documentEvents, outlineAttributes } from './serializers/opmlSerializer';
export type { SerializeOptions } from './serializers/opmlSerializer';
export {
  createDocument,
  createOutline,
  addOutline,
  addFeed,
  setHeadField,
  flattenOutlines,
  categoriesOf,
  outlinesEqual,
  headsEqual,
  documentsEqual,
} from './model/document';
export { toJson, fromJson } from './convert/json';
export type { OpmlJson, OutlineJson } from './convert/json';
export { OpmlParseError, JsonConversionError, isOpmlParseError } from './errors';
export type { ParseErrorKind, ParseErrorContext } from './errors';
export { readXml } from './xml/xmlReader';
export { writeXml, escapeText, escapeAttribute, XML_DECLARATION } from './xml/xmlWriter';
export type { WriteOptions } from './xml/xmlWriter';
export * from './types/opml';
export * from './types/xml';
