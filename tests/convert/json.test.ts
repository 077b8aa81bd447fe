import { fromJson, toJson } from '../../src/convert/json';
import { JsonConversionError } from '../../src/errors';
import { addFeed, addOutline, createDocument, createOutline, documentsEqual, setHeadField } from '../../src/model/document';
import { parseOpml } from '../../src/parsers/opmlParser';
import { toXml } from '../../src/serializers/opmlSerializer';
import { OpmlDocument } from '../../src/types/opml';

function conversionError(value: unknown): JsonConversionError {
  try {
    fromJson(value);
  } catch (err) {
    if (err instanceof JsonConversionError) return err;
    throw err;
  }
  throw new Error('expected fromJson to throw');
}

function sampleDocument(): OpmlDocument {
  const document = createDocument();
  setHeadField(document, 'title', 'Sample');
  const group = addOutline(document.body, createOutline('Group', { attributes: { custom: 'x' } }));
  addFeed(group, 'Feed', 'https://example.com/feed.xml');
  addOutline(document.body, createOutline('Flagged', { isBreakpoint: true }));
  return document;
}

describe('toJson', () => {
  test('should produce the generic tree view', () => {
    expect(toJson(sampleDocument())).toEqual({
      version: '2.0',
      head: { title: 'Sample' },
      body: {
        outlines: [
          {
            text: 'Group',
            attributes: { custom: 'x' },
            outlines: [{ text: 'Feed', xmlUrl: 'https://example.com/feed.xml', attributes: {}, outlines: [] }]
          },
          { text: 'Flagged', isBreakpoint: true, attributes: {}, outlines: [] }
        ]
      }
    });
  });

  test('should use null for an absent head', () => {
    expect(toJson({ body: { outlines: [] } }).head).toBeNull();
  });

  test('should be detached from the document', () => {
    const document = sampleDocument();
    const json = toJson(document);
    json.body.outlines[0].outlines[0].text = 'Changed';
    json.body.outlines[0].attributes.custom = 'y';

    expect(document.body.outlines[0].outlines[0].text).toBe('Feed');
    expect(document.body.outlines[0].attributes.custom).toBe('x');
  });
});

describe('fromJson', () => {
  test('should rebuild a document from its JSON text', () => {
    const document = sampleDocument();

    expect(fromJson(JSON.parse(JSON.stringify(toJson(document))))).toEqual(document);
  });

  test('should accept missing attributes, children and head', () => {
    expect(fromJson({ body: { outlines: [{ text: 'A' }] } })).toEqual({
      body: { outlines: [{ text: 'A', attributes: {}, outlines: [] }] }
    });
    expect(fromJson({ head: null, body: {} })).toEqual({ body: { outlines: [] } });
  });

  test('should bind attribute entries that name outline fields', () => {
    const document = fromJson({
      body: { outlines: [{ text: 'A', url: 'kept', attributes: { type: 'rss', url: 'lost', isComment: 'false', text: 'x' } }] }
    });

    expect(document.body.outlines[0]).toEqual({
      text: 'A',
      type: 'rss',
      url: 'kept',
      isComment: false,
      attributes: {},
      outlines: []
    });
    expect(documentsEqual(parseOpml(toXml(document)), document)).toBe(true);
  });

  test('should keep an attribute named __proto__ from JSON text', () => {
    const document = fromJson(JSON.parse('{"body":{"outlines":[{"text":"A","attributes":{"__proto__":"b"}}]}}'));

    expect(Object.entries(document.body.outlines[0].attributes)).toEqual([['__proto__', 'b']]);
  });

  test('should ignore unknown head keys', () => {
    expect(fromJson({ head: { title: 'T', generator: 'x' }, body: {} }).head).toEqual({ title: 'T' });
  });

  test('should name the path of empty outline text', () => {
    const err = conversionError({ body: { outlines: [{ text: 'A', outlines: [{ text: '' }] }] } });

    expect(err.path).toBe('body.outlines[0].outlines[0].text');
    expect(err.message).toBe('body.outlines[0].outlines[0].text: expected a non-empty string');
  });

  test('should reject wrongly typed fields', () => {
    expect(conversionError({ body: { outlines: [{ text: 'A', isComment: 'true' }] } }).message).toBe(
      'body.outlines[0].isComment: expected a boolean'
    );
    expect(conversionError({ body: { outlines: [{ text: 'A', url: 1 }] } }).path).toBe('body.outlines[0].url');
    expect(conversionError({ body: { outlines: [{ text: 'A', attributes: { n: 1 } }] } }).path).toBe(
      'body.outlines[0].attributes.n'
    );
    expect(conversionError({ head: { title: 5 }, body: {} }).path).toBe('head.title');
    expect(conversionError({ version: 2, body: {} }).path).toBe('version');
  });

  test('should reject structural problems', () => {
    expect(conversionError('nope').path).toBe('document');
    expect(conversionError({}).path).toBe('body');
    expect(conversionError({ body: { outlines: {} } }).path).toBe('body.outlines');
    expect(conversionError({ body: { outlines: [{ text: 'A', outlines: 'x' }] } }).path).toBe(
      'body.outlines[0].outlines'
    );
    expect(conversionError({ body: { outlines: [42] } }).path).toBe('body.outlines[0]');
  });
});
