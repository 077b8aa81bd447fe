import request from 'supertest';
import { Express } from 'express';
import * as fs from 'fs';
import * as path from 'path';
import { createApp } from '../src/app';

const SAMPLE = fs.readFileSync(path.join(__dirname, 'fixtures/subscriptions.opml'));

describe('Server', () => {
  let app: Express;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeAll(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    app = createApp({ port: 0, maxUploadBytes: 1024 * 1024, parseOptions: { maxDepth: 8 } });
  });

  afterAll(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  test('GET /health should return ok', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
  });

  test('POST /api/parse should return the JSON view of an uploaded file', async () => {
    const response = await request(app)
      .post('/api/parse')
      .attach('opmlfile', SAMPLE, 'feeds.opml')
      .expect(200);

    expect(response.body.success).toBe(true);
    expect(response.body.outlineCount).toBe(4);
    expect(response.body.document.version).toBe('2.0');
    expect(response.body.document.head).toEqual({ title: 'Sample Subscriptions', ownerName: 'Test Owner' });
    expect(response.body.document.body.outlines[1].attributes).toEqual({ customAttr: 'kept' });
  });

  test('POST /api/parse should report parse errors with their kind', async () => {
    const response = await request(app)
      .post('/api/parse')
      .attach('opmlfile', Buffer.from('<opml><head/></opml>'), 'broken.opml')
      .expect(422);

    expect(response.body).toEqual({
      success: false,
      error: { kind: 'MissingBodyElement', message: 'MissingBodyElement: <opml> has no <body> element' }
    });
  });

  test('POST /api/parse should apply the configured depth limit', async () => {
    const deep = `<opml><body>${'<outline text="n">'.repeat(9)}${'</outline>'.repeat(9)}</body></opml>`;
    const response = await request(app)
      .post('/api/parse')
      .attach('opmlfile', Buffer.from(deep), 'deep.xml')
      .expect(422);

    expect(response.body.error.kind).toBe('OutlineDepthExceeded');
  });

  test('POST /api/parse should reject other file types', async () => {
    const response = await request(app)
      .post('/api/parse')
      .attach('opmlfile', Buffer.from('hello'), { filename: 'notes.txt', contentType: 'text/plain' })
      .expect(400);

    expect(response.body).toEqual({ success: false, error: { message: 'Only OPML or XML files are allowed' } });
  });

  test('POST /api/parse should require a file', async () => {
    const response = await request(app).post('/api/parse').expect(400);

    expect(response.body).toEqual({ success: false, error: { message: 'No file uploaded' } });
  });

  test('POST /api/serialize should write OPML from the JSON view', async () => {
    const response = await request(app)
      .post('/api/serialize')
      .send({
        version: '2.0',
        head: { title: 'T' },
        body: { outlines: [{ text: 'A', xmlUrl: 'https://example.com/a' }] }
      })
      .expect(200);

    expect(response.headers['content-type']).toContain('text/x-opml');
    expect(response.text).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<opml version="2.0">',
        '  <head>',
        '    <title>T</title>',
        '  </head>',
        '  <body>',
        '    <outline text="A" xmlUrl="https://example.com/a"/>',
        '  </body>',
        '</opml>'
      ].join('\n')
    );
  });

  test('POST /api/serialize should name the offending path', async () => {
    const response = await request(app)
      .post('/api/serialize')
      .send({ body: { outlines: [{ text: '' }] } })
      .expect(400);

    expect(response.body).toEqual({
      success: false,
      error: { path: 'body.outlines[0].text', message: 'body.outlines[0].text: expected a non-empty string' }
    });
  });

  test('POST /api/serialize should reject malformed JSON', async () => {
    const response = await request(app)
      .post('/api/serialize')
      .set('Content-Type', 'application/json')
      .send('{"body":')
      .expect(400);

    expect(response.body.success).toBe(false);
  });
});
