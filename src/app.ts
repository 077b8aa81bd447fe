import express, { Express, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ServerConfig } from './config/env';
import { fromJson, toJson } from './convert/json';
import { JsonConversionError, OpmlParseError } from './errors';
import { createUploadMiddleware, UploadError } from './middleware/upload';
import { flattenOutlines } from './model/document';
import { parseOpml } from './parsers/opmlParser';
import { toXml } from './serializers/opmlSerializer';

export const OPML_CONTENT_TYPE = 'text/x-opml';

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

export function createApp(config: ServerConfig): Express {
  const app = express();
  const uploadMiddleware = createUploadMiddleware(config.maxUploadBytes);

  app.use(express.json({ limit: config.maxUploadBytes }));

  app.get('/health', (req: Request, res: Response): void => {
    res.json({ status: 'ok' });
  });

  /**
   * API: Upload an OPML file and get its JSON view back
   */
  app.post('/api/parse', uploadMiddleware, (req: Request, res: Response, next: NextFunction): void => {
    const file = req.file;
    if (!file) {
      next(new UploadError('No file uploaded'));
      return;
    }

    try {
      const document = parseOpml(file.buffer.toString('utf-8'), config.parseOptions);
      const outlineCount = flattenOutlines(document.body.outlines).length;
      console.log(`[Parse] ${file.originalname}: ${outlineCount} outline(s)`);
      res.json({ success: true, outlineCount, document: toJson(document) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * API: Serialize a JSON document view back to OPML
   */
  app.post('/api/serialize', (req: Request, res: Response, next: NextFunction): void => {
    try {
      const document = fromJson(req.body);
      res.type(OPML_CONTENT_TYPE).send(toXml(document, { declaration: true, indent: '  ' }));
    } catch (error) {
      next(error);
    }
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof OpmlParseError) {
      console.warn(`[Parse] Rejected document: ${err.message}`);
      res.status(422).json({
        success: false,
        error: { kind: err.kind, message: err.message, line: err.line, column: err.column },
      });
      return;
    }

    if (err instanceof JsonConversionError) {
      res.status(400).json({ success: false, error: { path: err.path, message: err.message } });
      return;
    }

    if (err instanceof UploadError || err instanceof multer.MulterError) {
      res.status(400).json({ success: false, error: { message: err.message } });
      return;
    }

    const status = statusOf(err);
    if (status !== undefined && status >= 400 && status < 500) {
      res.status(status).json({ success: false, error: { message: err instanceof Error ? err.message : 'Bad request' } });
      return;
    }

    console.error('[Server] Error:', err);
    res.status(500).json({
      success: false,
      error: { message: err instanceof Error ? err.message : 'Internal server error' },
    });
  });

  return app;
}
