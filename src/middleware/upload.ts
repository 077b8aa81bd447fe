import multer from 'multer';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as path from 'path';

export const UPLOAD_FIELD = 'opmlfile';

const ACCEPTED_MIME_TYPES = ['application/xml', 'text/xml', 'text/x-opml', 'application/x-opml'];
const ACCEPTED_EXTENSIONS = ['.opml', '.xml'];

/** Rejected upload: wrong file type or no file at all. */
export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadError';
  }
}

export function isAcceptedUpload(file: Pick<Express.Multer.File, 'mimetype' | 'originalname'>): boolean {
  return ACCEPTED_MIME_TYPES.includes(file.mimetype)
    || ACCEPTED_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase());
}

const fileFilter = (
  req: Request,
  file: Express.Multer.File,
  cb: multer.FileFilterCallback
): void => {
  if (isAcceptedUpload(file)) {
    cb(null, true);
  } else {
    cb(new UploadError('Only OPML or XML files are allowed'));
  }
};

/**
 * Accept a single OPML file in memory under the `opmlfile` field. Uploads are
 * parsed whole, so there is no point spooling them to disk.
 */
export function createUploadMiddleware(maxBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    fileFilter,
    limits: {
      fileSize: maxBytes,
      files: 1,
    },
  }).single(UPLOAD_FIELD);

  return (req: Request, res: Response, next: NextFunction): void => {
    upload(req, res, (err: unknown) => {
      if (err) {
        return next(err);
      }
      if (!req.file) {
        return next(new UploadError('No file uploaded'));
      }
      console.log(`[Upload] Received ${req.file.originalname} (${req.file.size} bytes)`);
      next();
    });
  };
}
