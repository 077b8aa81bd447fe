export type ParseErrorKind =
  | 'MalformedXml'
  | 'MissingRootElement'
  | 'MissingBodyElement'
  | 'DuplicateBodyElement'
  | 'DuplicateHeadElement'
  | 'MissingOutlineText'
  | 'OutlineDepthExceeded'
  | 'UnsupportedVersion'
  | 'BodyHasNoOutlines';

export interface ParseErrorContext {
  line?: number;
  column?: number;
  /** Name of the element being processed when the error was raised. */
  element?: string;
}

/**
 * Raised by every OPML parse failure. `kind` tells callers which rule was
 * violated; the message is meant for humans.
 */
export class OpmlParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly line?: number;
  readonly column?: number;
  readonly element?: string;

  constructor(kind: ParseErrorKind, detail: string, context: ParseErrorContext = {}) {
    const where = context.line !== undefined && context.column !== undefined
      ? ` (line ${context.line}, col ${context.column})`
      : '';
    super(`${kind}: ${detail}${where}`);
    this.name = 'OpmlParseError';
    this.kind = kind;
    this.line = context.line;
    this.column = context.column;
    this.element = context.element;
  }
}

/** Raised when a JSON value does not have the shape of an OPML document. */
export class JsonConversionError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`${path}: ${detail}`);
    this.name = 'JsonConversionError';
    this.path = path;
  }
}

export function isOpmlParseError(err: unknown): err is OpmlParseError {
  return err instanceof OpmlParseError;
}
