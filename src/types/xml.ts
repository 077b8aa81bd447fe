export interface XmlAttribute {
  name: string;
  value: string;
}

/** Line and column (both 1-based) of the last character the tokenizer consumed for an event. */
export interface XmlPosition {
  line: number;
  column: number;
}

export interface XmlOpenEvent extends XmlPosition {
  type: 'open';
  name: string;
  attributes: XmlAttribute[];
}

export interface XmlTextEvent extends XmlPosition {
  type: 'text';
  value: string;
}

export interface XmlCloseEvent extends XmlPosition {
  type: 'close';
  name: string;
}

export type XmlEvent = XmlOpenEvent | XmlTextEvent | XmlCloseEvent;

/**
 * Writer input: same shape as the reader's events, positions optional so
 * serializers can build events without inventing line numbers.
 */
export type XmlWriteEvent =
  | Omit<XmlOpenEvent, 'line' | 'column'>
  | Omit<XmlTextEvent, 'line' | 'column'>
  | Omit<XmlCloseEvent, 'line' | 'column'>;
