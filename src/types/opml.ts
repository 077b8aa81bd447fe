/**
 * OPML document shape. Mirrors the field tables in config/opmlFields.ts.
 * Optional properties are omitted when absent; an empty string is a present
 * value, not an absent one.
 */

export interface Head {
  title?: string;
  /** RFC 822 date-time. */
  dateCreated?: string;
  /** RFC 822 date-time. */
  dateModified?: string;
  ownerName?: string;
  ownerEmail?: string;
  ownerId?: string;
  /** Link to the format documentation. */
  docs?: string;
  /** Comma-separated line numbers of expanded headlines. */
  expansionState?: string;
  vertScrollState?: string;
  windowTop?: string;
  windowLeft?: string;
  windowBottom?: string;
  windowRight?: string;
}

export type HeadField = keyof Head;

export interface Outline {
  /** Displayed text. Required and never empty. */
  text: string;
  /** How the other attributes are interpreted: "rss", "link", "include", ... */
  type?: string;
  isComment?: boolean;
  isBreakpoint?: boolean;
  created?: string;
  /** Comma-separated, slash-delimited category strings. */
  category?: string;
  xmlUrl?: string;
  description?: string;
  htmlUrl?: string;
  language?: string;
  title?: string;
  version?: string;
  url?: string;
  /** Attributes with no named field above, in document order. */
  attributes: Record<string, string>;
  outlines: Outline[];
}

export type OutlineStringField =
  | 'type'
  | 'created'
  | 'category'
  | 'xmlUrl'
  | 'description'
  | 'htmlUrl'
  | 'language'
  | 'title'
  | 'version'
  | 'url';

export type OutlineFlagField = 'isComment' | 'isBreakpoint';

/** Everything on an Outline apart from `text` and the children, for builders. */
export type OutlineFields = Partial<Pick<Outline, OutlineStringField | OutlineFlagField | 'attributes'>>;

export interface Body {
  outlines: Outline[];
}

export interface OpmlDocument {
  head?: Head;
  body: Body;
}
