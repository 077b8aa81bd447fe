import { HeadField, OutlineFlagField, OutlineStringField } from '../types/opml';

export const OPML_VERSION = '2.0';

export const SUPPORTED_VERSIONS: readonly string[] = ['1.0', '1.1', '2.0'];

/** `<head>` child elements, in the order they are written. */
export const HEAD_FIELDS: readonly HeadField[] = [
  'title',
  'dateCreated',
  'dateModified',
  'ownerName',
  'ownerEmail',
  'ownerId',
  'docs',
  'expansionState',
  'vertScrollState',
  'windowTop',
  'windowLeft',
  'windowBottom',
  'windowRight',
];

export type OutlineAttributeSpec =
  | { kind: 'text'; name: 'text' }
  | { kind: 'string'; name: OutlineStringField }
  | { kind: 'flag'; name: OutlineFlagField };

/** `<outline>` attributes with a named field, in the order they are written. */
export const OUTLINE_ATTRIBUTES: readonly OutlineAttributeSpec[] = [
  { kind: 'text', name: 'text' },
  { kind: 'string', name: 'type' },
  { kind: 'flag', name: 'isComment' },
  { kind: 'flag', name: 'isBreakpoint' },
  { kind: 'string', name: 'created' },
  { kind: 'string', name: 'category' },
  { kind: 'string', name: 'xmlUrl' },
  { kind: 'string', name: 'description' },
  { kind: 'string', name: 'htmlUrl' },
  { kind: 'string', name: 'language' },
  { kind: 'string', name: 'title' },
  { kind: 'string', name: 'version' },
  { kind: 'string', name: 'url' },
];

const headFieldNames = new Set<string>(HEAD_FIELDS);
const outlineAttributeNames = new Map<string, OutlineAttributeSpec>(
  OUTLINE_ATTRIBUTES.map((spec): [string, OutlineAttributeSpec] => [spec.name, spec])
);

export function isHeadField(name: string): name is HeadField {
  return headFieldNames.has(name);
}

export function outlineAttributeSpec(name: string): OutlineAttributeSpec | undefined {
  return outlineAttributeNames.get(name);
}
