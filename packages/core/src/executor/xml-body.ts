/**
 * XML bodies as JSON values, so body rules and expressions address them the
 * same way as JSON bodies.
 *
 * Attributes become `@name` members, mixed text becomes `#text`, repeated
 * elements become arrays and namespace prefixes are dropped. OpenAPI `xml`
 * annotations (renamed or wrapped elements) are not applied.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';

import { isRecord, toJsonValue, type JsonValue } from '../types/json.js';

const SHARED = {
  ignoreAttributes: false,
  attributeNamePrefix: '@',
  textNodeName: '#text',
} as const;

const parser = new XMLParser({
  ...SHARED,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

const builder = new XMLBuilder({ ...SHARED, suppressEmptyNode: true });

const DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function isXmlMediaType(mediaType: string): boolean {
  return mediaType === 'application/xml' || mediaType === 'text/xml' || mediaType.endsWith('+xml');
}

/** Undefined when the text is not well-formed XML. */
export function parseXml(text: string): JsonValue | undefined {
  if (XMLValidator.validate(text) !== true) return undefined;
  const parsed: unknown = parser.parse(text);
  return toJsonValue(parsed);
}

/** The body must have exactly one member: the root element. */
export function buildXml(body: JsonValue): string | undefined {
  if (!isRecord(body) || Object.keys(body).length !== 1) return undefined;
  const xml: unknown = builder.build(body);
  return typeof xml === 'string' ? `${DECLARATION}${xml}` : undefined;
}
