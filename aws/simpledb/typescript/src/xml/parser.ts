/**
 * XML parsing for query-protocol responses.
 * @module xml/parser
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ProtocolError } from '../error/index.js';

/**
 * Elements that may repeat and always parse as arrays.
 */
const ARRAY_TAGS: ReadonlySet<string> = new Set(['Item', 'Attribute', 'Error']);

/**
 * Parser options. Values stay strings and keep their whitespace; SimpleDB
 * attribute values may start or end with spaces.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: true,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: false,
  // Decode numeric character references such as &#xD;
  htmlEntities: true,
  isArray: (tagName: string, jPath: string): boolean =>
    ARRAY_TAGS.has(tagName) || jPath.endsWith('ListDomainsResult.DomainName'),
};

/**
 * Creates a configured XML parser instance.
 *
 * @example
 * ```typescript
 * const parser = createXmlParser();
 * const result: unknown = parser.parse(xmlString);
 * ```
 */
export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Parses an XML response body. The result is untyped; validate it before use.
 *
 * @throws {ProtocolError} If the body is empty or not well-formed XML
 */
export function parseXmlDocument(xml: string): unknown {
  if (xml.trim() === '') {
    throw new ProtocolError('Empty response body');
  }
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ProtocolError(`Malformed XML response: ${validation.err.msg}`, {
      details: { line: validation.err.line, column: validation.err.col },
    });
  }
  const parsed: unknown = createXmlParser().parse(xml);
  return parsed;
}

/**
 * Narrows a parsed node to an element object.
 */
export function isXmlElement(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
