/**
 * XML Response Handling
 */

export { createXmlParser, parseXmlDocument, isXmlElement } from './parser.js';
export type {
  ResponseMetadata,
  ResponseEnvelope,
  Page,
  RawAttribute,
  RawItem,
  RawDomainMetadata,
  ErrorPayload,
} from './responses.js';
export {
  readErrorPayload,
  parseEmptyResponse,
  parseListDomainsResponse,
  parseDomainMetadataResponse,
  parseGetAttributesResponse,
  parseSelectResponse,
} from './responses.js';
