/**
 * Testing utilities
 */

export { MockTransport } from './mock-transport.js';
export type { RecordedRequest, MockResponder } from './mock-transport.js';
export {
  FIXTURE_REQUEST_ID,
  FIXTURE_BOX_USAGE,
  actionResponse,
  listDomainsResponse,
  selectResponse,
  getAttributesResponse,
  domainMetadataResponse,
  errorResponse,
} from './fixtures.js';
export type { FixtureAttribute, FixtureItem, FixtureMetadata, FixtureDomainMetadata } from './fixtures.js';
