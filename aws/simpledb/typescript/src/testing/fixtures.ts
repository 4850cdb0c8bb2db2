/**
 * XML Response Fixtures
 *
 * Builders for query-protocol response bodies, for use with
 * {@link MockTransport}.
 */

import { API_NAMESPACE } from '../config/index.js';
import type { HttpResponse } from '../http/index.js';

export interface FixtureAttribute {
  name: string;
  value: string;
}

export interface FixtureItem {
  name: string;
  attributes?: FixtureAttribute[];
}

export interface FixtureMetadata {
  requestId?: string;
  boxUsage?: string;
}

export interface FixtureDomainMetadata {
  itemCount: number;
  itemNamesSizeBytes: number;
  attributeNameCount: number;
  attributeNamesSizeBytes: number;
  attributeValueCount: number;
  attributeValuesSizeBytes: number;
  timestamp: number;
}

export const FIXTURE_REQUEST_ID = 'test-request';
export const FIXTURE_BOX_USAGE = '0.0000219907';

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function element(name: string, text: string): string {
  return `<${name}>${escapeXml(text)}</${name}>`;
}

function attributeXml(attributes: readonly FixtureAttribute[] = []): string {
  return attributes.map((a) => `<Attribute>${element('Name', a.name)}${element('Value', a.value)}</Attribute>`).join('');
}

function tokenXml(nextToken?: string): string {
  return nextToken ? element('NextToken', nextToken) : '';
}

/**
 * A successful `<{action}Response>` with the given result markup.
 */
export function actionResponse(action: string, result = '', metadata: FixtureMetadata = {}): HttpResponse {
  const body =
    '<?xml version="1.0"?>' +
    `<${action}Response xmlns="${API_NAMESPACE}">` +
    result +
    '<ResponseMetadata>' +
    element('RequestId', metadata.requestId ?? FIXTURE_REQUEST_ID) +
    element('BoxUsage', metadata.boxUsage ?? FIXTURE_BOX_USAGE) +
    '</ResponseMetadata>' +
    `</${action}Response>`;
  return { status: 200, headers: { 'content-type': 'text/xml' }, body };
}

export function listDomainsResponse(names: readonly string[], nextToken?: string): HttpResponse {
  const result = names.map((n) => element('DomainName', n)).join('') + tokenXml(nextToken);
  return actionResponse('ListDomains', `<ListDomainsResult>${result}</ListDomainsResult>`);
}

export function selectResponse(items: readonly FixtureItem[], nextToken?: string): HttpResponse {
  const result =
    items.map((item) => `<Item>${element('Name', item.name)}${attributeXml(item.attributes)}</Item>`).join('') +
    tokenXml(nextToken);
  return actionResponse('Select', `<SelectResult>${result}</SelectResult>`);
}

export function getAttributesResponse(attributes: readonly FixtureAttribute[]): HttpResponse {
  return actionResponse('GetAttributes', `<GetAttributesResult>${attributeXml(attributes)}</GetAttributesResult>`);
}

export function domainMetadataResponse(metadata: FixtureDomainMetadata): HttpResponse {
  const result =
    element('ItemCount', String(metadata.itemCount)) +
    element('ItemNamesSizeBytes', String(metadata.itemNamesSizeBytes)) +
    element('AttributeNameCount', String(metadata.attributeNameCount)) +
    element('AttributeNamesSizeBytes', String(metadata.attributeNamesSizeBytes)) +
    element('AttributeValueCount', String(metadata.attributeValueCount)) +
    element('AttributeValuesSizeBytes', String(metadata.attributeValuesSizeBytes)) +
    element('Timestamp', String(metadata.timestamp));
  return actionResponse('DomainMetadata', `<DomainMetadataResult>${result}</DomainMetadataResult>`);
}

/**
 * An `<Response><Errors>` document.
 */
export function errorResponse(
  status: number,
  code: string,
  message: string,
  metadata: FixtureMetadata = {}
): HttpResponse {
  const body =
    '<?xml version="1.0"?>' +
    '<Response><Errors><Error>' +
    element('Code', code) +
    element('Message', message) +
    element('BoxUsage', metadata.boxUsage ?? FIXTURE_BOX_USAGE) +
    '</Error></Errors>' +
    element('RequestID', metadata.requestId ?? FIXTURE_REQUEST_ID) +
    '</Response>';
  return { status, headers: { 'content-type': 'text/xml' }, body };
}
