/**
 * Response schemas for each query-protocol action.
 *
 * Documents come from {@link parseXmlDocument} as `unknown` and are
 * validated here; anything missing or mistyped is a ProtocolError.
 *
 * @module xml/responses
 */

import { z } from 'zod';
import { ProtocolError } from '../error/index.js';
import { isXmlElement } from './parser.js';

/**
 * Request id and box usage carried by every response.
 */
export interface ResponseMetadata {
  requestId: string;
  boxUsage: number;
}

/**
 * A parsed response with its metadata.
 */
export interface ResponseEnvelope<T> extends ResponseMetadata {
  result: T;
}

/**
 * One page of a paged result.
 */
export interface Page<T> {
  items: T[];
  nextToken?: string;
}

/**
 * Attribute name/value pair as sent on the wire.
 */
export interface RawAttribute {
  name: string;
  value: string;
}

/**
 * Item from a select result, values still encoded.
 */
export interface RawItem {
  name: string;
  attributes: RawAttribute[];
}

/**
 * DomainMetadata result with numeric fields parsed.
 */
export interface RawDomainMetadata {
  itemCount: number;
  itemNamesSizeBytes: number;
  attributeNameCount: number;
  attributeNamesSizeBytes: number;
  attributeValueCount: number;
  attributeValuesSizeBytes: number;
  /** Seconds since the epoch. */
  timestamp: number;
}

/**
 * First error of an error response.
 */
export interface ErrorPayload {
  code: string;
  message: string;
  boxUsage: number;
  requestId?: string;
}

const DECIMAL = /^\d+(\.\d+)?$/;

/** Whitespace-only containers parse as strings; treat them as empty. */
function container<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? {} : value), schema);
}

const integer = z
  .string()
  .regex(/^\d+$/, 'expected an integer')
  .transform((v) => Number.parseInt(v, 10));

const boxUsage = z
  .string()
  .regex(DECIMAL, 'expected a decimal number')
  .optional()
  .transform((v) => (v === undefined ? 0 : Number(v)));

const nextToken = z
  .string()
  .optional()
  .transform((v) => (v ? v : undefined));

const metadataSchema = container(
  z.object({
    RequestId: z.string(),
    BoxUsage: boxUsage,
  })
);

const attributeSchema = z.object({
  Name: z.string(),
  Value: z.string(),
});

const emptyResponseSchema = container(
  z.object({
    ResponseMetadata: metadataSchema,
  })
);

const listDomainsSchema = container(
  z.object({
    ListDomainsResult: container(
      z.object({
        DomainName: z.array(z.string()).default([]),
        NextToken: nextToken,
      })
    ),
    ResponseMetadata: metadataSchema,
  })
);

const domainMetadataSchema = container(
  z.object({
    DomainMetadataResult: z.object({
      ItemCount: integer,
      ItemNamesSizeBytes: integer,
      AttributeNameCount: integer,
      AttributeNamesSizeBytes: integer,
      AttributeValueCount: integer,
      AttributeValuesSizeBytes: integer,
      Timestamp: integer,
    }),
    ResponseMetadata: metadataSchema,
  })
);

const getAttributesSchema = container(
  z.object({
    GetAttributesResult: container(
      z.object({
        Attribute: z.array(attributeSchema).default([]),
      })
    ),
    ResponseMetadata: metadataSchema,
  })
);

const selectSchema = container(
  z.object({
    SelectResult: container(
      z.object({
        Item: z
          .array(
            z.object({
              Name: z.string(),
              Attribute: z.array(attributeSchema).default([]),
            })
          )
          .default([]),
        NextToken: nextToken,
      })
    ),
    ResponseMetadata: metadataSchema,
  })
);

const errorResponseSchema = z.object({
  Errors: z.object({
    Error: z
      .array(
        z.object({
          Code: z.string(),
          Message: z.string(),
          BoxUsage: boxUsage,
        })
      )
      .min(1),
  }),
  RequestID: z.string().optional(),
});

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, action: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'root'}: ${i.message}`);
    throw new ProtocolError(`Malformed ${action} response: ${issues.join(', ')}`, {
      details: { action, issues },
    });
  }
  return result.data;
}

function responseRoot(action: string, document: unknown): unknown {
  const key = `${action}Response`;
  if (!isXmlElement(document) || !(key in document)) {
    throw new ProtocolError(`Expected a ${key} element`, { details: { action } });
  }
  return document[key];
}

function toMetadata(metadata: { RequestId: string; BoxUsage: number }): ResponseMetadata {
  return { requestId: metadata.RequestId, boxUsage: metadata.BoxUsage };
}

function toAttributes(attributes: ReadonlyArray<{ Name: string; Value: string }>): RawAttribute[] {
  return attributes.map((a) => ({ name: a.Name, value: a.Value }));
}

/**
 * Reads the error payload of a `<Response><Errors>` document.
 *
 * @returns The first error, or undefined if the document is not an error response
 */
export function readErrorPayload(document: unknown): ErrorPayload | undefined {
  if (!isXmlElement(document) || !('Response' in document)) {
    return undefined;
  }
  const parsed = validate(errorResponseSchema, document.Response, 'error');
  const [first] = parsed.Errors.Error;
  if (!first) {
    return undefined;
  }
  return {
    code: first.Code,
    message: first.Message,
    boxUsage: first.BoxUsage,
    requestId: parsed.RequestID,
  };
}

/**
 * Parses a response that carries only metadata (CreateDomain,
 * DeleteDomain, PutAttributes, BatchPutAttributes, DeleteAttributes).
 */
export function parseEmptyResponse(action: string, document: unknown): ResponseMetadata {
  const parsed = validate(emptyResponseSchema, responseRoot(action, document), action);
  return toMetadata(parsed.ResponseMetadata);
}

export function parseListDomainsResponse(document: unknown): ResponseEnvelope<Page<string>> {
  const action = 'ListDomains';
  const parsed = validate(listDomainsSchema, responseRoot(action, document), action);
  return {
    ...toMetadata(parsed.ResponseMetadata),
    result: {
      items: parsed.ListDomainsResult.DomainName,
      nextToken: parsed.ListDomainsResult.NextToken,
    },
  };
}

export function parseDomainMetadataResponse(document: unknown): ResponseEnvelope<RawDomainMetadata> {
  const action = 'DomainMetadata';
  const parsed = validate(domainMetadataSchema, responseRoot(action, document), action);
  const r = parsed.DomainMetadataResult;
  return {
    ...toMetadata(parsed.ResponseMetadata),
    result: {
      itemCount: r.ItemCount,
      itemNamesSizeBytes: r.ItemNamesSizeBytes,
      attributeNameCount: r.AttributeNameCount,
      attributeNamesSizeBytes: r.AttributeNamesSizeBytes,
      attributeValueCount: r.AttributeValueCount,
      attributeValuesSizeBytes: r.AttributeValuesSizeBytes,
      timestamp: r.Timestamp,
    },
  };
}

export function parseGetAttributesResponse(document: unknown): ResponseEnvelope<RawAttribute[]> {
  const action = 'GetAttributes';
  const parsed = validate(getAttributesSchema, responseRoot(action, document), action);
  return {
    ...toMetadata(parsed.ResponseMetadata),
    result: toAttributes(parsed.GetAttributesResult.Attribute),
  };
}

export function parseSelectResponse(document: unknown): ResponseEnvelope<Page<RawItem>> {
  const action = 'Select';
  const parsed = validate(selectSchema, responseRoot(action, document), action);
  return {
    ...toMetadata(parsed.ResponseMetadata),
    result: {
      items: parsed.SelectResult.Item.map((item) => ({
        name: item.Name,
        attributes: toAttributes(item.Attribute),
      })),
      nextToken: parsed.SelectResult.NextToken,
    },
  };
}
