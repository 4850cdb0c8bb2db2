/**
 * SimpleDB Client
 *
 * Issues one signed form POST per call, maps error payloads to typed
 * errors and exposes paged operations as {@link Paginator}s.
 *
 * @module client
 */

import type { SimpleDbConfig } from '../config/index.js';
import {
  API_VERSION,
  LIST_DOMAINS_PAGE_SIZE,
  MAX_BATCH_PUT_ITEMS,
  resolveEndpointUrl,
} from '../config/index.js';
import { PassThroughEncoder } from '../codec/index.js';
import type { AttributeEncoder, AttributeScalar } from '../codec/index.js';
import { Domain, Item, setAttribute } from '../domain/index.js';
import type { AttributeValue, ItemAttributes } from '../domain/index.js';
import { ProtocolError, RemoteServiceError, ValidationError, isSimpleDbError } from '../error/index.js';
import { FetchTransport } from '../http/index.js';
import type { HttpResponse, HttpTransport } from '../http/index.js';
import {
  ConsoleLogger,
  NoopMetricsCollector,
  SimpleDbMetricNames,
  logError,
  logOperation,
} from '../observability/index.js';
import type { Logger, MetricsCollector } from '../observability/index.js';
import { RequestSigner, encodeFormBody } from '../signing/index.js';
import {
  parseDomainMetadataResponse,
  parseEmptyResponse,
  parseGetAttributesResponse,
  parseListDomainsResponse,
  parseSelectResponse,
  parseXmlDocument,
  readErrorPayload,
} from '../xml/index.js';
import type { Page, RawAttribute, ResponseEnvelope, ResponseMetadata } from '../xml/index.js';
import { Paginator } from './paginator.js';
import type {
  AttributeInput,
  AttributeUpdate,
  BatchItem,
  DomainMetadata,
  SimpleDbClientOptions,
} from './types.js';

/**
 * A domain given by name or as a {@link Domain}.
 */
export type DomainRef = string | Domain;

const CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=utf-8';

type FormParams = Record<string, string>;

interface EncodedAttribute {
  name: string;
  value: string;
  replace: boolean;
}

function domainName(domain: DomainRef): string {
  return typeof domain === 'string' ? domain : domain.name;
}

function isUpdateList(attributes: AttributeInput): attributes is readonly AttributeUpdate[] {
  return Array.isArray(attributes);
}

function isNameList(attributes: Readonly<ItemAttributes> | readonly string[]): attributes is readonly string[] {
  return Array.isArray(attributes);
}

function valueList(value: AttributeValue): AttributeScalar[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Client for the SimpleDB query API.
 *
 * @example
 * ```typescript
 * const config = new SimpleDbConfigBuilder()
 *   .credentials('test-access-key', 'test-secret')
 *   .build();
 * const client = new SimpleDbClient(config);
 *
 * const users = await client.createDomain('users');
 * await client.putAttributes(users, 'user-1', { name: 'Ada', tags: ['a', 'b'] });
 * const attributes = await client.getAttributes(users, 'user-1');
 * ```
 */
export class SimpleDbClient {
  readonly config: SimpleDbConfig;
  readonly encoder: AttributeEncoder;
  private readonly transport: HttpTransport;
  private readonly signer: RequestSigner;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly clock: () => Date;
  private readonly endpoint: string;

  constructor(config: SimpleDbConfig, options: SimpleDbClientOptions = {}) {
    this.config = config;
    this.encoder = options.encoder ?? new PassThroughEncoder();
    this.transport = options.transport ?? new FetchTransport({ timeoutMs: config.timeoutMs });
    this.logger = options.logger ?? new ConsoleLogger(config.logLevel);
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.clock = options.clock ?? (() => new Date());
    this.signer = new RequestSigner(
      { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey },
      config.signatureMethod
    );
    this.endpoint = resolveEndpointUrl(config);
  }

  /**
   * A handle on a domain. No request is made.
   */
  domain(name: string): Domain {
    return new Domain(name, this);
  }

  /**
   * Creates a domain. Creating an existing domain succeeds.
   */
  async createDomain(name: string): Promise<Domain> {
    await this.execute('CreateDomain', { DomainName: name }, (doc) => parseEmptyResponse('CreateDomain', doc));
    return this.domain(name);
  }

  /**
   * Deletes a domain and every item in it.
   */
  async deleteDomain(domain: DomainRef): Promise<void> {
    await this.execute('DeleteDomain', { DomainName: domainName(domain) }, (doc) =>
      parseEmptyResponse('DeleteDomain', doc)
    );
  }

  /**
   * Every domain name of the account, up to 100 per request.
   */
  listDomains(): Paginator<string> {
    return new Paginator((nextToken) =>
      this.executePage(
        'ListDomains',
        { MaxNumberOfDomains: String(LIST_DOMAINS_PAGE_SIZE) },
        nextToken,
        parseListDomainsResponse
      )
    );
  }

  /**
   * Whether a domain exists. Stops listing at the first match.
   */
  async hasDomain(domain: DomainRef): Promise<boolean> {
    const name = domainName(domain);
    for await (const existing of this.listDomains()) {
      if (existing === name) {
        return true;
      }
    }
    return false;
  }

  /**
   * Domain statistics.
   *
   * @throws {ProtocolError} If the response lacks any statistic
   */
  async domainMetadata(domain: DomainRef): Promise<DomainMetadata> {
    const { result } = await this.execute('DomainMetadata', { DomainName: domainName(domain) }, (doc) =>
      parseDomainMetadataResponse(doc)
    );
    return {
      itemCount: result.itemCount,
      itemNamesSizeBytes: result.itemNamesSizeBytes,
      attributeNameCount: result.attributeNameCount,
      attributeNamesSizeBytes: result.attributeNamesSizeBytes,
      attributeValueCount: result.attributeValueCount,
      attributeValuesSizeBytes: result.attributeValuesSizeBytes,
      timestamp: new Date(result.timestamp * 1000),
    };
  }

  /**
   * Writes attributes of one item. Array values become multiple values of
   * the attribute.
   *
   * @example
   * ```typescript
   * await client.putAttributes('users', 'user-1', { tags: ['a', 'b'] });
   * await client.putAttributes('users', 'user-1', [{ name: 'tags', value: 'c', replace: false }]);
   * ```
   */
  async putAttributes(domain: DomainRef, itemName: string, attributes: AttributeInput): Promise<ResponseMetadata> {
    const name = domainName(domain);
    const params: FormParams = { DomainName: name, ItemName: itemName };
    this.encodeAttributes(name, attributes).forEach((attribute, i) => {
      params[`Attribute.${i}.Name`] = attribute.name;
      params[`Attribute.${i}.Value`] = attribute.value;
      if (attribute.replace) {
        params[`Attribute.${i}.Replace`] = 'true';
      }
    });
    return this.execute('PutAttributes', params, (doc) => parseEmptyResponse('PutAttributes', doc));
  }

  /**
   * Writes up to 25 items in one request. Use {@link BatchWriter} for
   * longer lists.
   *
   * @throws {ValidationError} If `items` is empty or longer than 25
   */
  async batchPutAttributes(domain: DomainRef, items: readonly BatchItem[]): Promise<ResponseMetadata> {
    if (items.length === 0) {
      throw new ValidationError('batchPutAttributes requires at least one item');
    }
    if (items.length > MAX_BATCH_PUT_ITEMS) {
      throw new ValidationError(
        `batchPutAttributes accepts at most ${MAX_BATCH_PUT_ITEMS} items, got ${items.length}`,
        { itemCount: items.length }
      );
    }

    const name = domainName(domain);
    const params: FormParams = { DomainName: name };
    items.forEach((item, i) => {
      params[`Item.${i}.ItemName`] = item.name;
      this.encodeAttributes(name, item.attributes).forEach((attribute, j) => {
        params[`Item.${i}.Attribute.${j}.Name`] = attribute.name;
        params[`Item.${i}.Attribute.${j}.Value`] = attribute.value;
        if (attribute.replace) {
          params[`Item.${i}.Attribute.${j}.Replace`] = 'true';
        }
      });
    });
    return this.execute('BatchPutAttributes', params, (doc) => parseEmptyResponse('BatchPutAttributes', doc));
  }

  /**
   * Deletes attributes of an item. Without `attributes` the whole item is
   * deleted; a list of names deletes those attributes with all their values;
   * a record deletes only the given values.
   */
  async deleteAttributes(
    domain: DomainRef,
    itemName: string,
    attributes?: Readonly<ItemAttributes> | readonly string[]
  ): Promise<ResponseMetadata> {
    const name = domainName(domain);
    const params: FormParams = { DomainName: name, ItemName: itemName };

    if (attributes && isNameList(attributes)) {
      attributes.forEach((attribute, i) => {
        params[`Attribute.${i}.Name`] = attribute;
      });
    } else if (attributes) {
      this.encodeAttributes(name, attributes).forEach((attribute, i) => {
        params[`Attribute.${i}.Name`] = attribute.name;
        params[`Attribute.${i}.Value`] = attribute.value;
      });
    }
    return this.execute('DeleteAttributes', params, (doc) => parseEmptyResponse('DeleteAttributes', doc));
  }

  /**
   * Reads the decoded attributes of an item, optionally only some of them.
   * An absent item yields an empty object: the store cannot tell a missing
   * item from one not yet replicated.
   */
  async getAttributes(
    domain: DomainRef,
    itemName: string,
    attributeNames?: readonly string[]
  ): Promise<ItemAttributes> {
    const name = domainName(domain);
    const params: FormParams = { DomainName: name, ItemName: itemName };
    attributeNames?.forEach((attribute, i) => {
      params[`AttributeName.${i}`] = attribute;
    });
    const { result } = await this.execute('GetAttributes', params, parseGetAttributesResponse);
    return this.decodeAttributes(name, result);
  }

  /**
   * Runs a select expression against a domain, following continuation
   * tokens lazily.
   *
   * @example
   * ```typescript
   * const items = await client.select('users', "SELECT * FROM `users` WHERE age > '030'").toArray();
   * ```
   */
  select(domain: DomainRef, expression: string): Paginator<Item> {
    const owner = typeof domain === 'string' ? this.domain(domain) : domain;
    return new Paginator(async (nextToken) => {
      const page = await this.executePage('Select', { SelectExpression: expression }, nextToken, parseSelectResponse);
      return {
        ...page,
        result: {
          items: page.result.items.map(
            (raw) => new Item(owner, raw.name, this.decodeAttributes(owner.name, raw.attributes))
          ),
          nextToken: page.result.nextToken,
        },
      };
    });
  }

  private encodeAttributes(domain: string, attributes: AttributeInput): EncodedAttribute[] {
    const updates: readonly AttributeUpdate[] = isUpdateList(attributes)
      ? attributes
      : Object.entries(attributes).map(([name, value]) => ({ name, value }));

    return updates.flatMap((update) =>
      valueList(update.value).map((value) => ({
        name: update.name,
        value: this.encoder.encode(domain, update.name, value),
        replace: update.replace ?? true,
      }))
    );
  }

  private decodeAttributes(domain: string, raw: readonly RawAttribute[]): ItemAttributes {
    const attributes: ItemAttributes = {};
    for (const { name, value } of raw) {
      const decoded = this.encoder.decode(domain, name, value);
      const existing = Object.hasOwn(attributes, name) ? attributes[name] : undefined;
      if (existing === undefined) {
        setAttribute(attributes, name, decoded);
      } else if (Array.isArray(existing)) {
        existing.push(decoded);
      } else {
        setAttribute(attributes, name, [existing, decoded]);
      }
    }
    return attributes;
  }

  private async executePage<T>(
    action: string,
    params: FormParams,
    nextToken: string | undefined,
    parse: (document: unknown) => ResponseEnvelope<Page<T>>
  ): Promise<ResponseEnvelope<Page<T>>> {
    const page = await this.execute(action, nextToken ? { ...params, NextToken: nextToken } : params, parse);
    this.metrics.incrementCounter(SimpleDbMetricNames.PAGES_FETCHED, 1, { action });
    return page;
  }

  /**
   * Sends one request and parses its response, with logging and metrics.
   */
  private async execute<T extends ResponseMetadata>(
    action: string,
    params: FormParams,
    parse: (document: unknown) => T
  ): Promise<T> {
    const startTime = Date.now();
    this.metrics.incrementCounter(SimpleDbMetricNames.REQUESTS_TOTAL, 1, { action });

    try {
      const response = await this.send(action, params);
      const document = this.parseBody(response);

      const failure = readErrorPayload(document);
      if (failure) {
        throw new RemoteServiceError({
          message: failure.message,
          errorCode: failure.code,
          requestId: failure.requestId,
          statusCode: response.status,
          boxUsage: failure.boxUsage,
        });
      }
      if (response.status < 200 || response.status >= 300) {
        throw new ProtocolError(`Unexpected HTTP status ${response.status} without an error payload`, {
          statusCode: response.status,
        });
      }

      const result = parse(document);
      const durationMs = Date.now() - startTime;
      this.metrics.recordHistogram(SimpleDbMetricNames.REQUEST_DURATION, durationMs, { action });
      this.metrics.recordHistogram(SimpleDbMetricNames.BOX_USAGE, result.boxUsage, { action });
      logOperation(this.logger, action, result.requestId, result.boxUsage, durationMs);
      return result;
    } catch (error) {
      this.metrics.incrementCounter(SimpleDbMetricNames.ERRORS, 1, {
        action,
        code: isSimpleDbError(error) ? error.code : 'UNKNOWN',
      });
      logError(this.logger, action, error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  private async send(action: string, params: FormParams): Promise<HttpResponse> {
    const signed = this.signer.sign(
      {
        method: 'POST',
        host: this.config.host,
        path: '/',
        params: { ...params, Action: action, Version: API_VERSION },
      },
      this.clock()
    );

    return this.transport.send({
      method: 'POST',
      url: this.endpoint,
      headers: { 'Content-Type': CONTENT_TYPE },
      body: encodeFormBody(signed),
    });
  }

  private parseBody(response: HttpResponse): unknown {
    try {
      return parseXmlDocument(response.body);
    } catch (error) {
      if (response.status >= 400) {
        throw new ProtocolError(`HTTP ${response.status} with an unreadable body`, {
          statusCode: response.status,
          cause: error,
        });
      }
      throw error;
    }
  }
}

/**
 * Creates a client from a validated configuration.
 */
export function createSimpleDbClient(config: SimpleDbConfig, options?: SimpleDbClientOptions): SimpleDbClient {
  return new SimpleDbClient(config, options);
}

export { Paginator } from './paginator.js';
export type { PageFetcher } from './paginator.js';
export type {
  AttributeUpdate,
  AttributeInput,
  BatchItem,
  DomainMetadata,
  SimpleDbClientOptions,
} from './types.js';
