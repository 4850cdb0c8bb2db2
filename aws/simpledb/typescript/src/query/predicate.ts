/**
 * Predicate Tree
 *
 * Composable filters for select expressions. Leaves hold a single
 * comparison; groups join children with AND or OR. Nodes are immutable:
 * combining two predicates always returns a new group.
 *
 * @example
 * ```typescript
 * const p = where({ a: 1 }).and(where({ b: 2 })).or(where({ c: 3 }));
 * renderPredicate(p, encode); // "(a = '1' AND b = '2') OR c = '3'"
 * ```
 */

import { ValidationError } from '../error/index.js';
import { scalarToString } from '../codec/index.js';
import type { AttributeScalar } from '../codec/index.js';
import {
  OPERATOR_SYMBOLS,
  quoteAttribute,
  quoteValue,
  resolveOperator,
} from './operators.js';
import type { ComparisonOperator } from './operators.js';

/**
 * Connector joining the children of a group.
 */
export type Connector = 'AND' | 'OR';

/**
 * `any` compares against at least one value of a multi-valued attribute,
 * `every` against all of them.
 */
export type Quantifier = 'any' | 'every';

/**
 * Right-hand side of a comparison. `null` is only valid with `eq`/`noteq`
 * and becomes `IS NULL`/`IS NOT NULL`; arrays are only valid with
 * `between` (two bounds) and `in`.
 */
export type ConditionValue = AttributeScalar | null | readonly AttributeScalar[];

/**
 * Keyword bindings, `{ 'attribute__operator': value }`. A bare attribute
 * name means `eq`.
 */
export type ConditionBindings = Readonly<Record<string, ConditionValue>>;

/**
 * Item-name conditions keyed by operator, e.g. `{ in: ['a', 'b'] }`.
 */
export type ItemNameConditions = Readonly<Partial<Record<ComparisonOperator | 'btwn', ConditionValue>>>;

/**
 * Encodes a comparison value for an attribute.
 */
export type ValueEncoder = (attribute: string, value: AttributeScalar) => string;

/**
 * Synthetic attribute holding the item name.
 */
export const ITEM_NAME_ATTRIBUTE = 'itemName()';

/**
 * A single comparison.
 */
export class PredicateLeaf {
  readonly type = 'leaf' as const;

  constructor(
    readonly attribute: string,
    readonly operator: ComparisonOperator,
    readonly value: ConditionValue,
    readonly quantifier: Quantifier = 'any'
  ) {}
}

/**
 * Children joined by a connector.
 */
export class PredicateGroup {
  readonly type = 'group' as const;

  constructor(
    readonly connector: Connector,
    readonly children: readonly Predicate[] = []
  ) {}

  get size(): number {
    return this.children.length;
  }

  isEmpty(): boolean {
    return this.children.length === 0;
  }

  and(other: Predicate): PredicateGroup {
    return merge(this, other, 'AND');
  }

  or(other: Predicate): PredicateGroup {
    return merge(this, other, 'OR');
  }
}

export type Predicate = PredicateLeaf | PredicateGroup;

/**
 * Anything `where` and `Query.filter` accept.
 */
export type PredicateArgument = Predicate | ConditionBindings;

function isPredicate(arg: PredicateArgument): arg is Predicate {
  return arg instanceof PredicateLeaf || arg instanceof PredicateGroup;
}

function isValueList(value: ConditionValue): value is readonly AttributeScalar[] {
  return Array.isArray(value);
}

function formatValue(value: ConditionValue): string {
  if (value === null) return 'null';
  if (isValueList(value)) return `[${value.map((v) => scalarToString(v)).join(', ')}]`;
  return scalarToString(value);
}

/**
 * Builds a validated leaf.
 *
 * @throws {ValidationError} If the value does not fit the operator
 */
function makeLeaf(
  attribute: string,
  operator: ComparisonOperator,
  value: ConditionValue,
  quantifier: Quantifier
): PredicateLeaf {
  switch (operator) {
    case 'between':
      if (!isValueList(value) || value.length !== 2) {
        throw new ValidationError(
          `Invalid value ${formatValue(value)} for between on '${attribute}': requires exactly two bounds`,
          { attribute, operator }
        );
      }
      break;
    case 'in':
      if (!isValueList(value) || value.length === 0) {
        throw new ValidationError(
          `Invalid value ${formatValue(value)} for in on '${attribute}': requires a non-empty list`,
          { attribute, operator }
        );
      }
      break;
    default:
      if (isValueList(value)) {
        throw new ValidationError(`Operator ${operator} on '${attribute}' takes a single value`, {
          attribute,
          operator,
        });
      }
      if (value === null && operator !== 'eq' && operator !== 'noteq') {
        throw new ValidationError(`Operator ${operator} on '${attribute}' does not accept null`, {
          attribute,
          operator,
        });
      }
  }
  return new PredicateLeaf(attribute, operator, value, quantifier);
}

function parseBindings(bindings: ConditionBindings, quantifier: Quantifier): PredicateLeaf[] {
  return Object.entries(bindings).map(([key, value]) => {
    const parts = key.split('__');
    if (parts.length > 2) {
      throw new ValidationError(`Filter keys must be of the form 'attribute__operator', got '${key}'`, {
        key,
      });
    }
    const [attribute = '', operatorName = 'eq'] = parts;
    if (!attribute) {
      throw new ValidationError(`Filter key '${key}' has no attribute name`, { key });
    }
    const operator = resolveOperator(operatorName);
    if (!operator) {
      throw new ValidationError(`'${operatorName}' is not a valid query operator`, { key });
    }
    return makeLeaf(attribute, operator, value, quantifier);
  });
}

function build(args: readonly PredicateArgument[], quantifier: Quantifier): PredicateGroup {
  const children: Predicate[] = [];
  for (const arg of args) {
    if (isPredicate(arg)) {
      children.push(arg);
    } else {
      children.push(...parseBindings(arg, quantifier));
    }
  }
  return new PredicateGroup('AND', children);
}

/**
 * Builds a predicate from sub-predicates and keyword bindings, joined
 * with AND in argument order.
 *
 * @throws {ValidationError} On a malformed key, unknown operator or bad value
 *
 * @example
 * ```typescript
 * where({ status: 'active', age__gte: 18, tags__in: ['a', 'b'] });
 * ```
 */
export function where(...args: PredicateArgument[]): PredicateGroup {
  return build(args, 'any');
}

/**
 * Like {@link where}, but every value of a multi-valued attribute must
 * satisfy the comparison: renders `every(attr) = 'x'`.
 */
export function every(...args: PredicateArgument[]): PredicateGroup {
  return build(args, 'every');
}

/**
 * Conditions on the item name. Plain strings are equality checks.
 *
 * @example
 * ```typescript
 * itemName('user-1'); // itemName() = 'user-1'
 * itemName({ like: 'user-%' }); // itemName() like 'user-%'
 * ```
 */
export function itemName(...args: Array<string | ItemNameConditions>): PredicateGroup {
  const children: PredicateLeaf[] = [];
  for (const arg of args) {
    if (typeof arg === 'string') {
      children.push(makeLeaf(ITEM_NAME_ATTRIBUTE, 'eq', arg, 'any'));
      continue;
    }
    for (const [name, value] of Object.entries(arg)) {
      const operator = resolveOperator(name);
      if (!operator) {
        throw new ValidationError(`'${name}' is not a valid query operator`, { key: name });
      }
      if (value !== undefined) {
        children.push(makeLeaf(ITEM_NAME_ATTRIBUTE, operator, value, 'any'));
      }
    }
  }
  return new PredicateGroup('AND', children);
}

function asGroup(predicate: Predicate): PredicateGroup {
  return predicate instanceof PredicateGroup ? predicate : new PredicateGroup('AND', [predicate]);
}

function unwrap(group: PredicateGroup): Predicate {
  const [only] = group.children;
  return group.children.length === 1 && only ? only : group;
}

/**
 * Combines two predicates under a connector.
 *
 * Same-connector merges flatten, so chained calls never nest; switching
 * connector pushes the existing tree one level down under a new root.
 */
export function merge(left: Predicate, right: Predicate, connector: Connector): PredicateGroup {
  const l = asGroup(left);
  const r = asGroup(right);

  if (r.isEmpty()) {
    return l;
  }
  if (l.isEmpty()) {
    return r.size === 1 ? new PredicateGroup(connector, r.children) : r;
  }
  if (l.connector === connector && l.children.includes(right)) {
    return l;
  }

  const current = l.size < 2 ? connector : l.connector;
  if (current === connector) {
    if (r.connector === connector || r.size <= 1) {
      return new PredicateGroup(connector, [...l.children, ...r.children]);
    }
    return new PredicateGroup(connector, [...l.children, r]);
  }
  return new PredicateGroup(connector, [l, unwrap(r)]);
}

/**
 * AND of two predicates.
 */
export function and(left: Predicate, right: Predicate): PredicateGroup {
  return merge(left, right, 'AND');
}

/**
 * OR of two predicates.
 */
export function or(left: Predicate, right: Predicate): PredicateGroup {
  return merge(left, right, 'OR');
}

function attributeReference(leaf: PredicateLeaf): string {
  const quoted = quoteAttribute(leaf.attribute);
  return leaf.quantifier === 'every' ? `every(${quoted})` : quoted;
}

function literal(value: string): string {
  return `'${quoteValue(value)}'`;
}

function renderLeaf(leaf: PredicateLeaf, encode: ValueEncoder): string {
  const ref = attributeReference(leaf);
  const { attribute, operator, value } = leaf;

  if (value === null) {
    return operator === 'noteq' ? `${ref} IS NOT NULL` : `${ref} IS NULL`;
  }
  if (isValueList(value)) {
    const encoded = value.map((v) => literal(encode(attribute, v)));
    if (operator === 'between') {
      return `${ref} between ${encoded[0]} and ${encoded[1]}`;
    }
    return `${ref} in(${encoded.join(', ')})`;
  }
  if (operator === 'like' || operator === 'notlike') {
    return `${ref} ${OPERATOR_SYMBOLS[operator]} ${literal(scalarToString(value))}`;
  }
  return `${ref} ${OPERATOR_SYMBOLS[operator]} ${literal(encode(attribute, value))}`;
}

function renderNode(node: Predicate, encode: ValueEncoder, nested: boolean): string {
  if (node instanceof PredicateLeaf) {
    return renderLeaf(node, encode);
  }
  // A lone child renders in its parent's place.
  const childNested = nested || node.children.length > 1;
  const parts = node.children.map((child) => renderNode(child, encode, childNested)).filter((part) => part !== '');
  const joined = parts.join(` ${node.connector} `);
  return nested && parts.length > 1 ? `(${joined})` : joined;
}

/**
 * Renders a predicate as a WHERE-clause body. An empty predicate renders
 * as the empty string.
 */
export function renderPredicate(predicate: Predicate, encode: ValueEncoder): string {
  return renderNode(predicate, encode, false);
}
