/**
 * Select-expression operators and quoting rules.
 */

/**
 * Comparison operators accepted in keyword bindings.
 */
export type ComparisonOperator =
  | 'eq'
  | 'noteq'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'like'
  | 'notlike'
  | 'between'
  | 'in';

/**
 * Operator keyword as written in a select expression.
 */
export const OPERATOR_SYMBOLS: Readonly<Record<ComparisonOperator, string>> = {
  eq: '=',
  noteq: '!=',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
  like: 'like',
  notlike: 'not like',
  between: 'between',
  in: 'in',
};

const OPERATOR_ALIASES: Readonly<Record<string, ComparisonOperator>> = {
  btwn: 'between',
};

/**
 * Words that must be back-quoted when used as attribute names.
 */
export const RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  'OR',
  'AND',
  'NOT',
  'FROM',
  'WHERE',
  'SELECT',
  'LIKE',
  'NULL',
  'IS',
  'ORDER',
  'BY',
  'ASC',
  'DESC',
  'IN',
  'BETWEEN',
  'INTERSECTION',
  'LIMIT',
  'EVERY',
]);

/**
 * Resolves an operator name or alias, or returns undefined.
 */
export function resolveOperator(name: string): ComparisonOperator | undefined {
  if (isComparisonOperator(name)) {
    return name;
  }
  return Object.hasOwn(OPERATOR_ALIASES, name) ? OPERATOR_ALIASES[name] : undefined;
}

function isComparisonOperator(name: string): name is ComparisonOperator {
  return Object.hasOwn(OPERATOR_SYMBOLS, name);
}

/**
 * Back-quotes an attribute name that collides with a reserved keyword.
 *
 * @example
 * ```typescript
 * quoteAttribute('order'); // '`order`'
 * quoteAttribute('age'); // 'age'
 * ```
 */
export function quoteAttribute(name: string): string {
  if (RESERVED_KEYWORDS.has(name.toUpperCase())) {
    return `\`${name.replace(/`/g, '``')}\``;
  }
  return name;
}

/**
 * Doubles single quotes inside a literal.
 */
export function quoteValue(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Back-quotes a domain name for the FROM clause.
 */
export function quoteDomain(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}
