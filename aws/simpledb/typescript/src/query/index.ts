/**
 * Query Builders
 */

export type { ComparisonOperator } from './operators.js';
export {
  OPERATOR_SYMBOLS,
  RESERVED_KEYWORDS,
  resolveOperator,
  quoteAttribute,
  quoteValue,
  quoteDomain,
} from './operators.js';
export type {
  Connector,
  Quantifier,
  ConditionValue,
  ConditionBindings,
  ItemNameConditions,
  ValueEncoder,
  Predicate,
  PredicateArgument,
} from './predicate.js';
export {
  ITEM_NAME_ATTRIBUTE,
  PredicateLeaf,
  PredicateGroup,
  where,
  every,
  itemName,
  merge,
  and,
  or,
  renderPredicate,
} from './predicate.js';
export type { QuerySource, SortDirection, OrderBy, QueryState } from './query.js';
export { BaseQuery, Query, ItemNameQuery } from './query.js';
