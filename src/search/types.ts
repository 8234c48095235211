/**
 * Search filter types
 *
 * A filter map is keyed by attribute name. Each entry is either a literal
 * (implicit `=`, null meaning NULL) or a criteria object:
 *
 *   { age: 30 }
 *   { age: { operator: '>', value: 21 } }
 *   { age: { operator: 'BETWEEN', min: 18, max: 65 } }
 *   { city: { operator: 'IN', value: ['Oslo', 'Bergen'] } }
 *   { bio: { operator: 'LIKE', value: 'chess', options: { full_text: true } } }
 *   { nickname: { operator: 'NULL' } }
 */

export type FilterOperator =
  | '='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='
  | 'LIKE'
  | 'IN'
  | 'BETWEEN'
  | 'NULL'
  | 'NOT NULL';

export interface LikeOptions {
  case_sensitive?: boolean;
  full_text?: boolean;
}

export interface FilterCriteria {
  /** Case-insensitive, default '='; IS NULL, IS NOT NULL and ILIKE are accepted as aliases */
  operator?: string;
  value?: unknown;
  min?: unknown;
  max?: unknown;
  options?: LikeOptions;
}

export type FilterValue = string | number | boolean | null | FilterCriteria;

export type FilterMap = Record<string, FilterValue>;

export type SearchLogic = 'AND' | 'OR';

export type SortDirection = 'asc' | 'desc';
