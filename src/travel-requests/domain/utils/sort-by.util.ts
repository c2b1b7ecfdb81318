import { NullableType } from '../../../utils/types/nullable.type';
import { RequestSort, SortField } from '../ports/travel-request.repository.port';

const SORT_FIELDS: Record<string, SortField> = {
  date_of_request: 'dateOfRequest',
  from_date: 'fromDate',
};

/**
 * Parse a `sort_by` query value such as `from_date` or `-date_of_request`.
 * A leading `-` means descending. Unknown fields yield null, which leaves
 * the store's default order in place.
 */
export function parseSortBy(sortBy?: string): NullableType<RequestSort> {
  if (!sortBy) {
    return null;
  }

  const descending = sortBy.startsWith('-');
  const name = descending ? sortBy.slice(1) : sortBy;
  const field = Object.prototype.hasOwnProperty.call(SORT_FIELDS, name)
    ? SORT_FIELDS[name]
    : undefined;
  if (!field) {
    return null;
  }

  return { field, direction: descending ? 'DESC' : 'ASC' };
}
