import { NullableType } from '../../../utils/types/nullable.type';
import {
  NewTravelRequest,
  TransitionChanges,
  TravelRequest,
  TravelRequestContent,
} from '../entities/travel-request.entity';
import { TravelRequestStatus } from '../enums/travel-request-status.enum';

/**
 * Which requests a caller may see
 *
 * - all: every request (admin)
 * - subtree: requests whose owning employee currently reports to managerId
 * - owned: requests owned by employeeId
 */
export type RequestScope =
  | { kind: 'all' }
  | { kind: 'subtree'; managerId: number }
  | { kind: 'owned'; employeeId: number };

export interface RequestFilters {
  status?: TravelRequestStatus;
  // Inclusive bounds on dateOfRequest; either may be omitted
  dateFrom?: string;
  dateTo?: string;
  // Case-insensitive substring of the owner's first or last name
  requesterName?: string;
  // Case-insensitive substring of the purpose
  purpose?: string;
}

export type SortField = 'dateOfRequest' | 'fromDate';

export interface RequestSort {
  field: SortField;
  direction: 'ASC' | 'DESC';
}

/**
 * Repository Port for TravelRequest (Hexagonal Architecture)
 */
export abstract class TravelRequestRepositoryPort {
  /**
   * Requests within `scope` matching every given filter. Without a sort,
   * rows come back in ascending id order.
   */
  abstract list(
    scope: RequestScope,
    filters: RequestFilters,
    sort?: NullableType<RequestSort>,
  ): Promise<TravelRequest[]>;

  abstract findById(id: number): Promise<NullableType<TravelRequest>>;

  abstract create(data: NewTravelRequest): Promise<TravelRequest>;

  /**
   * Compare-and-set status change: applies `changes` only while the row
   * still has `expectedStatus`. Returns null when the row changed
   * concurrently (or no longer exists).
   */
  abstract transition(
    id: number,
    expectedStatus: TravelRequestStatus,
    changes: TransitionChanges,
  ): Promise<NullableType<TravelRequest>>;

  abstract updateContent(
    id: number,
    changes: Partial<TravelRequestContent>,
  ): Promise<TravelRequest>;

  abstract delete(id: number): Promise<void>;
}
