import { BadRequestException, HttpStatus } from '@nestjs/common';
import { TravelRequestContent } from '../entities/travel-request.entity';

type InvariantSubject = Pick<
  TravelRequestContent,
  'fromDate' | 'toDate' | 'lodging' | 'lodgingInfo'
> & {
  employeeId: number | null;
  managerId: number | null;
};

/**
 * Field invariants that hold for every stored request:
 * - fromDate is strictly before toDate (calendar days)
 * - lodgingInfo is non-empty when lodging is requested
 * - the owner is not the addressed manager
 *
 * Returns a field → error code map, empty when the record is valid.
 */
export function findInvariantViolations(
  subject: InvariantSubject,
): Record<string, string> {
  const errors: Record<string, string> = {};

  // YYYY-MM-DD compares chronologically as a string
  if (subject.fromDate >= subject.toDate) {
    errors.toDate = 'mustBeAfterFromDate';
  }

  if (subject.lodging && !subject.lodgingInfo?.trim()) {
    errors.lodgingInfo = 'requiredWhenLodging';
  }

  if (
    subject.employeeId !== null &&
    subject.managerId !== null &&
    subject.employeeId === subject.managerId
  ) {
    errors.manager = 'cannotBeRequester';
  }

  return errors;
}

/**
 * @throws BadRequestException with a `{ status, errors }` body on violation
 */
export function assertInvariants(subject: InvariantSubject): void {
  const errors = findInvariantViolations(subject);
  if (Object.keys(errors).length > 0) {
    throw new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors,
    });
  }
}
