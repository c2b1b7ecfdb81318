import { BadRequestException, HttpStatus } from '@nestjs/common';

/**
 * Raised when an action is not allowed from the request's current status,
 * or the action itself is not one the caller can perform. The stored
 * record is left unchanged.
 */
export class InvalidTransitionException extends BadRequestException {
  constructor(message: string) {
    super({
      status: HttpStatus.BAD_REQUEST,
      error: 'InvalidTransition',
      message,
    });
  }
}
