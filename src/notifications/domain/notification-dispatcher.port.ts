import { NotificationMessage } from './notification-message';

/**
 * Port for delivering workflow notifications (Hexagonal Architecture)
 *
 * The workflow decides whether and what to send; adapters decide how.
 * Implementations reject on delivery failure.
 */
export abstract class NotificationDispatcherPort {
  abstract dispatch(message: NotificationMessage): Promise<void>;
}
