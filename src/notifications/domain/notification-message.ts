export interface NotificationMessage {
  to: string;
  subject: string;
  text: string;
}
