import { Injectable } from '@nestjs/common';
import { MailerService } from '../../mailer/mailer.service';
import { NotificationDispatcherPort } from '../domain/notification-dispatcher.port';
import { NotificationMessage } from '../domain/notification-message';

@Injectable()
export class MailNotificationDispatcher extends NotificationDispatcherPort {
  constructor(private readonly mailerService: MailerService) {
    super();
  }

  async dispatch(message: NotificationMessage): Promise<void> {
    await this.mailerService.sendMail({
      to: message.to,
      subject: message.subject,
      text: message.text,
    });
  }
}
