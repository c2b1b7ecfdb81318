import { Module } from '@nestjs/common';
import { MailerModule } from '../mailer/mailer.module';
import { NotificationDispatcherPort } from './domain/notification-dispatcher.port';
import { MailNotificationDispatcher } from './infrastructure/mail-notification.dispatcher';

@Module({
  imports: [MailerModule],
  providers: [
    {
      provide: NotificationDispatcherPort,
      useClass: MailNotificationDispatcher,
    },
  ],
  exports: [NotificationDispatcherPort],
})
export class NotificationsModule {}
