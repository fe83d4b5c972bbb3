import { Injectable, Logger } from '@nestjs/common';
import { OrdersService } from './orders.service';
import { NewOrder } from './entities/order.entity';
import { MailService } from '../mail/mail.service';
import { buildOrderNotification } from '../mail/order-notification';
import { BackgroundTasks } from '../../common/background/background-tasks.service';

/**
 * Persists a finished order and, only when that succeeded, emails the
 * administrator in the background. The caller waits for the insert only.
 */
@Injectable()
export class OrderSubmissionService {
  private readonly logger = new Logger(OrderSubmissionService.name);

  constructor(
    private readonly ordersService: OrdersService,
    private readonly mailService: MailService,
    private readonly backgroundTasks: BackgroundTasks,
  ) {}

  async submit(order: NewOrder): Promise<boolean> {
    const saved = await this.ordersService.insert(order);
    if (!saved) {
      return false;
    }

    this.backgroundTasks.spawn(`admin-notification:${order.telegramUserId}`, async () => {
      const sent = await this.mailService.send(buildOrderNotification(order));
      if (!sent) {
        this.logger.warn(`Order for user ${order.telegramUserId} is saved but the admin was not notified`);
      }
    });

    return true;
  }
}
