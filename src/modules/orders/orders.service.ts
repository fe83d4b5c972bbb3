import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Order, NewOrder } from './entities/order.entity';
import { withTimeout } from '../../common/utils/timeout';
import { describeStoreError } from '../../common/utils/errors';

const DEFAULT_STORE_TIMEOUT_MS = 10_000;

type OrderRow = Pick<Order, 'telegramUserId' | 'contactInfo' | 'partsNeeded'> &
  Partial<Pick<Order, 'telegramUsername' | 'vin'>>;

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectRepository(Order)
    private readonly ordersRepository: Repository<Order>,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Inserts one order. Never throws: any failure, including a timeout,
   * is logged with the backend detail and reported as `false`.
   */
  async insert(order: NewOrder): Promise<boolean> {
    const row = this.toRow(order);
    const timeoutMs = this.configService.get<number>('orders.storeTimeoutMs') ?? DEFAULT_STORE_TIMEOUT_MS;

    this.logger.log(`Inserting order for user ${order.telegramUserId}: ${JSON.stringify(row)}`);

    try {
      await withTimeout(this.ordersRepository.insert(row), timeoutMs, 'orders.insert');
      this.logger.log(`Order saved for user ${order.telegramUserId}`);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to save order for user ${order.telegramUserId}. Data attempted: ${JSON.stringify(row)}`,
      );
      this.logger.error(`Order store error details: ${describeStoreError(error)}`);
      return false;
    }
  }

  // Optional fields are left out rather than written as explicit nulls
  private toRow(order: NewOrder): OrderRow {
    const row: OrderRow = {
      telegramUserId: order.telegramUserId,
      contactInfo: order.contactInfo,
      partsNeeded: order.partsNeeded,
    };
    if (order.telegramUsername) row.telegramUsername = order.telegramUsername;
    if (order.vin) row.vin = order.vin;
    return row;
  }
}
