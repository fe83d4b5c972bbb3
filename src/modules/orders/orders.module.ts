import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Order } from './entities/order.entity';
import { OrdersService } from './orders.service';
import { OrderSubmissionService } from './order-submission.service';
import { MailModule } from '../mail/mail.module';

@Module({
  imports: [TypeOrmModule.forFeature([Order]), MailModule],
  providers: [OrdersService, OrderSubmissionService],
  exports: [OrdersService, OrderSubmissionService],
})
export class OrdersModule {}
