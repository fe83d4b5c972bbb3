import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('orders')
export class Order {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'telegram_user_id', type: 'bigint' })
  telegramUserId!: number;

  @Column({ name: 'telegram_username', type: 'varchar', length: 100, nullable: true })
  telegramUsername!: string | null;

  @Column({ type: 'varchar', length: 17, nullable: true })
  vin!: string | null;

  @Column({ name: 'contact_info', type: 'text' })
  contactInfo!: string;

  @Column({ name: 'parts_needed', type: 'text' })
  partsNeeded!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}

/** An order as assembled at the end of a conversation, before it is stored. */
export interface NewOrder {
  telegramUserId: number;
  telegramUsername?: string;
  vin?: string;
  contactInfo: string;
  partsNeeded: string;
}
