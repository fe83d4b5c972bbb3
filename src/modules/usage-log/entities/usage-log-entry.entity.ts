import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

export type InteractionType =
  | 'command'
  | 'callback_restart'
  | 'callback_query'
  | 'action_completed'
  | 'action_failed'
  | 'fallback';

@Entity('bot_usage_log')
export class UsageLogEntry {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_bot_usage_log_user_id')
  @Column({ name: 'user_id', type: 'bigint' })
  userId!: number;

  @Column({ type: 'varchar', length: 100, nullable: true })
  username!: string | null;

  @Column({ name: 'first_name', type: 'varchar', length: 255, nullable: true })
  firstName!: string | null;

  @Column({ name: 'interaction_type', type: 'varchar', length: 50 })
  interactionType!: InteractionType;

  @Column({ name: 'interaction_detail', type: 'text', nullable: true })
  interactionDetail!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
