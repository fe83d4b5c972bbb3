import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UsageLogEntry, InteractionType } from './entities/usage-log-entry.entity';
import { BackgroundTasks } from '../../common/background/background-tasks.service';

export interface Interaction {
  userId: number;
  username?: string;
  firstName?: string;
  interactionType: InteractionType;
  detail?: string;
}

type UsageLogRow = Pick<UsageLogEntry, 'userId' | 'interactionType'> &
  Partial<Pick<UsageLogEntry, 'username' | 'firstName' | 'interactionDetail'>>;

@Injectable()
export class UsageLogService {
  constructor(
    @InjectRepository(UsageLogEntry)
    private readonly usageLogRepository: Repository<UsageLogEntry>,
    private readonly backgroundTasks: BackgroundTasks,
  ) {}

  /** Fire-and-forget: a failed insert is logged by the task runner only. */
  record(interaction: Interaction): void {
    const row: UsageLogRow = {
      userId: interaction.userId,
      interactionType: interaction.interactionType,
    };
    if (interaction.username) row.username = interaction.username;
    if (interaction.firstName) row.firstName = interaction.firstName;
    if (interaction.detail) row.interactionDetail = interaction.detail;

    this.backgroundTasks.spawn(`usage-log:${interaction.interactionType}`, async () => {
      await this.usageLogRepository.insert(row);
    });
  }
}
