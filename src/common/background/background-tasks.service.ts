import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getErrorMessage, getErrorStack } from '../utils/errors';

const DEFAULT_DRAIN_MS = 5000;

/**
 * Detached work (usage logging, admin notifications). Callers never await a
 * task and never see its failure: the completion handler only logs.
 */
@Injectable()
export class BackgroundTasks implements OnApplicationShutdown {
  private readonly logger = new Logger(BackgroundTasks.name);
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly configService: ConfigService) {}

  spawn(name: string, work: () => Promise<unknown>): void {
    const task: Promise<void> = Promise.resolve()
      .then(work)
      .then(
        () => {
          this.logger.debug(`Background task "${name}" completed`);
        },
        (error: unknown) => {
          this.logger.error(`Background task "${name}" failed: ${getErrorMessage(error)}`, getErrorStack(error));
        },
      )
      .finally(() => {
        this.pending.delete(task);
      });

    this.pending.add(task);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Waits for outstanding tasks, at most `timeoutMs`.
   * Resolves to true when everything finished in time.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.pending.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.allSettled([...this.pending]).then(() => true);

    try {
      return await Promise.race([settled, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    const outstanding = this.pending.size;
    if (outstanding === 0) return;

    const timeoutMs = this.configService.get<number>('app.shutdownDrainMs') ?? DEFAULT_DRAIN_MS;
    this.logger.log(`Draining ${outstanding} background task(s) before shutdown (${signal ?? 'no signal'})`);

    const drained = await this.drain(timeoutMs);
    if (!drained) {
      this.logger.warn(`${this.pending.size} background task(s) still running after ${timeoutMs} ms, shutting down anyway`);
    }
  }
}
