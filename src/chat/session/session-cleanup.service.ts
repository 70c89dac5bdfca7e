import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import { SessionRegistryService } from './session-registry.service';

@Injectable()
export class SessionCleanupService {
  private readonly logger = new Logger(SessionCleanupService.name);
  private readonly maxIdleMs: number;
  private isCleaning = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: SessionRegistryService,
  ) {
    const ttlMinutes = parseInt(
      this.configService.get<string>('SESSION_IDLE_TTL_MINUTES', '60'),
      10,
    );
    this.maxIdleMs = ttlMinutes * 60 * 1000;

    this.logger.log(
      `Session Cleanup Service initialized (idle TTL ${ttlMinutes} minutes)`,
    );
  }

  /**
   * Close idle sessions once a minute
   */
  @Interval(60_000)
  async closeIdleSessions(): Promise<void> {
    if (this.isCleaning) {
      this.logger.warn('Session cleanup already in progress, skipping');
      return;
    }

    this.isCleaning = true;
    try {
      const closed = await this.registry.closeIdle(this.maxIdleMs);
      if (closed > 0) {
        this.logger.log(
          `Closed ${closed} idle session(s), ${this.registry.count()} remaining`,
        );
      }
    } catch (error) {
      this.logger.error(
        'Failed to close idle sessions',
        error instanceof Error ? error.stack : String(error),
      );
    } finally {
      this.isCleaning = false;
    }
  }
}
