import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Post,
} from '@nestjs/common';
import { SERVICE_NAME } from './config/metrics.constants';
import { MetricsSnapshot } from './types/metrics.types';
import { normalizeDate } from './utils/date.util';
import { MetricsGeneratorService } from './services/metrics-generator.service';
import { MetricsStorageService } from './services/metrics-storage.service';

@Controller()
export class MetricsController {
  constructor(
    private readonly metricsGeneratorService: MetricsGeneratorService,
    private readonly metricsStorageService: MetricsStorageService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Get('metrics')
  async getMetrics(): Promise<MetricsSnapshot | { message: string }> {
    return (
      (await this.metricsStorageService.loadSnapshot()) ?? {
        message: 'metrics not found yet',
      }
    );
  }

  @Post('metrics/generate')
  async generateMetrics(
    @Body('now') nowRaw?: unknown,
  ): Promise<MetricsSnapshot> {
    return this.metricsGeneratorService.generateSnapshot({
      now: this.parseNow(nowRaw),
    });
  }

  private parseNow(value: unknown): Date | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    const parsed = typeof value === 'string' ? normalizeDate(value) : null;
    if (!parsed) {
      throw new BadRequestException(
        'now must be an ISO-8601 or RFC-822 date string',
      );
    }
    return parsed;
  }
}
