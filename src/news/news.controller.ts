import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
} from '@nestjs/common';
import { SERVICE_NAME } from './config/news.constants';
import { DeliveryHistoryService } from './services/delivery-history.service';
import { NewsRelayService } from './services/news-relay.service';
import { DeliveryRecord, RunResult } from './types/news.types';

const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 200;

@Controller()
export class NewsController {
  constructor(
    private readonly newsRelayService: NewsRelayService,
    private readonly deliveryHistoryService: DeliveryHistoryService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string; running: boolean } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
      running: this.newsRelayService.isRunning(),
    };
  }

  @Post('news/run')
  @HttpCode(200)
  async run(
    @Body('maxDeliveries') maxDeliveriesRaw?: unknown,
    @Body('dryRun') dryRunRaw?: unknown,
  ): Promise<RunResult> {
    return this.newsRelayService.run({
      maxDeliveries: this.parsePositiveInt(maxDeliveriesRaw, 'maxDeliveries'),
      dryRun: this.parseBoolean(dryRunRaw, 'dryRun'),
    });
  }

  @Get('news/deliveries')
  async getDeliveries(
    @Query('limit') limitRaw?: string,
  ): Promise<{ total: number; items: DeliveryRecord[] }> {
    const limit = Math.min(
      MAX_HISTORY_LIMIT,
      this.parsePositiveInt(limitRaw, 'limit') ?? DEFAULT_HISTORY_LIMIT,
    );
    const [total, items] = await Promise.all([
      this.deliveryHistoryService.count(),
      this.deliveryHistoryService.listRecent(limit),
    ]);
    return { total, items };
  }

  private parsePositiveInt(
    value: unknown,
    fieldName: string,
  ): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new BadRequestException(`${fieldName} must be a positive number`);
    }
    return Math.floor(parsed);
  }

  private parseBoolean(value: unknown, fieldName: string): boolean {
    if (value == null || value === '') {
      return false;
    }
    if (typeof value === 'boolean') {
      return value;
    }
    if (typeof value === 'number') {
      if (value === 1) {
        return true;
      }
      if (value === 0) {
        return false;
      }
    }
    if (typeof value === 'string') {
      const lowered = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y'].includes(lowered)) {
        return true;
      }
      if (['0', 'false', 'no', 'n'].includes(lowered)) {
        return false;
      }
    }

    throw new BadRequestException(`${fieldName} must be a boolean value`);
  }
}
