import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { NewsRelayService } from './news/services/news-relay.service';
import {
  TelegramDeliveryService,
} from './news/services/telegram-delivery.service';

const logger = new Logger('RunOnce');

// Cron entry point: one pipeline run, then exit.
async function main(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    if (!app.get(TelegramDeliveryService).isConfigured()) {
      logger.error('BOT_TOKEN and CHANNEL_ID must be set');
      return 1;
    }
    const result = await app.get(NewsRelayService).run();
    logger.log(`run result: ${JSON.stringify(result)}`);
    return result.status === 'failed' ? 1 : 0;
  } finally {
    await app.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`run-once crashed: ${message}`);
    process.exitCode = 1;
  });
