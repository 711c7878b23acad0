import { Injectable, Logger } from '@nestjs/common';
import {
  TELEGRAM_API_BASE,
  TELEGRAM_MAX_RETRIES,
  TELEGRAM_MAX_RETRY_AFTER_MS,
  TELEGRAM_RETRY_BACKOFF_MS,
  TELEGRAM_TIMEOUT_MS,
} from '../config/news.constants';
import { DeliveryChannel, SendResult } from '../types/news.types';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

interface TelegramResponse {
  ok: boolean;
  status: number;
  description: string;
  retryAfterSec: number | null;
}

@Injectable()
export class TelegramDeliveryService implements DeliveryChannel {
  private readonly logger = new Logger(TelegramDeliveryService.name);

  isConfigured(): boolean {
    return Boolean(this.botToken() && this.channelId());
  }

  async send(
    text: string,
    options: { allowLinkPreview: boolean },
  ): Promise<SendResult> {
    const token = this.botToken();
    const chatId = this.channelId();
    if (!token || !chatId) {
      return { ok: false, error: 'BOT_TOKEN or CHANNEL_ID is not set' };
    }

    const url = `${TELEGRAM_API_BASE}/bot${token}/sendMessage`;
    const body = JSON.stringify({
      chat_id: chatId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: !options.allowLinkPreview,
    });

    for (let attempt = 1; attempt <= TELEGRAM_MAX_RETRIES + 1; attempt += 1) {
      const response = await this.post(url, body);
      if (response.ok) {
        return { ok: true };
      }

      const retryable =
        response.status === 0 || RETRYABLE_STATUS.has(response.status);
      const waitMs =
        response.retryAfterSec != null
          ? response.retryAfterSec * 1000
          : TELEGRAM_RETRY_BACKOFF_MS * 2 ** (attempt - 1);
      if (
        retryable &&
        attempt <= TELEGRAM_MAX_RETRIES &&
        waitMs <= TELEGRAM_MAX_RETRY_AFTER_MS
      ) {
        this.logger.warn(
          `telegram send retry: attempt=${attempt} status=${response.status} waitMs=${waitMs}`,
        );
        await this.sleep(waitMs);
        continue;
      }

      const error = `telegram ${response.status}: ${response.description}`;
      this.logger.warn(`telegram send failed: ${error}`);
      return { ok: false, error };
    }

    return { ok: false, error: 'telegram retries exhausted' };
  }

  private async post(url: string, body: string): Promise<TelegramResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), TELEGRAM_TIMEOUT_MS);
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: controller.signal,
      });
      const raw = await res.text();
      const json = this.parseJson(raw);
      const apiOk = json?.ok === true;
      const parameters = this.asRecord(json?.parameters);
      const retryAfter = parameters?.retry_after;
      return {
        ok: res.ok && apiOk,
        status: res.status,
        description:
          typeof json?.description === 'string'
            ? json.description
            : raw.slice(0, 180),
        retryAfterSec: typeof retryAfter === 'number' ? retryAfter : null,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        status: 0,
        description: message,
        retryAfterSec: null,
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  private parseJson(raw: string): Record<string, unknown> | null {
    try {
      return this.asRecord(JSON.parse(raw));
    } catch {
      return null;
    }
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }

  private botToken(): string {
    return (process.env.BOT_TOKEN ?? '').trim();
  }

  private channelId(): string {
    return (process.env.CHANNEL_ID ?? '').trim();
  }

  private async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
