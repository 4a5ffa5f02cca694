import axios from 'axios';
import { z } from 'zod';

import type { CompletionNotification } from '../types/timer';
import { errorMessage } from '../utils/errors';

export interface Notifier {
  notify(notification: CompletionNotification): Promise<void>;
}

export class NotificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationError';
  }
}

export interface NotificationStream {
  write(chunk: string): unknown;
}

const BELL = '\u0007';

export class TerminalNotifier implements Notifier {
  constructor(private readonly stream: NotificationStream) {}

  async notify({ title, body }: CompletionNotification): Promise<void> {
    try {
      this.stream.write(`${BELL}${title}: ${body}\n`);
    } catch (error) {
      throw new NotificationError(`Unable to deliver notification: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

const webhookOptionsSchema = z.object({
  url: z.string().url(),
  timeoutMs: z.number().int().positive().default(10000),
  headers: z.record(z.string()).default({}),
});

export type WebhookNotifierOptions = z.input<typeof webhookOptionsSchema>;

export type HttpPost = (
  url: string,
  data: unknown,
  config: { timeout: number; headers: Record<string, string> },
) => Promise<{ status: number }>;

export class WebhookNotifier implements Notifier {
  private readonly options: z.output<typeof webhookOptionsSchema>;

  constructor(
    options: WebhookNotifierOptions,
    private readonly post: HttpPost = (url, data, config) => axios.post(url, data, config),
    private readonly now: () => Date = () => new Date(),
  ) {
    this.options = webhookOptionsSchema.parse(options);
  }

  async notify(notification: CompletionNotification): Promise<void> {
    try {
      await this.post(
        this.options.url,
        { ...notification, sentAt: this.now().toISOString() },
        {
          timeout: this.options.timeoutMs,
          headers: { 'content-type': 'application/json', ...this.options.headers },
        },
      );
    } catch (error) {
      throw new NotificationError(`Notification webhook ${this.options.url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export type NotifierSettings =
  | { kind: 'terminal' }
  | { kind: 'webhook'; webhookUrl: string; webhookTimeoutMs: number };

export const createNotifier = (settings: NotifierSettings, stream: NotificationStream): Notifier => {
  if (settings.kind === 'webhook') {
    return new WebhookNotifier({ url: settings.webhookUrl, timeoutMs: settings.webhookTimeoutMs });
  }
  return new TerminalNotifier(stream);
};
