// Telegram Notifications

/**
 * Where alerts and status lines go. send() delivers a whole message or throws.
 */
export interface AlertSink {
  send(text: string): Promise<void>;
  log(text: string): Promise<void>;
}

export class TelegramError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'TelegramError';
    this.status = status;
  }
}

interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  description?: string;
}

export interface TelegramUser {
  id: number;
  is_bot: boolean;
  username?: string;
}

export class TelegramClient implements AlertSink {
  private base: string;
  private chatId: string;
  private timeoutMs: number;

  constructor(botToken: string, chatId: string, timeoutSeconds = 20) {
    this.base = `https://api.telegram.org/bot${botToken}`;
    this.chatId = chatId;
    this.timeoutMs = timeoutSeconds * 1000;
  }

  private async post<T>(method: string, payload: Record<string, unknown>): Promise<T> {
    const res = await fetch(`${this.base}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const errorText = await res.text().catch(() => '');
      throw new TelegramError(`Telegram HTTP ${res.status}: ${errorText}`, res.status);
    }

    const data = await res.json() as TelegramResponse<T>;
    if (!data.ok || data.result === undefined) {
      throw new TelegramError(`Telegram API error: ${data.description ?? 'no result'}`, res.status);
    }
    return data.result;
  }

  /**
   * Send an alert to the configured chat
   */
  async send(text: string): Promise<void> {
    await this.post('sendMessage', { chat_id: this.chatId, text });
  }

  /**
   * Status and warning lines. Same chat as alerts for now.
   */
  async log(text: string): Promise<void> {
    await this.send(text);
  }

  async getMe(): Promise<TelegramUser> {
    return await this.post<TelegramUser>('getMe', {});
  }
}
