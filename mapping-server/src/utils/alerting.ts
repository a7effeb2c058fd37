/**
 * Operator alert channel for the resolution engine.
 *
 * Alerts are always written to stderr. When a Discord webhook is configured,
 * alerts are also queued and forwarded in batches of embeds.
 */

export type AlertLevel = 'warning' | 'error';

export interface Alert {
  level: AlertLevel;
  title: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

export type WebhookFetch = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean }>;

export interface AlertConfig {
  discordWebhookUrl?: string | null;
  silent?: boolean;
  /** Send queued alerts automatically after this many milliseconds. 0 disables. */
  flushDelayMs?: number;
  fetchImpl?: WebhookFetch;
}

const DISCORD_MAX_EMBEDS = 10;

// Only the latest alerts are kept and queued; totals are counted per level
const MAX_RECENT_ALERTS = 50;

const LEVEL_EMOJI: Record<AlertLevel, string> = {
  warning: '⚠️',
  error: '❌',
};

const LEVEL_COLORS: Record<AlertLevel, number> = {
  warning: 0xf39c12, // Orange
  error: 0xe74c3c, // Red
};

export class Alerter {
  private recent: Alert[] = [];
  private readonly counts: Record<AlertLevel, number> = { warning: 0, error: 0 };
  private pending: Alert[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private readonly webhookUrl: string | null;
  private readonly silent: boolean;
  private readonly flushDelayMs: number;
  private readonly fetchImpl: WebhookFetch;

  constructor(config: AlertConfig = {}) {
    this.webhookUrl = config.discordWebhookUrl ?? null;
    this.silent = config.silent ?? false;
    this.flushDelayMs = config.flushDelayMs ?? 5000;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  private add(level: AlertLevel, title: string, message: string, details?: Record<string, unknown>): void {
    const alert: Alert = {
      level,
      title,
      message,
      details,
      timestamp: new Date().toISOString(),
    };

    this.counts[level]++;
    this.recent.push(alert);
    if (this.recent.length > MAX_RECENT_ALERTS) {
      this.recent.shift();
    }

    if (!this.silent) {
      this.logToConsole(alert);
    }

    if (this.webhookUrl) {
      this.pending.push(alert);
      if (this.pending.length > MAX_RECENT_ALERTS) {
        this.pending.shift();
      }
      this.scheduleFlush();
    }
  }

  warning(title: string, message: string, details?: Record<string, unknown>): void {
    this.add('warning', title, message, details);
  }

  error(title: string, message: string, details?: Record<string, unknown>): void {
    this.add('error', title, message, details);
  }

  private logToConsole(alert: Alert): void {
    const prefix = `${LEVEL_EMOJI[alert.level]} [${alert.level.toUpperCase()}]`;

    console.error(`${prefix} ${alert.title}`);
    console.error(`  ${alert.message}`);

    if (alert.details) {
      for (const [key, value] of Object.entries(alert.details)) {
        console.error(`  ${key}: ${JSON.stringify(value)}`);
      }
    }
  }

  private scheduleFlush(): void {
    if (this.flushDelayMs <= 0 || this.flushTimer) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush().catch((error) => {
        console.error('[alerting] Failed to flush alerts:', error);
      });
    }, this.flushDelayMs);
    this.flushTimer.unref();
  }

  /**
   * Send queued alerts to the Discord webhook.
   * Resolves false when no webhook is configured or any batch was refused.
   */
  async flush(): Promise<boolean> {
    if (!this.webhookUrl) {
      return false;
    }

    let delivered = true;
    while (this.pending.length > 0) {
      const batch = this.pending.splice(0, DISCORD_MAX_EMBEDS);
      const embeds = batch.map(alert => ({
        title: `${LEVEL_EMOJI[alert.level]} ${alert.title}`,
        description: alert.message,
        color: LEVEL_COLORS[alert.level],
        fields: alert.details
          ? Object.entries(alert.details).slice(0, 5).map(([name, value]) => ({
              name,
              value: String(value).slice(0, 200),
              inline: true,
            }))
          : undefined,
        timestamp: alert.timestamp,
      }));

      try {
        const response = await this.fetchImpl(this.webhookUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ embeds }),
        });
        delivered = delivered && response.ok;
      } catch (error) {
        console.error('[alerting] Failed to send Discord alert:', error);
        delivered = false;
      }
    }

    return delivered;
  }

  hasErrors(): boolean {
    return this.counts.error > 0;
  }

  /**
   * Exit code for CLI commands: 1 once an error was raised, 0 otherwise.
   */
  getExitCode(): number {
    return this.hasErrors() ? 1 : 0;
  }

  /** The most recent alerts, oldest first */
  getAlerts(): Alert[] {
    return [...this.recent];
  }

  /**
   * Stop the pending timer and deliver whatever is queued.
   */
  async close(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.pending.length > 0) {
      await this.flush();
    }
  }
}

export function createAlerter(config?: AlertConfig): Alerter {
  return new Alerter(config);
}
