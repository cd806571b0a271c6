/**
 * NotificationSink - alert fan-out for operational events
 *
 * Delivers to any mix of log, Slack, Discord and generic webhook channels.
 * Delivery failures are logged per channel and never thrown to the caller.
 *
 * @module deploy/slotcast/health/notification-sink
 */

import { errorMessage } from '../errors.js';

// =============================================================================
// Types and Interfaces
// =============================================================================

export type Severity = 'info' | 'warning' | 'critical';

export const SEVERITIES: readonly Severity[] = ['info', 'warning', 'critical'];

export type NotificationContext = Record<string, string | number | boolean | null>;

export interface NotificationSink {
  notify(severity: Severity, message: string, context?: NotificationContext): Promise<void>;
}

export type ChannelType = 'slack' | 'discord' | 'webhook' | 'log';

export interface NotificationChannel {
  type: ChannelType;
  url?: string;
  /** Slack channel override */
  channel?: string;
}

export interface NotificationConfig {
  enabled: boolean;
  channels: NotificationChannel[];
  minSeverity: Severity;
}

export interface NotificationPayload {
  timestamp: string;
  severity: Severity;
  message: string;
  context?: NotificationContext;
  source: string;
}

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
}>;

const SEVERITY_ORDER: Record<Severity, number> = {
  info: 0,
  warning: 1,
  critical: 2,
};

const DEFAULT_CONFIG: NotificationConfig = {
  enabled: true,
  channels: [{ type: 'log' }],
  minSeverity: 'info',
};

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

/**
 * Mask everything after the first path segment so webhook tokens never
 * reach the logs.
 *
 * @example
 * sanitizeWebhookUrl('https://hooks.slack.com/services/T00/B00/xxxx')
 * // => 'https://hooks.slack.com/services/***MASKED***'
 */
export function sanitizeWebhookUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const pathParts = parsed.pathname.split('/').filter(Boolean);
    if (pathParts.length > 1) {
      return `${parsed.protocol}//${parsed.host}/${pathParts[0]}/***MASKED***`;
    }
    return `${parsed.protocol}//${parsed.host}/***MASKED***`;
  } catch {
    return '***INVALID_URL***';
  }
}

// =============================================================================
// CompositeNotificationSink
// =============================================================================

export class CompositeNotificationSink implements NotificationSink {
  private readonly config: NotificationConfig;
  private readonly fetchImpl: FetchLike;

  constructor(
    config?: Partial<NotificationConfig>,
    private readonly source: string = 'slotcast',
    fetchImpl?: FetchLike
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  async notify(severity: Severity, message: string, context?: NotificationContext): Promise<void> {
    if (!this.config.enabled) return;
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) return;

    const payload: NotificationPayload = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      context,
      source: this.source,
    };

    const results = await Promise.allSettled(
      this.config.channels.map((channel) => this.sendToChannel(channel, payload))
    );

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const channel = this.config.channels[index];
        const safeUrl = channel.url ? sanitizeWebhookUrl(channel.url) : 'N/A';
        console.error(
          `[notification-sink] Failed to send to ${channel.type} (${safeUrl}): ${errorMessage(result.reason)}`
        );
      }
    });
  }

  getConfig(): Readonly<NotificationConfig> {
    return { ...this.config };
  }

  private async sendToChannel(channel: NotificationChannel, payload: NotificationPayload): Promise<void> {
    switch (channel.type) {
      case 'slack':
        return this.post(channel, 'Slack', slackBody(channel, payload));
      case 'discord':
        return this.post(channel, 'Discord', discordBody(payload));
      case 'webhook':
        return this.post(channel, 'Webhook', payload);
      case 'log':
        logPayload(payload);
        return;
    }
  }

  private async post(channel: NotificationChannel, label: string, body: unknown): Promise<void> {
    if (!channel.url) {
      throw new Error(`${label} channel requires url`);
    }
    const response = await this.fetchImpl(channel.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    if (!response.ok) {
      throw new Error(`${label} error: ${response.status} ${response.statusText}`);
    }
  }
}

// =============================================================================
// Channel Renderers
// =============================================================================

function slackBody(channel: NotificationChannel, payload: NotificationPayload) {
  const emoji =
    payload.severity === 'critical' ? ':rotating_light:' : payload.severity === 'warning' ? ':warning:' : ':information_source:';

  return {
    text: `${emoji} *${payload.severity.toUpperCase()}*: ${payload.message}`,
    attachments: payload.context
      ? [
          {
            color: payload.severity === 'critical' ? '#ff0000' : payload.severity === 'warning' ? '#ffaa00' : '#00aaff',
            fields: Object.entries(payload.context).map(([title, value]) => ({
              title,
              value: String(value),
              short: true,
            })),
            footer: `${payload.source} | ${payload.timestamp}`,
          },
        ]
      : undefined,
    channel: channel.channel,
  };
}

function discordBody(payload: NotificationPayload) {
  const color = payload.severity === 'critical' ? 0xff0000 : payload.severity === 'warning' ? 0xffaa00 : 0x00aaff;

  return {
    embeds: [
      {
        title: `${payload.severity.toUpperCase()}: ${payload.source}`,
        description: payload.message,
        color,
        fields: payload.context
          ? Object.entries(payload.context).map(([name, value]) => ({ name, value: String(value), inline: true }))
          : undefined,
        timestamp: payload.timestamp,
        footer: { text: payload.source },
      },
    ],
  };
}

function logPayload(payload: NotificationPayload): void {
  const line = `[${payload.timestamp}] [${payload.severity.toUpperCase()}] ${payload.message}`;
  const context = payload.context ?? '';

  if (payload.severity === 'critical') {
    console.error(line, context);
  } else if (payload.severity === 'warning') {
    console.warn(line, context);
  } else {
    console.log(line, context);
  }
}

// =============================================================================
// Null Sink
// =============================================================================

export class NullNotificationSink implements NotificationSink {
  async notify(): Promise<void> {
    // No-op
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createNotificationSink(config?: Partial<NotificationConfig>, source?: string): NotificationSink {
  if (config?.enabled === false) {
    return new NullNotificationSink();
  }
  return new CompositeNotificationSink(config, source);
}

/**
 * Build a sink from the environment.
 *
 * - SLOTCAST_NOTIFY_ENABLED: 'false' disables all channels
 * - SLOTCAST_NOTIFY_MIN_SEVERITY: 'info' | 'warning' | 'critical' (default: warning)
 * - SLOTCAST_NOTIFY_SLACK_URL / SLOTCAST_NOTIFY_SLACK_CHANNEL
 * - SLOTCAST_NOTIFY_DISCORD_URL
 * - SLOTCAST_NOTIFY_WEBHOOK_URL
 */
export function createNotificationSinkFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  source?: string
): NotificationSink {
  const enabled = env.SLOTCAST_NOTIFY_ENABLED !== 'false';

  let minSeverity: Severity = 'warning';
  const envSeverity = env.SLOTCAST_NOTIFY_MIN_SEVERITY;
  if (envSeverity) {
    if (isSeverity(envSeverity)) {
      minSeverity = envSeverity;
    } else {
      console.warn(
        `[notification-sink] Invalid SLOTCAST_NOTIFY_MIN_SEVERITY="${envSeverity}", using default "warning"`
      );
    }
  }

  const channels: NotificationChannel[] = [{ type: 'log' }];

  if (env.SLOTCAST_NOTIFY_SLACK_URL) {
    channels.push({ type: 'slack', url: env.SLOTCAST_NOTIFY_SLACK_URL, channel: env.SLOTCAST_NOTIFY_SLACK_CHANNEL });
  }
  if (env.SLOTCAST_NOTIFY_DISCORD_URL) {
    channels.push({ type: 'discord', url: env.SLOTCAST_NOTIFY_DISCORD_URL });
  }
  if (env.SLOTCAST_NOTIFY_WEBHOOK_URL) {
    channels.push({ type: 'webhook', url: env.SLOTCAST_NOTIFY_WEBHOOK_URL });
  }

  return createNotificationSink({ enabled, channels, minSeverity }, source);
}
