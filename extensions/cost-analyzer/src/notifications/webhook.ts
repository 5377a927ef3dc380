// ─── Webhook Notifications ─────────────────────────────────────────────
//
// Sends the analysis summary to webhook channels. Delivery failures are
// returned as records, never thrown, so a broken channel cannot fail an
// analysis run.
// ───────────────────────────────────────────────────────────────────────

import type { WebhookChannelConfig } from "../config/schema.js";
import { NotificationError, formatErrorMessage } from "../errors.js";
import { createSilentLogger, type CostAnalyzerLogger } from "../logging/logger.js";
import { formatNotificationSummary } from "../reports/markdown.js";
import type { AnalysisResult } from "../types.js";

/* ------------------------------------------------------------------ */
/*  Types                                                               */
/* ------------------------------------------------------------------ */

export type WebhookFormat = WebhookChannelConfig["format"];

export type NotificationChannel = {
  id: string;
  config: WebhookChannelConfig;
};

export type WebhookRequest = {
  url: string;
  body: string;
  timeoutMs: number;
};

/**
 * Delivers one request. Resolve with the HTTP outcome; throwing is treated
 * as a failed delivery.
 */
export type WebhookSender = (request: WebhookRequest) => Promise<{ ok: boolean; status: number; error?: string }>;

export type NotificationStatus = "sent" | "failed" | "skipped";

export type NotificationRecord = {
  channelId: string;
  status: NotificationStatus;
  message: string;
  sentAt: string;
  statusCode?: number;
  error?: string;
};

/* ------------------------------------------------------------------ */
/*  Payloads                                                            */
/* ------------------------------------------------------------------ */

export const DEFAULT_NOTIFICATION_TITLE = "Cloud Cost Report";

/**
 * Build the JSON body for a channel format. Feishu gets an interactive card
 * with a lark_md body; everything else gets `{ title, text }`.
 */
export function buildWebhookPayload(format: WebhookFormat, title: string, text: string): Record<string, unknown> {
  if (format === "feishu") {
    return {
      msg_type: "interactive",
      card: {
        elements: [{ tag: "div", text: { content: text, tag: "lark_md" } }],
        header: { title: { content: title, tag: "plain_text" } },
      },
    };
  }
  return { title, text };
}

/* ------------------------------------------------------------------ */
/*  Sender                                                              */
/* ------------------------------------------------------------------ */

export const fetchSender: WebhookSender = async ({ url, body, timeoutMs }) => {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (response.ok) return { ok: true, status: response.status };
  const detail = await response.text();
  return { ok: false, status: response.status, error: `HTTP ${response.status}: ${detail.slice(0, 200)}` };
};

/* ------------------------------------------------------------------ */
/*  Dispatch                                                            */
/* ------------------------------------------------------------------ */

export type NotifyOptions = {
  sender?: WebhookSender;
  logger?: CostAnalyzerLogger;
  title?: string;
  now?: () => Date;
};

export async function sendToChannel(
  channel: NotificationChannel,
  message: string,
  options: NotifyOptions = {},
): Promise<NotificationRecord> {
  const sender = options.sender ?? fetchSender;
  const log = options.logger ?? createSilentLogger();
  const sentAt = () => (options.now?.() ?? new Date()).toISOString();
  const { config } = channel;

  if (!config.enabled || !config.url) {
    return { channelId: channel.id, status: "skipped", message, sentAt: sentAt() };
  }

  const body = JSON.stringify(buildWebhookPayload(config.format, options.title ?? DEFAULT_NOTIFICATION_TITLE, message));
  try {
    const result = await sender({ url: config.url, body, timeoutMs: config.timeoutMs });
    if (!result.ok) {
      const error = new NotificationError(channel.id, result.error ?? `HTTP ${result.status}`);
      log.warn(`Notification delivery failed`, { error: error.message });
      return {
        channelId: channel.id,
        status: "failed",
        message,
        sentAt: sentAt(),
        statusCode: result.status,
        error: error.message,
      };
    }
    log.info(`Notification sent to ${channel.id}`);
    return { channelId: channel.id, status: "sent", message, sentAt: sentAt(), statusCode: result.status };
  } catch (err) {
    const error = new NotificationError(channel.id, formatErrorMessage(err), { cause: err });
    log.warn(`Notification delivery failed`, { error: error.message });
    return { channelId: channel.id, status: "failed", message, sentAt: sentAt(), error: error.message };
  }
}

/**
 * Send an analysis summary to every channel in parallel.
 */
export async function notifyChannels(
  result: AnalysisResult,
  channels: readonly NotificationChannel[],
  options: NotifyOptions = {},
): Promise<NotificationRecord[]> {
  const message = formatNotificationSummary(result);
  return Promise.all(channels.map((channel) => sendToChannel(channel, message, options)));
}
