import { FetchLike, HttpStatusError, fetchWithTimeout } from "@src/util/http";
import { getLogger } from "@src/util/logger";
import { Result, fail, ok } from "@src/util/result";
import { DeliveryFailure, describeError } from "../domain/errors";
import type { DeliverySink } from "./contracts";

/** Discord rejects message content above this length. */
export const DISCORD_CONTENT_LIMIT = 2000;

export interface DiscordWebhookSinkOptions {
  webhookUrl?: string;
  username: string;
  timeoutMs?: number;
  fetchFn?: FetchLike;
}

/**
 * Posts the bulletin to a Discord webhook. One attempt, no retries.
 */
export function createDiscordWebhookSink(
  options: DiscordWebhookSinkOptions
): DeliverySink {
  const logger = getLogger("bulletin/discord_webhook_sink");

  return {
    id: "discord-webhook",
    async deliver(message: string): Promise<Result<void, DeliveryFailure>> {
      const { webhookUrl } = options;
      if (!webhookUrl) {
        logger.warn("discord webhook not configured, skipping delivery");
        return fail(new DeliveryFailure("webhook not configured"));
      }
      if (message.length > DISCORD_CONTENT_LIMIT) {
        logger.warn(
          { length: message.length, limit: DISCORD_CONTENT_LIMIT },
          "message exceeds discord content limit"
        );
      }

      try {
        await fetchWithTimeout(webhookUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ content: message, username: options.username }),
          timeoutMs: options.timeoutMs ?? 10_000,
          fetchFn: options.fetchFn,
        });
      } catch (err) {
        const status = err instanceof HttpStatusError ? err.status : undefined;
        const failure = new DeliveryFailure(
          status !== undefined
            ? `discord webhook rejected message (HTTP ${status})`
            : `discord webhook request failed: ${describeError(err)}`,
          status,
          { cause: err }
        );
        logger.warn({ status, error: failure.message }, "discord delivery failed");
        return fail(failure);
      }

      logger.info({ length: message.length }, "discord delivery succeeded");
      return ok(undefined);
    },
  };
}
