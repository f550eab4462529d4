/**
 * Base channel for webhook notification targets.
 */

import type { IChannel, OutboundNotification } from "../../core/interfaces/channel.js";
import { errorMessage } from "../../core/errors.js";
import logger from "../../utils/logger.js";

export type FetchLike = typeof fetch;

/** Default request timeout: 15 seconds */
const DEFAULT_TIMEOUT_MS = 15 * 1000;

/**
 * Abstract base class for webhook channel implementations.
 *
 * Subclasses turn a notification into a platform payload; posting and
 * failure logging live here.
 */
export abstract class BaseChannel implements IChannel {
  /**
   * Channel name identifier.
   */
  abstract readonly name: string;

  protected fetchImpl: FetchLike;
  protected timeoutMs: number;

  constructor(options: { fetch?: FetchLike; timeoutMs?: number } = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Platform payload for a notification.
   */
  protected abstract buildPayload(msg: OutboundNotification): unknown;

  async send(msg: OutboundNotification): Promise<boolean> {
    return this.postJson(msg.target, this.buildPayload(msg));
  }

  /**
   * POST a JSON body. Resolves to whether the endpoint answered 2xx.
   */
  protected async postJson(url: string, body: unknown): Promise<boolean> {
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        logger.warn({ channel: this.name, status: response.status }, "Webhook returned an error status");
        return false;
      }
      return true;
    } catch (error) {
      logger.error({ channel: this.name, error: errorMessage(error) }, "Webhook request failed");
      return false;
    }
  }
}
