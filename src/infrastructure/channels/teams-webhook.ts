/**
 * Teams-compatible incoming webhook channel.
 */

import type { CardMessage, OutboundNotification } from "../../core/interfaces/channel.js";
import { BaseChannel } from "./base.js";

/**
 * Adaptive card attachment for a card message.
 */
export function buildAdaptiveCard(card: CardMessage): Record<string, unknown> {
  return {
    type: "message",
    attachments: [
      {
        contentType: "application/vnd.microsoft.card.adaptive",
        content: {
          $schema: "http://adaptivecards.io/schemas/adaptive-card.json",
          type: "AdaptiveCard",
          version: "1.4",
          body: [
            { type: "TextBlock", text: card.title, weight: "Bolder", size: "Large", wrap: true },
            { type: "TextBlock", text: card.summary, spacing: "Medium", wrap: true },
            { type: "FactSet", facts: card.facts, spacing: "Medium" },
          ],
          actions: card.actions.map((action) => ({
            type: "Action.OpenUrl",
            title: action.title,
            url: action.url,
          })),
        },
      },
    ],
  };
}

/**
 * Posts plain text, or an adaptive card when the notification carries one.
 */
export class TeamsWebhookChannel extends BaseChannel {
  readonly name = "teams";

  protected buildPayload(msg: OutboundNotification): unknown {
    if (msg.card) {
      return buildAdaptiveCard(msg.card);
    }
    return { text: msg.text };
  }
}
