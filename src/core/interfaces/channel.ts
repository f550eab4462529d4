/**
 * Notification channel interface.
 */

/**
 * Action button attached to a card message.
 */
export interface CardAction {
  title: string;
  url: string;
}

/**
 * Structured message with facts and actions, for channels that render cards.
 */
export interface CardMessage {
  title: string;
  summary: string;
  facts: Array<{ title: string; value: string }>;
  actions: CardAction[];
}

/**
 * Outbound message to a webhook target.
 */
export interface OutboundNotification {
  /** Webhook URL */
  target: string;
  /** Rendered plain/markdown text */
  text: string;
  /** Optional card; channels that cannot render it fall back to `text` */
  card?: CardMessage;
}

/**
 * Interface for notification channel implementations.
 */
export interface IChannel {
  /**
   * Channel name identifier.
   */
  readonly name: string;

  /**
   * Deliver a message. Resolves to whether the target accepted it.
   */
  send(msg: OutboundNotification): Promise<boolean>;
}
