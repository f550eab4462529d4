/**
 * Channels infrastructure exports.
 */

export { BaseChannel, type FetchLike } from "./base.js";
export { TeamsWebhookChannel, buildAdaptiveCard } from "./teams-webhook.js";
