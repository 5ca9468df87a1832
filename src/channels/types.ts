/**
 * Type definitions for channel listing and probing
 */

/** Channel handle exactly as configured; also the history key */
export type Channel = string;

/**
 * Provider availability values that mean the item cannot be fetched
 * without credentials we do not have
 */
export const GATED_AVAILABILITY = ['private', 'premium_only', 'subscriber_only', 'needs_auth'] as const;

export interface Item {
  id: string;               // Provider video id, unique within the provider
  title: string;
  url: string;              // Watch URL handed to yt-dlp
  duration?: number;        // Whole seconds, when the listing reports it
  availability?: string;    // Provider hint from the flat listing, if any
}

/**
 * Lists candidate items for a channel
 * Throws ProviderError when the provider cannot be reached or answers garbage
 */
export interface ItemLister {
  list(channel: Channel): Promise<Item[]>;
}

/**
 * Decides whether an item can be fetched right now
 * Implementations return false rather than throw where they can
 */
export interface AccessibilityProbe {
  isAccessible(item: Item): Promise<boolean>;
}
