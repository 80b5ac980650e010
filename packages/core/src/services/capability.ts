/**
 * Delivery mode capability predicate
 *
 * Pure function over declared tag sets; no knowledge of concrete channel or
 * provider classes.
 */

import type { ChannelTag, DeliveryMode, ProviderTag } from '../types/index';

export function isModeSupported(
  mode: DeliveryMode,
  channelTags: ReadonlySet<ChannelTag>,
  providerTags: ReadonlySet<ProviderTag>
): boolean {
  switch (mode) {
    case 'card':
      return channelTags.has('music-card') && providerTags.has('card-addressable');
    case 'voice':
      return channelTags.has('voice');
    case 'file':
      return channelTags.has('binary-attachment');
    case 'text':
      return true;
  }
}
