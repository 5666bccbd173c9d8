/**
 * Scoped attachment of a timeline store to an external event channel.
 * The caller owns the handle; the store never registers listeners itself.
 *
 * @module timeline/subscription
 */

import { TimelineStore } from './store';

export const DEFAULT_CHANNEL_EVENT = 'agent:event';

type ChannelListener = (event: unknown) => void;

/** Node-style emitter, e.g. `EventEmitter`. */
export interface EmitterChannel {
  on(eventName: string, listener: ChannelListener): unknown;
  off(eventName: string, listener: ChannelListener): unknown;
}

/** DOM-style target, e.g. `EventTarget` or `window`. */
export interface TargetChannel {
  addEventListener(type: string, listener: ChannelListener): void;
  removeEventListener(type: string, listener: ChannelListener): void;
}

export type TimelineChannel = EmitterChannel | TargetChannel;

export interface SubscribeOptions {
  readonly eventName?: string;
  /** Aborting the signal stops the subscription. */
  readonly signal?: AbortSignal;
}

export interface TimelineSubscription {
  readonly active: boolean;
  stop(): void;
}

function isTargetChannel(channel: TimelineChannel): channel is TargetChannel {
  return 'addEventListener' in channel && typeof channel.addEventListener === 'function';
}

/**
 * `CustomEvent`-style wrappers carry the record in `detail`.
 */
export function unwrapChannelEvent(event: unknown): unknown {
  if (typeof event === 'object' && event !== null && 'detail' in event) {
    return event.detail;
  }
  return event;
}

const INACTIVE: TimelineSubscription = Object.freeze({
  active: false,
  stop: () => undefined,
});

export function subscribeToChannel(
  channel: TimelineChannel,
  store: TimelineStore,
  options: SubscribeOptions = {}
): TimelineSubscription {
  const eventName = options.eventName ?? DEFAULT_CHANNEL_EVENT;
  const { signal } = options;

  if (signal?.aborted) {
    return INACTIVE;
  }

  let active = true;

  const listener: ChannelListener = (event) => {
    if (!active) {
      return;
    }
    store.dispatch(unwrapChannelEvent(event));
  };

  const detach = (): void => {
    if (isTargetChannel(channel)) {
      channel.removeEventListener(eventName, listener);
    } else {
      channel.off(eventName, listener);
    }
  };

  const stop = (): void => {
    if (!active) {
      return;
    }
    active = false;
    detach();
    signal?.removeEventListener('abort', stop);
  };

  if (isTargetChannel(channel)) {
    channel.addEventListener(eventName, listener);
  } else {
    channel.on(eventName, listener);
  }
  signal?.addEventListener('abort', stop, { once: true });

  return {
    get active() {
      return active;
    },
    stop,
  };
}
