import { LRUCache } from 'lru-cache';
import type { OutcomeEvent } from '../ledger/purchase.js';
import { getComponentLogger } from '../logging/logger.js';
import { SubscriberHandle } from './SubscriberHandle.js';

/**
 * How a channel ended: with an outcome event, or closed without one (cancellation).
 */
export type ChannelSettlement =
    | { kind: 'event'; event: OutcomeEvent }
    | { kind: 'closed' };

/**
 * Durable fallback used when a subscriber arrives after the in-memory settlement was evicted
 * (or was published by another process). Returns null while the channel is still open.
 */
export type SettlementLookup = (channelId: string) => Promise<ChannelSettlement | null>;

export interface BroadcasterOptions {
    /** How long a settled channel's outcome is kept for late subscribers */
    readonly retentionMs: number;
    readonly maxSettledChannels?: number;
    readonly lookup?: SettlementLookup;
}

const DEFAULT_MAX_SETTLED_CHANNELS = 10_000;

/**
 * Event Broadcaster
 *
 * In-memory routing from channel id to live subscribers. A channel carries at most
 * one outcome: the first publish settles it, later publishes are suppressed. Settled
 * channels drop their subscriber set immediately; their outcome stays in a bounded
 * cache so that a subscriber arriving late is answered at once.
 */
export class EventBroadcaster {
    private readonly logger = getComponentLogger('EventBroadcaster');
    private readonly channels = new Map<string, Set<SubscriberHandle>>();
    private readonly settled: LRUCache<string, ChannelSettlement>;
    private readonly lookup: SettlementLookup | undefined;

    constructor(options: BroadcasterOptions) {
        this.settled = new LRUCache<string, ChannelSettlement>({
            max: options.maxSettledChannels ?? DEFAULT_MAX_SETTLED_CHANNELS,
            ttl: options.retentionMs
        });
        this.lookup = options.lookup;
    }

    /**
     * Register a subscriber. If the channel is already settled the outcome is replayed
     * into the handle before it is returned.
     */
    public async subscribe(channelId: string): Promise<SubscriberHandle> {
        const handle = new SubscriberHandle(channelId, released => this.release(released));

        const cached = this.settled.get(channelId);
        if (cached) {
            this.replay(handle, cached);
            return handle;
        }

        // Registered before the lookup so a publish racing with it still reaches this handle.
        this.handlesFor(channelId).add(handle);

        if (this.lookup) {
            let settlement: ChannelSettlement | null;
            try {
                settlement = await this.lookup(channelId);
            } catch (error) {
                handle.unsubscribe();
                throw error;
            }
            if (settlement && !handle.isClosed) {
                this.remember(channelId, settlement);
                this.replay(handle, settlement);
                this.release(handle);
            }
        }

        return handle;
    }

    /**
     * Deliver an outcome to every live subscriber of the channel.
     * Returns the number of subscribers reached; 0 when suppressed.
     */
    public publish(channelId: string, event: OutcomeEvent): number {
        if (this.settled.has(channelId)) {
            this.logger.debug({ channelId, status: event.status }, 'Publish suppressed: channel already settled');
            return 0;
        }
        this.remember(channelId, { kind: 'event', event });

        const handles = this.channels.get(channelId);
        this.channels.delete(channelId);

        let reached = 0;
        for (const handle of handles ?? []) {
            if (handle.deliver(event)) {
                reached++;
            }
        }

        this.logger.info({ channelId, purchaseId: event.purchaseId, status: event.status, reached }, 'Outcome published');
        return reached;
    }

    /**
     * Settle a channel without an outcome; live subscribers are closed.
     */
    public close(channelId: string): void {
        if (!this.settled.has(channelId)) {
            this.remember(channelId, { kind: 'closed' });
        }

        const handles = this.channels.get(channelId);
        this.channels.delete(channelId);
        for (const handle of handles ?? []) {
            handle.close();
        }
    }

    public subscriberCount(channelId: string): number {
        return this.channels.get(channelId)?.size ?? 0;
    }

    /** Channels with at least one live subscriber */
    public get openChannelCount(): number {
        return this.channels.size;
    }

    public isSettled(channelId: string): boolean {
        return this.settled.has(channelId);
    }

    private handlesFor(channelId: string): Set<SubscriberHandle> {
        let handles = this.channels.get(channelId);
        if (!handles) {
            handles = new Set();
            this.channels.set(channelId, handles);
        }
        return handles;
    }

    private remember(channelId: string, settlement: ChannelSettlement): void {
        if (!this.settled.has(channelId)) {
            this.settled.set(channelId, settlement);
        }
    }

    private replay(handle: SubscriberHandle, settlement: ChannelSettlement): void {
        if (settlement.kind === 'event') {
            handle.deliver(settlement.event);
        }
        handle.close();
    }

    private release(handle: SubscriberHandle): void {
        const handles = this.channels.get(handle.channelId);
        if (!handles) {
            return;
        }
        handles.delete(handle);
        if (handles.size === 0) {
            this.channels.delete(handle.channelId);
        }
    }
}
