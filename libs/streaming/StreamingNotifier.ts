import type { EventBroadcaster } from '../broadcast/EventBroadcaster.js';
import type { OutcomeEvent } from '../ledger/purchase.js';
import { getComponentLogger } from '../logging/logger.js';
import { STATUS_MESSAGES, STREAM_TIMEOUT_MESSAGE } from '../status/messages.js';

/**
 * Minimal writable side of a server-push connection.
 */
export interface StreamSink {
    write(chunk: string): void;
    end(): void;
}

export type StreamFrame =
    | OutcomeEvent
    | { readonly status: 'TIMEOUT'; readonly message: string }
    | { readonly status: 'CANCELLED'; readonly message: string };

export type SessionEnd = 'OUTCOME' | 'TIMEOUT' | 'CANCELLED' | 'DISCONNECTED';

export interface NotifierOptions {
    /** Bounded wait before the client is told TIMEOUT */
    readonly awaitTimeoutMs: number;
    readonly heartbeatMs: number;
    /** Client reconnect delay hint */
    readonly reconnectMs?: number;
}

const DEFAULT_RECONNECT_MS = 3000;

export function formatFrame(frame: StreamFrame): string {
    return `data: ${JSON.stringify(frame)}\n\n`;
}

/**
 * Streaming Notifier
 *
 * One session per connection: subscribe, wait for one outcome (or the wait bound,
 * or cancellation, or the client leaving), write it, end. Subscribing goes through
 * the broadcaster, which answers from the ledger when the channel already settled,
 * so an outcome reached before the connection opened is still delivered.
 * No ledger lock is held while waiting.
 */
export class StreamingNotifier {
    private readonly logger = getComponentLogger('StreamingNotifier');

    constructor(
        private readonly broadcaster: EventBroadcaster,
        private readonly options: NotifierOptions
    ) { }

    public async serve(channelId: string, sink: StreamSink, signal: AbortSignal): Promise<SessionEnd> {
        const handle = await this.broadcaster.subscribe(channelId);
        const heartbeat = setInterval(() => sink.write(': keep-alive\n\n'), this.options.heartbeatMs);
        heartbeat.unref();

        let end: SessionEnd = 'DISCONNECTED';
        try {
            sink.write(`retry: ${this.options.reconnectMs ?? DEFAULT_RECONNECT_MS}\n\n`);

            const result = await handle.next(this.options.awaitTimeoutMs, signal);
            switch (result.kind) {
                case 'event':
                    sink.write(formatFrame(result.event));
                    end = 'OUTCOME';
                    break;
                case 'timeout':
                    sink.write(formatFrame({ status: 'TIMEOUT', message: STREAM_TIMEOUT_MESSAGE }));
                    end = 'TIMEOUT';
                    break;
                case 'closed':
                    sink.write(formatFrame({ status: 'CANCELLED', message: STATUS_MESSAGES.CANCELLED }));
                    end = 'CANCELLED';
                    break;
                case 'aborted':
                    end = 'DISCONNECTED';
                    break;
            }
        } finally {
            clearInterval(heartbeat);
            handle.unsubscribe();
            if (end !== 'DISCONNECTED') {
                sink.end();
            }
        }

        this.logger.debug({ channelId, end }, 'Stream session ended');
        return end;
    }
}
