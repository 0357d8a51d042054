import { EventBuffer, type KeyValueStorage } from './buffer.js';
import type { AnalyticsConfig } from './config.js';
import { sanitizeEvent } from './tracker.js';
import type { AnalyticsEvent, EventProperties, Logger, Transport } from './types.js';
import { DEFAULT_BATCH_SIZE } from './utils.js';

export type BufferedTrackerOptions = {
  storage: KeyValueStorage;
  transport: Transport;
  batchSize?: number;
  sessionId?: string;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Posts a batch as a JSON array to the collector
 * @throws Error when the collector answers with a non-2xx status
 */
export const createFetchTransport = (endpoint: string, fetchImpl: typeof fetch = fetch): Transport => {
  return async (batch: AnalyticsEvent[]): Promise<void> => {
    const response = await fetchImpl(endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(batch),
    });
    if (!response.ok) {
      throw new Error(`Collector responded with ${response.status}`);
    }
  };
}

/**
 * BufferedTracker is the self-hosted option: events pile up in local storage and go out in batches.
 * A batch leaves storage only after the transport resolved.
 */
export class BufferedTracker {
  readonly sessionId: string;
  private readonly buffer: EventBuffer;
  private readonly transport: Transport;
  private readonly batchSize: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private inflight: Promise<void> | null = null;

  constructor(options: BufferedTrackerOptions) {
    if (options.batchSize !== undefined && (!Number.isInteger(options.batchSize) || options.batchSize <= 0)) {
      throw new Error(`Batch size must be a positive integer, got ${options.batchSize}`);
    }
    this.logger = options.logger ?? console;
    this.buffer = new EventBuffer(options.storage, this.logger);
    this.transport = options.transport;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.sessionId = options.sessionId ?? crypto.randomUUID();
    this.now = options.now ?? (() => new Date());
  }

  track = (name: string, properties: EventProperties = {}): void => {
    const sanitized = sanitizeEvent(name, properties, this.logger);
    if (!sanitized) return;

    const buffered = this.buffer.append({
      event_id: crypto.randomUUID(),
      session_id: this.sessionId,
      name: sanitized.name,
      properties: sanitized.properties,
      ts: this.now().toISOString(),
    });
    if (buffered === null) {
      this.logger.warn(`[analytics] dropped "${sanitized.name}": storage is unavailable`);
      return;
    }

    // a failed batch stays buffered and is retried at the next multiple of the batch size
    if (buffered % this.batchSize === 0) {
      this.flush().catch((error: unknown) => {
        this.logger.warn(`[analytics] flush failed: ${String(error)}`);
      });
    }
  }

  /**
   * Sends everything buffered as one batch. Joins a flush already in flight instead of starting another.
   * Never rejects: a failed send is logged and the events stay buffered.
   */
  flush = (): Promise<void> => {
    if (this.inflight) return this.inflight;

    const batch = this.buffer.read();
    if (!batch.length) return Promise.resolve();

    this.inflight = this.send(batch).finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  pending = (): number => this.buffer.read().length;

  private send = async (batch: AnalyticsEvent[]): Promise<void> => {
    try {
      await this.transport(batch);
    } catch (error) {
      this.logger.warn(`[analytics] could not send ${batch.length} events, keeping them buffered: ${(error as Error).message}`);
      return;
    }
    // events tracked while the batch was in flight sit behind it
    this.buffer.drop(batch.length);
  }
}

export const createBufferedTracker = (
  config: Pick<AnalyticsConfig, 'collectorEndpoint' | 'batchSize'>,
  options: Omit<BufferedTrackerOptions, 'transport' | 'batchSize'>,
): BufferedTracker => {
  return new BufferedTracker({
    ...options,
    transport: createFetchTransport(config.collectorEndpoint),
    batchSize: config.batchSize,
  });
}
