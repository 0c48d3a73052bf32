/**
 * Background producer for one open transport.
 *
 * Polls the transport, feeds the synchronizer and pushes timestamped frames
 * into the history. The loop has no stop() of its own: it exits on the first
 * poll that finds the transport closed, or when a read fails.
 */

import { toTransportError } from "./errors.js";
import type { HistoryBuffer } from "./history-buffer.js";
import type { ByteTransport, FrameSynchronizer } from "./index.js";
import { silentLogger } from "./logger.js";
import type {
	AcquisitionOutcome,
	AcquisitionStats,
	Logger,
	RawFrame,
} from "./types.js";

/** Default delay between polls of the transport */
export const DEFAULT_POLL_INTERVAL_MS = 50;

export interface AcquisitionLoopOptions {
	pollIntervalMs?: number;
	logger?: Logger;
	/** Timestamp source for captured frames (ms since epoch) */
	clock?: () => number;
}

export class AcquisitionLoop {
	private readonly pollIntervalMs: number;
	private readonly logger: Logger;
	private readonly clock: () => number;
	private done: Promise<AcquisitionOutcome> | null = null;
	private active = false;

	private stats: AcquisitionStats = {
		bytesReceived: 0,
		bytesDiscarded: 0,
		framesCaptured: 0,
		framesEvicted: 0,
	};

	constructor(
		private readonly transport: ByteTransport,
		private readonly synchronizer: FrameSynchronizer,
		private readonly history: HistoryBuffer<RawFrame>,
		options: AcquisitionLoopOptions = {},
	) {
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.logger = options.logger ?? silentLogger;
		this.clock = options.clock ?? Date.now;
	}

	/** True between start() and the loop observing the end of the stream */
	get running(): boolean {
		return this.active;
	}

	/**
	 * Start polling. Calling start() again returns the same outcome promise
	 * rather than a second loop.
	 *
	 * @returns Settles once the loop has exited; never rejects
	 */
	start(): Promise<AcquisitionOutcome> {
		if (!this.done) {
			this.active = true;
			this.done = this.run().finally(() => {
				this.active = false;
			});
		}
		return this.done;
	}

	getStats(): AcquisitionStats {
		return {
			...this.stats,
			bytesDiscarded: this.synchronizer.discarded,
		};
	}

	private async run(): Promise<AcquisitionOutcome> {
		this.logger.info(`Acquisition started on ${this.transport.name}`);

		while (this.transport.isOpen()) {
			let chunk: Uint8Array;
			try {
				chunk = this.transport.readAvailable();
			} catch (error) {
				const failure = toTransportError(
					error,
					`Read from ${this.transport.name} failed`,
				);
				this.logger.error(failure.message);
				return { reason: "failed", error: failure };
			}

			if (chunk.length > 0) {
				this.capture(chunk);
			}

			await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
		}

		this.logger.info(`Acquisition stopped: ${this.transport.name} closed`);
		return { reason: "closed" };
	}

	private capture(chunk: Uint8Array): void {
		this.stats.bytesReceived += chunk.length;
		const discardedBefore = this.synchronizer.discarded;

		for (const bytes of this.synchronizer.feed(chunk)) {
			const evicted = this.history.push({ bytes, timestamp: this.clock() });
			this.stats.framesCaptured++;
			if (evicted) {
				this.stats.framesEvicted++;
			}
		}

		const dropped = this.synchronizer.discarded - discardedBefore;
		if (dropped > 0) {
			this.logger.debug(`Resync dropped ${dropped} byte(s)`);
		}
	}
}
