/**
 * Composition root for one meter: owns the transport, its acquisition loop and
 * the history buffer between open() and close().
 */

import { AcquisitionLoop } from "./acquisition-loop.js";
import { type SessionConfig, loadSessionConfig } from "./config.js";
import { DecodeError, TransportError } from "./errors.js";
import { HistoryBuffer } from "./history-buffer.js";
import type { ByteTransport, MeterProtocol } from "./index.js";
import { createLogger } from "./logger.js";
import type {
	AcquisitionOutcome,
	AcquisitionStats,
	Logger,
	RawFrame,
	SessionHealth,
} from "./types.js";

export interface DeviceSessionOptions extends Partial<SessionConfig> {
	/** Overrides the logger built from `logLevel` */
	logger?: Logger;
	/** Timestamp source for captured frames (ms since epoch) */
	clock?: () => number;
	/** Environment consulted for settings not given here (default: process.env) */
	env?: Record<string, string | undefined>;
}

const EMPTY_STATS: AcquisitionStats = {
	bytesReceived: 0,
	bytesDiscarded: 0,
	framesCaptured: 0,
	framesEvicted: 0,
};

export class DeviceSession<M> {
	readonly name: string;

	private readonly config: SessionConfig;
	private readonly logger: Logger;
	private readonly clock: (() => number) | undefined;
	private readonly history: HistoryBuffer<RawFrame>;
	private transport: ByteTransport | null = null;
	private loop: AcquisitionLoop | null = null;
	private outcome: Promise<AcquisitionOutcome> | null = null;
	/** Tail of the open()/close() queue */
	private pending: Promise<void> = Promise.resolve();
	private framesDecoded = 0;
	private decodeErrors = 0;
	private lastError: string | undefined;

	constructor(
		private readonly protocol: MeterProtocol<M>,
		options: DeviceSessionOptions = {},
	) {
		const { logger, clock, env, ...overrides } = options;
		this.config = loadSessionConfig(env, overrides);
		this.name = this.config.name;
		this.logger = logger ?? createLogger(this.config.logLevel);
		this.clock = clock;
		this.history = new HistoryBuffer<RawFrame>(this.config.historyDepth);
	}

	/** True while the current transport reports open */
	get isOpen(): boolean {
		return this.transport?.isOpen() ?? false;
	}

	/**
	 * Bind the session to an open transport and start acquiring.
	 *
	 * A previously opened transport is closed first, and this waits for its
	 * loop to exit so two loops never share the history. Overlapping calls run
	 * one after another; the last one wins.
	 *
	 * @throws TransportError if `transport` is not open
	 */
	open(transport: ByteTransport): Promise<void> {
		return this.enqueue(() => this.replaceTransport(transport));
	}

	/**
	 * Close the transport, including one whose loop already ended on a read
	 * failure. The loop notices on its next poll and exits on its own; use
	 * stopped() to wait for that.
	 */
	close(): Promise<void> {
		return this.enqueue(async () => {
			if (!this.transport) {
				return;
			}
			this.logger.info(`Closing ${this.transport.name}`);
			await this.transport.close();
		});
	}

	/**
	 * Run `task` after every open()/close() queued before it. The returned
	 * promise carries the task's own result; the queue itself only waits for
	 * it to settle.
	 */
	private enqueue(task: () => Promise<void>): Promise<void> {
		const run = this.pending.then(task);
		this.pending = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async replaceTransport(transport: ByteTransport): Promise<void> {
		if (this.transport) {
			await this.transport.close();
			await this.outcome;
		}

		if (!transport.isOpen()) {
			throw new TransportError(`Transport ${transport.name} is not open`);
		}

		this.history.clear();
		this.transport = transport;
		this.loop = new AcquisitionLoop(
			transport,
			this.protocol.createSynchronizer(),
			this.history,
			{
				pollIntervalMs: this.config.pollIntervalMs,
				logger: this.logger,
				clock: this.clock,
			},
		);
		this.outcome = this.loop.start().then((result) => {
			if (result.reason === "failed") {
				this.lastError = result.error.message;
			}
			return result;
		});
		this.logger.info(
			`Opened ${this.protocol.name} on ${transport.name} as ${this.name}`,
		);
	}

	/** Settles when the current loop has exited (immediately if none ran) */
	async stopped(): Promise<AcquisitionOutcome | undefined> {
		return this.outcome ?? undefined;
	}

	/** Decode the most recent buffered frame, discarding older ones */
	read(): M | undefined;
	/** Decode `frame` directly without touching the buffer */
	read(frame: RawFrame): M;
	read(frame?: RawFrame): M | undefined {
		const target = frame ?? this.history.takeLatest();
		if (!target) {
			return undefined;
		}

		try {
			if (target.bytes.length !== this.protocol.frameLength) {
				throw new DecodeError("length", target.bytes.length, 0);
			}
			const measurement = this.protocol.decode(target, this.name);
			this.framesDecoded++;
			return measurement;
		} catch (error) {
			if (error instanceof DecodeError) {
				this.decodeErrors++;
				this.lastError = error.message;
				this.logger.warn(`Discarded frame: ${error.message}`);
			}
			throw error;
		}
	}

	/** Snapshot of the session's counters */
	get health(): SessionHealth {
		const stats = this.loop?.getStats() ?? EMPTY_STATS;
		return {
			...stats,
			framesDecoded: this.framesDecoded,
			decodeErrors: this.decodeErrors,
			buffered: this.history.size,
			...(this.lastError !== undefined ? { lastError: this.lastError } : {}),
		};
	}
}
