import type { RawFrame } from "./types.js";

/**
 * An already-open, non-blocking byte stream from a meter.
 *
 * Implementations:
 * - SerialTransport: a `serialport` port (see @dmm-link/device-transport-serial)
 */
export interface ByteTransport {
	/** Human-readable identifier, e.g. "/dev/ttyUSB0" */
	readonly name: string;

	isOpen(): boolean;

	/**
	 * Return every byte received since the previous call without waiting.
	 * An empty array means nothing new has arrived.
	 *
	 * @throws TransportError if the underlying stream has failed
	 */
	readAvailable(): Uint8Array;

	/** Release the stream. Safe to call more than once. */
	close(): Promise<void>;
}

/**
 * Cuts candidate frames out of an unaligned byte stream.
 * Emitted frames start with the sync marker; nothing past it is checked.
 */
export interface FrameSynchronizer {
	/** Append bytes and return every complete frame now available, in order */
	feed(bytes: Uint8Array): Uint8Array[];

	/** Forget any partial frame and zero `discarded` */
	reset(): void;

	/** Bytes held while waiting for the rest of a frame */
	readonly pending: number;

	/** Bytes dropped while searching for the marker since creation or reset() */
	readonly discarded: number;
}

/**
 * Knows one meter's wire format.
 *
 * Implementations:
 * - tp8236Protocol: TP8236 22-byte LCD bitmap frames
 */
export interface MeterProtocol<M> {
	/** Human-readable name, e.g. "TP8236" */
	readonly name: string;

	readonly frameLength: number;

	createSynchronizer(): FrameSynchronizer;

	/**
	 * Decode one frame. Pure: the frame is not modified.
	 *
	 * @throws DecodeError when the frame's bits cannot all be accounted for
	 */
	decode(frame: RawFrame, deviceName: string): M;
}

export * from "./acquisition-loop.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./history-buffer.js";
export * from "./logger.js";
export * from "./memory-transport.js";
export * from "./session.js";
export * from "./types.js";
