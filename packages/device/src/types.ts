import type { TransportError } from "./errors.js";

/**
 * One fixed-length frame cut from the byte stream.
 * Only the leading sync marker has been checked; the rest of the bytes are
 * validated when the frame is decoded.
 */
export interface RawFrame {
	readonly bytes: Uint8Array;
	/** ms since epoch, taken when the synchronizer emitted the frame */
	readonly timestamp: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Console-shaped sink used across the device packages */
export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

/** How an acquisition loop ended */
export type AcquisitionOutcome =
	| { reason: "closed" }
	| { reason: "failed"; error: TransportError };

/** Counters kept by the acquisition loop for the lifetime of one transport */
export interface AcquisitionStats {
	bytesReceived: number;
	/** Bytes dropped by the synchronizer while hunting for a sync marker */
	bytesDiscarded: number;
	framesCaptured: number;
	/** Frames pushed out of the history before anyone read them */
	framesEvicted: number;
}

export interface SessionHealth extends AcquisitionStats {
	framesDecoded: number;
	decodeErrors: number;
	/** Frames currently waiting in the history buffer */
	buffered: number;
	lastError?: string;
}
