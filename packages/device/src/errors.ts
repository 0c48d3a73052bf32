/**
 * Errors raised by the device layer.
 *
 * The set is closed: a caller can switch on `kind` to tell a bad frame from a
 * failing link.
 */

export type DecodeFailure = "length" | "segment" | "residual";

export abstract class MeterError extends Error {
	abstract readonly kind: "decode" | "transport";
}

/**
 * A frame whose bytes could not be accounted for.
 *
 * - `segment`: `residualValue` is the digit byte (decimal point removed) that
 *   is not a known glyph
 * - `residual`: `residualValue` holds the bits at `byteIndex` that differ from
 *   the check mask once every known field has been cleared
 * - `length`: the frame was `byteIndex` bytes long
 */
export class DecodeError extends MeterError {
	readonly kind = "decode";

	constructor(
		readonly reason: DecodeFailure,
		readonly byteIndex: number,
		readonly residualValue: number,
	) {
		super(describeDecodeFailure(reason, byteIndex, residualValue));
		this.name = "DecodeError";
	}
}

/** Opening or reading the underlying byte stream failed */
export class TransportError extends MeterError {
	readonly kind = "transport";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "TransportError";
	}
}

/**
 * Wrap anything thrown by a transport so callers only ever see
 * TransportError.
 */
export function toTransportError(error: unknown, context: string): TransportError {
	if (error instanceof TransportError) {
		return error;
	}
	const detail = error instanceof Error ? error.message : String(error);
	return new TransportError(`${context}: ${detail}`, { cause: error });
}

function hex(value: number): string {
	return `0x${value.toString(16).toUpperCase().padStart(2, "0")}`;
}

function describeDecodeFailure(
	reason: DecodeFailure,
	byteIndex: number,
	residualValue: number,
): string {
	switch (reason) {
		case "length":
			return `Frame has ${byteIndex} bytes`;
		case "segment":
			return `Unknown segment pattern ${hex(residualValue)} at byte ${byteIndex}`;
		case "residual":
			return `Unrecognized bits ${hex(residualValue)} at byte ${byteIndex}`;
	}
}
