import { describe, expect, it } from "vitest";
import {
	DecodeError,
	MeterError,
	TransportError,
	toTransportError,
} from "../src/errors.js";

describe("DecodeError", () => {
	it("describes an unknown segment pattern", () => {
		const error = new DecodeError("segment", 7, 0x01);
		expect(error.message).toBe("Unknown segment pattern 0x01 at byte 7");
		expect(error.kind).toBe("decode");
		expect(error).toBeInstanceOf(MeterError);
	});

	it("describes residual bits", () => {
		const error = new DecodeError("residual", 20, 0x0c);
		expect(error.message).toBe("Unrecognized bits 0x0C at byte 20");
		expect(error.byteIndex).toBe(20);
		expect(error.residualValue).toBe(0x0c);
	});

	it("describes a short frame", () => {
		expect(new DecodeError("length", 21, 0).message).toBe("Frame has 21 bytes");
	});
});

describe("toTransportError()", () => {
	it("passes a TransportError through unchanged", () => {
		const original = new TransportError("gone");
		expect(toTransportError(original, "ignored")).toBe(original);
	});

	it("wraps other errors and keeps the cause", () => {
		const cause = new Error("EIO");
		const wrapped = toTransportError(cause, "Read from /dev/ttyUSB0 failed");

		expect(wrapped).toBeInstanceOf(TransportError);
		expect(wrapped.kind).toBe("transport");
		expect(wrapped.message).toBe("Read from /dev/ttyUSB0 failed: EIO");
		expect(wrapped.cause).toBe(cause);
	});

	it("wraps non-Error values", () => {
		expect(toTransportError("busy", "Open failed").message).toBe(
			"Open failed: busy",
		);
	});
});
