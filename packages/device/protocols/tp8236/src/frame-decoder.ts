/**
 * TP8236 frame decoder
 *
 * The meter sends its LCD as a bitmap: every lit segment or icon is one bit.
 * Decoding walks the known fields on a scratch copy of the frame and clears
 * each bit it interprets. Whatever is left must equal CHECK_MASK; any other
 * bit is either line noise or an icon this decoder does not know, and the
 * frame is rejected. There is no checksum, so this is the only integrity
 * check the protocol has.
 */

import { DecodeError, type RawFrame } from "@dmm-link/device";
import {
	BAR_FIRST_BYTE,
	BAR_LAST_BYTE,
	CHECK_MASK,
	DECIMAL_POINT,
	DIGIT_BYTES,
	FRAME_LENGTH,
	METRIC_PREFIXES,
	MODE_BYTE,
	type MetricPrefix,
	PREFIX_UNIT_BYTE,
	type PrefixScaleTable,
	SEGMENT_GLYPHS,
	STATUS_BYTE,
	UNIT_BYTE,
} from "./constants.js";

export interface MeterFlags {
	diode: boolean;
	/** Continuity beeper; both bits of byte 10 mask 0x60 lit together */
	beep: boolean;
	/** Byte 10 bit 0x20 lit on its own. Meaning not confirmed. */
	unidentifiedIndicator: boolean;
	min: boolean;
	max: boolean;
	minMax: boolean;
	autoRange: boolean;
	/** Data-logging/USB icon */
	usb: boolean;
	lowBattery: boolean;
	/** Bar graph fill, 0-60 */
	bar: number;
}

export interface Tp8236Measurement {
	name: string;
	timestamp: number;
	raw: Uint8Array;
	/** Sign, four glyphs and any decimal point, e.g. "-1.234" or " O.L" */
	display: string;
	/** Scaled reading; undefined when the display is not a number */
	value: number | undefined;
	unit: string;
	prefix: MetricPrefix | undefined;
	multiplier: number;
	flags: MeterFlags;
}

export interface DecodeOptions {
	/** Device name stamped on the measurement */
	name?: string;
	/** Prefix factors; defaults to METRIC_PREFIXES */
	scales?: PrefixScaleTable;
}

export const NO_FLAGS: Readonly<MeterFlags> = {
	diode: false,
	beep: false,
	unidentifiedIndicator: false,
	min: false,
	max: false,
	minMax: false,
	autoRange: false,
	usb: false,
	lowBattery: false,
	bar: 0,
};

/** Optional sign, blanked leading digits, then a plain decimal number */
const NUMERIC_DISPLAY = /^(-?) *(\d+(?:\.\d*)?|\.\d+)$/;

/** Icons in the order they are scanned; a later prefix wins over an earlier one */
const UNIT_ICONS: ReadonlyArray<{
	byte: number;
	mask: number;
	prefix?: MetricPrefix;
	unit?: string;
}> = [
	{ byte: PREFIX_UNIT_BYTE, mask: 0x01, unit: "°C" },
	{ byte: PREFIX_UNIT_BYTE, mask: 0x02, unit: "°F" },
	{ byte: PREFIX_UNIT_BYTE, mask: 0x10, prefix: "milli" },
	{ byte: PREFIX_UNIT_BYTE, mask: 0x20, prefix: "micro" },
	{ byte: PREFIX_UNIT_BYTE, mask: 0x40, prefix: "nano" },
	{ byte: PREFIX_UNIT_BYTE, mask: 0x80, unit: "F" },
	{ byte: UNIT_BYTE, mask: 0x01, prefix: "micro" },
	{ byte: UNIT_BYTE, mask: 0x02, prefix: "milli" },
	{ byte: UNIT_BYTE, mask: 0x04, unit: "A" },
	{ byte: UNIT_BYTE, mask: 0x08, unit: "V" },
	{ byte: UNIT_BYTE, mask: 0x10, prefix: "mega" },
	{ byte: UNIT_BYTE, mask: 0x20, prefix: "kilo" },
	{ byte: UNIT_BYTE, mask: 0x40, unit: "Ω" },
	{ byte: UNIT_BYTE, mask: 0x80, unit: "Hz" },
	{ byte: STATUS_BYTE, mask: 0x02, unit: "AC" },
	{ byte: STATUS_BYTE, mask: 0x04, unit: "DC" },
];

/** Mode icons that replace whatever unit was built from the icons above */
const MODE_UNITS: ReadonlyArray<{ mask: number; unit: string }> = [
	{ mask: 0x40, unit: "%" },
	{ mask: 0x80, unit: "hFE" },
];

/**
 * Scratch copy of a frame. take() reports whether every bit of a mask is lit
 * and clears those bits when it is.
 */
class FrameBits {
	private readonly bytes: Uint8Array;

	constructor(source: Uint8Array) {
		this.bytes = Uint8Array.from(source);
	}

	at(index: number): number {
		return this.bytes[index] ?? 0;
	}

	take(index: number, mask: number): boolean {
		const value = this.at(index);
		if ((value & mask) !== mask) {
			return false;
		}
		this.bytes[index] = value & ~mask;
		return true;
	}

	/** Throws on the first byte that does not match the check mask */
	assertEmpty(): void {
		for (let i = 0; i < FRAME_LENGTH; i++) {
			const residual = this.at(i) ^ (CHECK_MASK[i] ?? 0);
			if (residual !== 0) {
				throw new DecodeError("residual", i, residual);
			}
		}
	}
}

function readDigit(bits: FrameBits, index: number): string {
	const pattern = bits.at(index);
	const glyph = SEGMENT_GLYPHS.get(pattern);
	if (glyph === undefined) {
		throw new DecodeError("segment", index, pattern);
	}
	bits.take(index, pattern);
	return glyph;
}

function readDisplay(bits: FrameBits): string {
	let display = bits.take(STATUS_BYTE, 0x08) ? "-" : "";

	for (const index of DIGIT_BYTES) {
		// The most significant digit has no decimal point of its own
		if (index !== DIGIT_BYTES[0] && bits.take(index, DECIMAL_POINT)) {
			display += ".";
		}
		display += readDigit(bits, index);
	}
	return display;
}

/**
 * Parse the display as a number. Blank or overflow displays ("    ", " O.L")
 * have no value.
 */
export function parseDisplay(display: string): number | undefined {
	const match = NUMERIC_DISPLAY.exec(display.trim());
	if (!match) {
		return undefined;
	}
	return Number(`${match[1] ?? ""}${match[2] ?? ""}`);
}

function readFlags(bits: FrameBits): MeterFlags {
	const diode = bits.take(STATUS_BYTE, 0x01);

	const beep = bits.take(STATUS_BYTE, 0x60);
	const unidentifiedIndicator = !beep && bits.take(STATUS_BYTE, 0x20);

	const minMax = bits.take(MODE_BYTE, 0x0e);
	const min = !minMax && bits.take(MODE_BYTE, 0x02);
	const max = !minMax && !min && bits.take(MODE_BYTE, 0x08);

	const usb = bits.take(MODE_BYTE, 0x01);
	const autoRange = bits.take(BAR_LAST_BYTE, 0x20);
	const lowBattery = bits.take(STATUS_BYTE, 0x80);

	return {
		diode,
		beep,
		unidentifiedIndicator,
		min,
		max,
		minMax,
		autoRange,
		usb,
		lowBattery,
		bar: readBar(bits),
	};
}

/** Bytes 11-17 carry 8 segments each, byte 18 the last 4 */
function readBar(bits: FrameBits): number {
	let bar = 0;
	for (let index = BAR_FIRST_BYTE; index <= BAR_LAST_BYTE; index++) {
		const width = index === BAR_LAST_BYTE ? 4 : 8;
		for (let bit = 0; bit < width; bit++) {
			if (bits.take(index, 1 << bit)) {
				bar++;
			}
		}
	}
	return bar;
}

/**
 * Decode one 22-byte TP8236 frame.
 *
 * @throws DecodeError for a frame of the wrong length, a digit byte that is
 * not a known glyph, or any bit left over once all fields are read
 *
 * @example
 * const m = decodeFrame({ bytes, timestamp: Date.now() });
 * // bytes with "1.234" lit and the m + V icons:
 * // m.display === "1.234", m.unit === "V", m.multiplier === 1e-3
 */
export function decodeFrame(
	frame: RawFrame,
	options: DecodeOptions = {},
): Tp8236Measurement {
	if (frame.bytes.length !== FRAME_LENGTH) {
		throw new DecodeError("length", frame.bytes.length, 0);
	}

	const bits = new FrameBits(frame.bytes);
	const scales = options.scales ?? METRIC_PREFIXES;

	const display = readDisplay(bits);
	const reading = parseDisplay(display);

	let unit = "";
	let prefix: MetricPrefix | undefined;
	for (const icon of UNIT_ICONS) {
		if (!bits.take(icon.byte, icon.mask)) continue;
		if (icon.prefix) prefix = icon.prefix;
		if (icon.unit) unit += icon.unit;
	}
	for (const mode of MODE_UNITS) {
		if (bits.take(MODE_BYTE, mode.mask)) {
			unit = mode.unit;
		}
	}

	const flags = readFlags(bits);

	bits.assertEmpty();

	const multiplier = prefix ? scales[prefix] : 1;

	return {
		name: options.name ?? "",
		timestamp: frame.timestamp,
		raw: Uint8Array.from(frame.bytes),
		display,
		value: reading === undefined ? undefined : reading * multiplier,
		unit,
		prefix,
		multiplier,
		flags,
	};
}
