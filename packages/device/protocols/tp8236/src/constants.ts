/**
 * TP8236 wire constants
 *
 * Frame layout (22 bytes, no length field, no checksum):
 *
 *   [0-1]   sync marker AA 55
 *   [2-5]   constant header 52 24 01 10
 *   [6-9]   7-segment digits, LSB..MSB (bit 7 of 6-8 = decimal point)
 *   [10]    sign, AC/DC, diode, beep, low battery
 *   [11-18] bar graph (60 segments), auto-range at byte 18 bit 5
 *   [19]    min/max, usb, %, hFE
 *   [20-21] unit and prefix icons
 */

export const FRAME_LENGTH = 22;

export const SYNC_MARKER = [0xaa, 0x55] as const;

/**
 * The frame as it must look once every decoded field has been cleared.
 * Matches a frame with nothing lit on the LCD.
 */
export const CHECK_MASK: readonly number[] = [
	0xaa, 0x55, 0x52, 0x24, 0x01, 0x10, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
	0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
];

/** Segment bits (xGFEDCBA) to glyph. 'L' only appears in the "O.L" overflow. */
export const SEGMENT_GLYPHS: ReadonlyMap<number, string> = new Map([
	[0x5f, "0"],
	[0x06, "1"],
	[0x6b, "2"],
	[0x2f, "3"],
	[0x36, "4"],
	[0x3d, "5"],
	[0x7d, "6"],
	[0x07, "7"],
	[0x7f, "8"],
	[0x3f, "9"],
	[0x00, " "],
	[0x58, "L"],
]);

export type MetricPrefix = "nano" | "micro" | "milli" | "kilo" | "mega";

export type PrefixScaleTable = Readonly<Record<MetricPrefix, number>>;

/** Factors applied to a reading when a prefix icon is lit */
export const METRIC_PREFIXES: PrefixScaleTable = {
	nano: 1e-9,
	micro: 1e-6,
	milli: 1e-3,
	kilo: 1e3,
	mega: 1e6,
};

// Byte indices
export const DIGIT_BYTES = [9, 8, 7, 6] as const;
export const STATUS_BYTE = 10;
export const BAR_FIRST_BYTE = 11;
export const BAR_LAST_BYTE = 18;
export const MODE_BYTE = 19;
export const PREFIX_UNIT_BYTE = 20;
export const UNIT_BYTE = 21;

export const DECIMAL_POINT = 0x80;
