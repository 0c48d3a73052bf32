/**
 * TP8236 multimeter protocol
 * Frame synchronization, LCD bitmap decoding and session wiring
 */

export {
	CHECK_MASK,
	FRAME_LENGTH,
	METRIC_PREFIXES,
	type MetricPrefix,
	type PrefixScaleTable,
	SEGMENT_GLYPHS,
	SYNC_MARKER,
} from "./constants.js";
export {
	type DecodeOptions,
	decodeFrame,
	type MeterFlags,
	NO_FLAGS,
	parseDisplay,
	type Tp8236Measurement,
} from "./frame-decoder.js";
export { Tp8236Synchronizer } from "./frame-synchronizer.js";
export {
	createTp8236Session,
	type Tp8236Session,
	tp8236Protocol,
} from "./protocol.js";
