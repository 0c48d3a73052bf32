import {
	DeviceSession,
	type DeviceSessionOptions,
	type MeterProtocol,
} from "@dmm-link/device";
import { FRAME_LENGTH, METRIC_PREFIXES } from "./constants.js";
import { decodeFrame, type Tp8236Measurement } from "./frame-decoder.js";
import { Tp8236Synchronizer } from "./frame-synchronizer.js";

/** TP8236 handheld multimeter, 2400 baud LCD bitmap stream */
export const tp8236Protocol: MeterProtocol<Tp8236Measurement> = {
	name: "TP8236",
	frameLength: FRAME_LENGTH,
	createSynchronizer: () => new Tp8236Synchronizer(),
	decode: (frame, deviceName) =>
		decodeFrame(frame, { name: deviceName, scales: METRIC_PREFIXES }),
};

export type Tp8236Session = DeviceSession<Tp8236Measurement>;

/**
 * Create a session for a TP8236. Settings not passed here fall back to the
 * DMM_* environment variables, then to the defaults.
 *
 * @example
 * const session = createTp8236Session({ name: "Bench DMM" });
 * await session.open(await openSerialTransport({ path: "/dev/ttyUSB0" }));
 * const reading = session.read();
 */
export function createTp8236Session(
	options: DeviceSessionOptions = {},
): Tp8236Session {
	return new DeviceSession(tp8236Protocol, options);
}
