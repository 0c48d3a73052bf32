/**
 * Serial transport for handheld meters
 * Wraps a `serialport` port as a polled, non-blocking ByteTransport
 */

export {
	DEFAULT_BAUD_RATE,
	openSerialTransport,
	type SerialPortFactory,
	type SerialPortHandle,
	type SerialPortSettings,
	SerialTransport,
	type SerialTransportOptions,
} from "./serial-transport.js";
