/**
 * ByteTransport over a `serialport` port.
 *
 * The port pushes `data` chunks as they arrive; the transport queues them and
 * hands everything queued back from readAvailable(), which gives the polling
 * loop a non-blocking "read all" over an event-driven stream.
 */

import type { EventEmitter } from "node:events";
import {
	type ByteTransport,
	TransportError,
	toTransportError,
} from "@dmm-link/device";
import { SerialPort } from "serialport";

/** The TP8236 talks at a fixed 2400 baud, 8N1 */
export const DEFAULT_BAUD_RATE = 2400;

export interface SerialTransportOptions {
	path: string;
	baudRate?: number;
}

/** Options handed to the port factory */
export interface SerialPortSettings {
	path: string;
	baudRate: number;
	dataBits: 8;
	parity: "none";
	stopBits: 1;
	autoOpen: false;
}

/** The part of a `serialport` port the transport relies on */
export interface SerialPortHandle extends EventEmitter {
	readonly isOpen: boolean;
	open(callback?: (error: Error | null) => void): void;
	close(callback?: (error: Error | null) => void): void;
}

export type SerialPortFactory = (settings: SerialPortSettings) => SerialPortHandle;

const createSerialPort: SerialPortFactory = (settings) => new SerialPort(settings);

export class SerialTransport implements ByteTransport {
	readonly name: string;

	private chunks: Uint8Array[] = [];
	private failure: TransportError | null = null;
	private closed = false;

	constructor(private readonly port: SerialPortHandle, path: string) {
		this.name = path;

		port.on("data", (chunk: Buffer) => {
			this.chunks.push(new Uint8Array(chunk));
		});
		port.on("error", (error: Error) => {
			this.failure = toTransportError(error, `Serial port ${path} failed`);
		});
	}

	/**
	 * A failed port stays "open" until close() so the polling loop makes one
	 * more read and receives the stored failure.
	 */
	isOpen(): boolean {
		return !this.closed && (this.port.isOpen || this.failure !== null);
	}

	readAvailable(): Uint8Array {
		if (this.failure) {
			throw this.failure;
		}
		if (this.chunks.length === 0) {
			return new Uint8Array(0);
		}

		const chunks = this.chunks;
		this.chunks = [];
		if (chunks.length === 1 && chunks[0]) {
			return chunks[0];
		}

		const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
		const merged = new Uint8Array(total);
		let offset = 0;
		for (const chunk of chunks) {
			merged.set(chunk, offset);
			offset += chunk.length;
		}
		return merged;
	}

	async close(): Promise<void> {
		this.closed = true;
		if (!this.port.isOpen) {
			return;
		}
		await new Promise<void>((resolve, reject) => {
			this.port.close((error) => {
				if (error) {
					reject(toTransportError(error, `Closing ${this.name} failed`));
				} else {
					resolve();
				}
			});
		});
	}
}

/**
 * Open a serial port and wrap it as a ByteTransport.
 *
 * @param options - Port path and optional baud rate (default 2400)
 * @param createPort - Port factory; swapped out in tests
 * @returns Transport whose port is already open
 * @throws TransportError if the port cannot be opened
 */
export async function openSerialTransport(
	options: SerialTransportOptions,
	createPort: SerialPortFactory = createSerialPort,
): Promise<SerialTransport> {
	const settings: SerialPortSettings = {
		path: options.path,
		baudRate: options.baudRate ?? DEFAULT_BAUD_RATE,
		dataBits: 8,
		parity: "none",
		stopBits: 1,
		autoOpen: false,
	};

	let port: SerialPortHandle;
	try {
		port = createPort(settings);
	} catch (error) {
		throw toTransportError(error, `Cannot create serial port ${options.path}`);
	}

	await new Promise<void>((resolve, reject) => {
		port.open((error) => {
			if (error) {
				reject(
					new TransportError(`Cannot open ${options.path}: ${error.message}`, {
						cause: error,
					}),
				);
			} else {
				resolve();
			}
		});
	});

	return new SerialTransport(port, options.path);
}
