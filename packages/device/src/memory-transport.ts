import { TransportError } from "./errors.js";
import type { ByteTransport } from "./index.js";

/**
 * In-process ByteTransport fed by the caller.
 * Used to replay captured streams and to drive sessions in tests.
 */
export class MemoryTransport implements ByteTransport {
	private queued: number[] = [];
	private open = true;
	private failure: TransportError | null = null;

	constructor(readonly name = "memory") {}

	/** Queue bytes for the next readAvailable() */
	inject(bytes: Iterable<number>): void {
		this.queued.push(...bytes);
	}

	/** Make the next readAvailable() throw */
	fail(message: string): void {
		this.failure = new TransportError(message);
	}

	isOpen(): boolean {
		return this.open;
	}

	readAvailable(): Uint8Array {
		if (this.failure) {
			throw this.failure;
		}
		const bytes = Uint8Array.from(this.queued);
		this.queued = [];
		return bytes;
	}

	async close(): Promise<void> {
		this.open = false;
	}
}
