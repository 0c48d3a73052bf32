import type { FrameSynchronizer } from "@dmm-link/device";
import { FRAME_LENGTH, SYNC_MARKER } from "./constants.js";

const [MARKER_HIGH, MARKER_LOW] = SYNC_MARKER;

/**
 * Aligns the TP8236 byte stream on the AA 55 marker and slices it into
 * 22-byte frames.
 *
 * Resync is a linear rescan: while the backlog does not start with the
 * marker, its first byte is dropped. Frames arrive a few times a second, so
 * the backlog never grows past a couple of frames.
 */
export class Tp8236Synchronizer implements FrameSynchronizer {
	private backlog = new Uint8Array(0);
	private dropped = 0;

	get pending(): number {
		return this.backlog.length;
	}

	get discarded(): number {
		return this.dropped;
	}

	feed(bytes: Uint8Array): Uint8Array[] {
		this.append(bytes);

		const frames: Uint8Array[] = [];
		let offset = 0;

		for (;;) {
			offset = this.align(offset);
			if (this.backlog.length - offset < FRAME_LENGTH) {
				break;
			}
			frames.push(this.backlog.slice(offset, offset + FRAME_LENGTH));
			offset += FRAME_LENGTH;
		}

		this.backlog = this.backlog.slice(offset);
		return frames;
	}

	reset(): void {
		this.backlog = new Uint8Array(0);
		this.dropped = 0;
	}

	private append(bytes: Uint8Array): void {
		if (bytes.length === 0) {
			return;
		}
		const grown = new Uint8Array(this.backlog.length + bytes.length);
		grown.set(this.backlog, 0);
		grown.set(bytes, this.backlog.length);
		this.backlog = grown;
	}

	/**
	 * Advance past bytes that cannot start a frame.
	 * A lone trailing AA is kept: its 55 may still be in flight.
	 *
	 * @returns Offset of the marker, or of the byte that may begin one
	 */
	private align(offset: number): number {
		let start = offset;
		while (start < this.backlog.length) {
			if (this.backlog[start] === MARKER_HIGH) {
				if (start + 1 === this.backlog.length) break;
				if (this.backlog[start + 1] === MARKER_LOW) break;
			}
			start++;
		}
		this.dropped += start - offset;
		return start;
	}
}
