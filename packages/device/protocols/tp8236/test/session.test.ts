import {
	DecodeError,
	type Logger,
	MemoryTransport,
	silentLogger,
	TransportError,
} from "@dmm-link/device";
import {
	openSerialTransport,
	type SerialTransport,
} from "@dmm-link/device-transport-serial";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTp8236Session, type Tp8236Session } from "../src/protocol.js";
import { FakeSerialPort } from "./fixtures/fake-serial-port.js";
import { DISPLAY_1_234, frame, frameBytes, SEG } from "./fixtures/frames.js";

const VOLTS = Array.from(frameBytes({ ...DISPLAY_1_234, 21: 0x08 }));
const AMPS = Array.from(frameBytes({ ...DISPLAY_1_234, 21: 0x04 }));
const STRAY_BIT = Array.from(frameBytes({ 19: 0x20 }));

describe("Tp8236 session", () => {
	let session: Tp8236Session;
	let transport: MemoryTransport;

	beforeEach(() => {
		vi.useFakeTimers();
		transport = new MemoryTransport("/dev/ttyTEST");
		session = createTp8236Session({
			name: "bench",
			env: {},
			logger: silentLogger,
			clock: () => 5_000,
		});
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("returns nothing before a frame arrives", async () => {
		await session.open(transport);

		expect(session.read()).toBeUndefined();
		expect(session.isOpen).toBe(true);
	});

	it("decodes the newest frame and drops the older ones", async () => {
		transport.inject([...AMPS, ...VOLTS]);
		await session.open(transport);

		const reading = session.read();

		expect(reading?.unit).toBe("V");
		expect(reading?.display).toBe("1.234");
		expect(reading?.value).toBe(1.234);
		expect(session.health.buffered).toBe(0);
		expect(session.read()).toBeUndefined();
	});

	it("stamps the session name and capture time", async () => {
		transport.inject(VOLTS);
		await session.open(transport);

		const reading = session.read();

		expect(reading?.name).toBe("bench");
		expect(reading?.timestamp).toBe(5_000);
	});

	it("picks up frames that arrive while polling", async () => {
		await session.open(transport);

		transport.inject(VOLTS.slice(0, 10));
		await vi.advanceTimersByTimeAsync(50);
		expect(session.read()).toBeUndefined();

		transport.inject(VOLTS.slice(10));
		await vi.advanceTimersByTimeAsync(50);
		expect(session.read()?.unit).toBe("V");
	});

	it("decodes an explicit frame without touching the buffer", async () => {
		transport.inject(VOLTS);
		await session.open(transport);

		const reading = session.read(frame({ 6: SEG["5"] }, 7));

		expect(reading.display).toBe("   5");
		expect(reading.value).toBe(5);
		expect(reading.timestamp).toBe(7);
		expect(session.health.buffered).toBe(1);
	});

	it("counts and rethrows a frame that fails to decode", async () => {
		transport.inject(STRAY_BIT);
		await session.open(transport);

		let thrown: unknown;
		try {
			session.read();
		} catch (error) {
			thrown = error;
		}

		expect(thrown).toBeInstanceOf(DecodeError);
		expect(thrown).toMatchObject({
			reason: "residual",
			byteIndex: 19,
			residualValue: 0x20,
		});
		expect(session.health.decodeErrors).toBe(1);
		expect(session.health.framesDecoded).toBe(0);
		expect(session.health.lastError).toBe("Unrecognized bits 0x20 at byte 19");
	});

	it("warns when a frame is discarded", async () => {
		const logger: Logger = {
			debug: vi.fn(),
			info: vi.fn(),
			warn: vi.fn(),
			error: vi.fn(),
		};
		const logged = createTp8236Session({ env: {}, logger });
		transport.inject(STRAY_BIT);
		await logged.open(transport);

		expect(() => logged.read()).toThrow(DecodeError);
		expect(logger.warn).toHaveBeenCalledWith(
			"Discarded frame: Unrecognized bits 0x20 at byte 19",
		);
	});

	it("refuses a transport that is already closed", async () => {
		await transport.close();

		await expect(session.open(transport)).rejects.toThrow(
			new TransportError("Transport /dev/ttyTEST is not open"),
		);
		expect(session.isOpen).toBe(false);
	});

	it("closes the previous transport when reopened", async () => {
		transport.inject(VOLTS);
		await session.open(transport);
		const next = new MemoryTransport("/dev/ttyNEXT");

		const reopened = session.open(next);
		await vi.advanceTimersByTimeAsync(50);
		await reopened;

		expect(transport.isOpen()).toBe(false);
		expect(session.isOpen).toBe(true);
		expect(session.read()).toBeUndefined();

		next.inject(AMPS);
		await vi.advanceTimersByTimeAsync(50);
		expect(session.read()?.unit).toBe("A");
	});

	it("stops acquiring once closed", async () => {
		await session.open(transport);
		await session.close();

		const stopped = session.stopped();
		await vi.advanceTimersByTimeAsync(50);

		expect(await stopped).toEqual({ reason: "closed" });
		expect(session.isOpen).toBe(false);
	});

	it("has no outcome before it is opened", async () => {
		expect(await session.stopped()).toBeUndefined();
	});

	it("records a transport failure", async () => {
		await session.open(transport);
		transport.fail("unplugged");
		await vi.advanceTimersByTimeAsync(50);

		const outcome = await session.stopped();

		expect(outcome?.reason).toBe("failed");
		expect(session.health.lastError).toBe("unplugged");
	});

	it("reports acquisition and decode counters", async () => {
		transport.inject([0x01, 0x02, 0x03, ...VOLTS, ...AMPS]);
		await session.open(transport);
		session.read();

		expect(session.health).toEqual({
			bytesReceived: 47,
			bytesDiscarded: 3,
			framesCaptured: 2,
			framesEvicted: 0,
			framesDecoded: 1,
			decodeErrors: 0,
			buffered: 0,
		});
	});

	it("evicts the oldest frames beyond the history depth", async () => {
		const shallow = createTp8236Session({
			env: {},
			logger: silentLogger,
			historyDepth: 2,
		});
		transport.inject([...VOLTS, ...AMPS, ...VOLTS]);
		await shallow.open(transport);

		expect(shallow.health.framesEvicted).toBe(1);
		expect(shallow.health.buffered).toBe(2);
	});

	it("takes settings from the environment", () => {
		const fromEnv = createTp8236Session({
			env: { DMM_DEVICE_NAME: "from-env" },
			logger: silentLogger,
		});

		expect(fromEnv.name).toBe("from-env");
		expect(session.name).toBe("bench");
	});

	it("runs overlapping opens one after another", async () => {
		const first = new MemoryTransport("/dev/ttyA");
		const second = new MemoryTransport("/dev/ttyB");
		const third = new MemoryTransport("/dev/ttyC");
		await session.open(first);

		const opening = Promise.all([session.open(second), session.open(third)]);
		await vi.advanceTimersByTimeAsync(200);
		await opening;

		expect(first.isOpen()).toBe(false);
		expect(second.isOpen()).toBe(false);
		expect(third.isOpen()).toBe(true);

		second.inject(AMPS);
		third.inject(VOLTS);
		await vi.advanceTimersByTimeAsync(50);
		expect(session.read()?.unit).toBe("V");
		expect(session.health.framesCaptured).toBe(1);
	});

	it("accepts a new transport after a rejected open", async () => {
		await transport.close();
		await expect(session.open(transport)).rejects.toThrow(TransportError);

		const next = new MemoryTransport("/dev/ttyNEXT");
		await session.open(next);

		expect(session.isOpen).toBe(true);
	});
});

describe("Tp8236 session over a serial port", () => {
	let session: Tp8236Session;
	let port: FakeSerialPort;
	let serial: SerialTransport;

	beforeEach(async () => {
		vi.useFakeTimers();
		session = createTp8236Session({ env: {}, logger: silentLogger });
		const ports: FakeSerialPort[] = [];
		serial = await openSerialTransport({ path: "/dev/ttyFAKE" }, (settings) => {
			const created = new FakeSerialPort(settings);
			ports.push(created);
			return created;
		});
		const [created] = ports;
		if (!created) {
			throw new Error("port factory was not called");
		}
		port = created;
		await session.open(serial);
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("decodes frames delivered by the port", async () => {
		port.receive(VOLTS);
		await vi.advanceTimersByTimeAsync(50);

		expect(session.read()?.unit).toBe("V");
	});

	it("ends the loop as failed on a port error", async () => {
		port.emit("error", new Error("unplugged"));
		await vi.advanceTimersByTimeAsync(50);

		const outcome = await session.stopped();

		expect(outcome?.reason).toBe("failed");
		expect(session.health.lastError).toBe(
			"Serial port /dev/ttyFAKE failed: unplugged",
		);
	});

	it("closes a failed port on close()", async () => {
		port.emit("error", new Error("unplugged"));
		await vi.advanceTimersByTimeAsync(50);

		await session.close();

		expect(port.isOpen).toBe(false);
		expect(port.closeCalls).toBe(1);
		expect(session.isOpen).toBe(false);
	});

	it("closes a failed port when another transport is opened", async () => {
		port.emit("error", new Error("unplugged"));
		await vi.advanceTimersByTimeAsync(50);

		await session.open(new MemoryTransport("/dev/ttyNEXT"));

		expect(port.isOpen).toBe(false);
		expect(port.closeCalls).toBe(1);
		expect(session.isOpen).toBe(true);
	});
});
