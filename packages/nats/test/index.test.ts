import { connect, type NatsConnection } from "@nats-io/transport-node";
import {
	ConfigurationError,
	TransportEvents,
	UMessage,
	UnavailableError,
	UPayload,
	UUri,
} from "utransport";
import { beforeEach, describe, expect, test, vi } from "vitest";
import {
	defaultNatsId,
	defaultNatsUri,
	defaultSubjectPrefix,
	NatsTransport,
} from "../src/index.js";
import { FakeNatsBroker } from "./fake-nats.js";

vi.mock("@nats-io/transport-node", () => ({ connect: vi.fn() }));

const topic = UUri.parse("//veh/A34B/1/8001");
const subject = "up.veh.A34B.1.8001";

let broker: FakeNatsBroker;

function createTransport(): NatsTransport {
	const connection = broker.connect() as unknown as NatsConnection;
	const transport = new NatsTransport(connection, { authority: "veh" });
	transport.on(TransportEvents.error, () => {});
	return transport;
}

beforeEach(() => {
	broker = new FakeNatsBroker();
	vi.mocked(connect).mockReset();
	vi.mocked(connect).mockImplementation(
		async () => broker.connect() as unknown as NatsConnection,
	);
});

describe("NatsTransportBuilder", () => {
	test("should connect with the defaults", async () => {
		const transport = await NatsTransport.builder("veh").build();
		expect(connect).toHaveBeenCalledWith({
			servers: defaultNatsUri,
			name: "veh",
		});
		expect(transport.id).toBe(defaultNatsId);
		expect(transport.authority).toBe("veh");
		expect(transport.uri).toBe(defaultNatsUri);
		expect(transport.subjectPrefix).toBe(defaultSubjectPrefix);
		expect(transport.connection).toBe(broker.connections[0]);
	});

	test("should apply its settings", async () => {
		const transport = await NatsTransport.builder("veh")
			.withUri("nats.test:4222")
			.withId("nats-test")
			.withSubjectPrefix("fleet.up")
			.build();
		expect(connect).toHaveBeenCalledWith({
			servers: "nats.test:4222",
			name: "veh",
		});
		expect(transport.id).toBe("nats-test");
		expect(transport.uri).toBe("nats.test:4222");
		expect(transport.subject(topic)).toBe("fleet.up.veh.A34B.1.8001");
	});

	test("should reject an invalid authority", async () => {
		await expect(NatsTransport.builder("").build()).rejects.toThrow(
			ConfigurationError,
		);
		await expect(NatsTransport.builder("a..b").build()).rejects.toThrow(
			'"a..b" is not a valid authority',
		);
		expect(connect).not.toHaveBeenCalled();
	});

	test("should reject an invalid subject prefix", async () => {
		await expect(
			NatsTransport.builder("veh").withSubjectPrefix("up.*").build(),
		).rejects.toThrow('"up.*" is not a valid subject prefix');
		await expect(
			NatsTransport.builder("veh").withSubjectPrefix("").build(),
		).rejects.toThrow(ConfigurationError);
	});

	test("should wrap a connection failure", async () => {
		const failure = new Error("connection refused");
		vi.mocked(connect).mockRejectedValue(failure);
		const build = NatsTransport.builder("veh").withUri("nats.test:1").build();
		await expect(build).rejects.toThrow(
			"Cannot open a NATS connection to nats.test:1",
		);
		await expect(build).rejects.toMatchObject({ cause: failure });
	});
});

describe("NatsTransport", () => {
	test("should map topics to subjects", () => {
		const transport = createTransport();
		expect(transport.subject(topic)).toBe(subject);
		expect(transport.subject(UUri.parse("//veh.eu/FFFFFFFF/FF/0"))).toBe(
			"up.veh.eu.FFFFFFFF.FF.0",
		);
	});

	test("should deliver messages between transports", async () => {
		const sender = createTransport();
		const receiver = createTransport();
		const received: UMessage[] = [];
		await receiver.registerListener(topic, (message) => {
			received.push(message);
		});

		const message = UMessage.publish(topic, UPayload.fromBytes([0xff, 0x01]));
		await sender.send(message);

		await vi.waitFor(() => {
			expect(received).toHaveLength(1);
		});
		expect(received[0]?.id).toBe(message.id);
		expect(received[0]?.payload?.bytes).toEqual(new Uint8Array([0xff, 0x01]));
	});

	test("should publish on the subject of the source topic", async () => {
		const transport = createTransport();
		const destination = UUri.parse("//hub/1/1/0");
		await transport.send(UMessage.notification(topic, destination));

		const connection = broker.connections[0];
		expect(connection?.published).toHaveLength(1);
		expect(connection?.published[0]?.subject).toBe(subject);
	});

	test("should share one subscription per topic", async () => {
		const transport = createTransport();
		const first = vi.fn();
		const second = vi.fn();
		await transport.registerListener(topic, first);
		await transport.registerListener(topic, second);
		expect(broker.subscriptionCount(subject)).toBe(1);

		await transport.unregisterListener(topic, first);
		expect(broker.subscriptionCount(subject)).toBe(1);
		await transport.unregisterListener(topic, second);
		expect(broker.subscriptionCount(subject)).toBe(0);
	});

	test("should emit info when subscribing and unsubscribing", async () => {
		const transport = createTransport();
		const info = vi.fn();
		transport.on(TransportEvents.info, info);
		const listener = vi.fn();
		await transport.registerListener(topic, listener);
		await transport.unregisterListener(topic, listener);
		expect(info.mock.calls).toEqual([
			[`Subscribed to ${subject}`],
			[`Unsubscribed from ${subject}`],
		]);
	});

	test("should roll back a registration when the subscription fails", async () => {
		const transport = createTransport();
		broker.failFlush = true;
		await expect(transport.registerListener(topic, vi.fn())).rejects.toThrow(
			UnavailableError,
		);
		expect(transport.registry.listenerCount()).toBe(0);
		expect(broker.subscriptionCount()).toBe(0);

		broker.failFlush = false;
		await transport.registerListener(topic, vi.fn());
		expect(broker.subscriptionCount(subject)).toBe(1);
	});

	test("should drop undecodable frames with a warning", async () => {
		const transport = createTransport();
		const warn = vi.fn();
		transport.on(TransportEvents.warn, warn);
		const listener = vi.fn();
		await transport.registerListener(topic, listener);

		broker.route(subject, "not json");
		await vi.waitFor(() => {
			expect(warn).toHaveBeenCalledTimes(1);
		});
		expect(String(warn.mock.calls[0]?.[0])).toMatch(
			/^Dropped undecodable frame on up\.veh\.A34B\.1\.8001: /,
		);
		expect(listener).not.toHaveBeenCalled();
	});

	test("should drop frames whose source is another topic", async () => {
		const transport = createTransport();
		const warn = vi.fn();
		transport.on(TransportEvents.warn, warn);
		const listener = vi.fn();
		await transport.registerListener(topic, listener);

		const stray = UMessage.publish(UUri.parse("//veh/A34B/1/8002"));
		broker.route(subject, JSON.stringify({
			id: stray.id,
			type: "publish",
			source: "//veh/A34B/1/8002",
			timestamp: stray.timestamp,
		}));
		await vi.waitFor(() => {
			expect(warn).toHaveBeenCalledWith(
				`Dropped frame from //veh/A34B/1/8002 received on ${subject}`,
			);
		});
		expect(listener).not.toHaveBeenCalled();
	});

	test("should reject sending on a closed connection", async () => {
		const transport = createTransport();
		await broker.connections[0]?.close();
		await expect(transport.send(UMessage.publish(topic))).rejects.toThrow(
			`NATS connection to ${defaultNatsUri} is closed`,
		);
	});

	test("should close subscriptions and the connection on disconnect", async () => {
		const transport = createTransport();
		await transport.registerListener(topic, vi.fn());
		await transport.registerListener(UUri.parse("//veh/A34B/1/8002"), vi.fn());
		expect(broker.subscriptionCount()).toBe(2);

		await transport.disconnect();
		expect(broker.subscriptionCount()).toBe(0);
		expect(broker.connections[0]?.isClosed()).toBe(true);
		await expect(transport.send(UMessage.publish(topic))).rejects.toThrow(
			UnavailableError,
		);
	});
});
