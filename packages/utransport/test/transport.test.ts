import { describe, expect, test, vi } from "vitest";
import type { UMessage } from "../src/message.js";
import {
	BaseTransport,
	type TopicSubscription,
	TransportEvents,
} from "../src/transport.js";
import { UUri } from "../src/uri.js";

const topic = UUri.parse("//veh/A34B/1/8001");
const otherTopic = UUri.parse("//veh/A34B/1/8002");

class StubTransport extends BaseTransport {
	public readonly closeSubscription = vi.fn(async () => {});
	public readonly closeSession = vi.fn(async () => {});

	constructor() {
		super("stub");
		this.on(TransportEvents.error, () => {});
	}

	protected async transmit(_message: UMessage): Promise<void> {}

	protected async openTopic(_topic: UUri): Promise<TopicSubscription> {
		return { close: this.closeSubscription };
	}

	protected async close(): Promise<void> {
		await this.closeSession();
	}
}

describe("BaseTransport disconnect", () => {
	test("should close every subscription and the session", async () => {
		const transport = new StubTransport();
		await transport.registerListener(topic, vi.fn());
		await transport.registerListener(otherTopic, vi.fn());

		await transport.disconnect();
		expect(transport.closeSubscription).toHaveBeenCalledTimes(2);
		expect(transport.closeSession).toHaveBeenCalledTimes(1);
	});

	test("should close the session when a subscription fails to close", async () => {
		const transport = new StubTransport();
		const failure = new Error("socket dropped");
		transport.closeSubscription.mockRejectedValueOnce(failure);
		await transport.registerListener(topic, vi.fn());
		await transport.registerListener(otherTopic, vi.fn());

		await expect(transport.disconnect()).rejects.toBe(failure);
		expect(transport.closeSubscription).toHaveBeenCalledTimes(2);
		expect(transport.closeSession).toHaveBeenCalledTimes(1);
		expect(transport.connected).toBe(false);
		expect(transport.registry.listenerCount()).toBe(0);
	});

	test("should reject with every teardown failure", async () => {
		const transport = new StubTransport();
		const subscriptionFailure = new Error("unsubscribe failed");
		const sessionFailure = new Error("close failed");
		transport.closeSubscription.mockRejectedValueOnce(subscriptionFailure);
		transport.closeSession.mockRejectedValueOnce(sessionFailure);
		await transport.registerListener(topic, vi.fn());

		const disconnect = transport.disconnect();
		await expect(disconnect).rejects.toThrow(
			"2 steps of disconnecting stub failed",
		);
		await expect(disconnect).rejects.toMatchObject({
			errors: [subscriptionFailure, sessionFailure],
		});
	});

	test("should not run the teardown twice after a failure", async () => {
		const transport = new StubTransport();
		transport.closeSession.mockRejectedValueOnce(new Error("close failed"));

		await expect(transport.disconnect()).rejects.toThrow("close failed");
		await transport.disconnect();
		expect(transport.closeSession).toHaveBeenCalledTimes(1);
	});
});
