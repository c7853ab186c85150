import { Hookified, type HookifiedOptions } from "hookified";
import { UnavailableError } from "./errors.js";
import type { UMessage } from "./message.js";
import { ListenerRegistry } from "./registry.js";
import type { Listener, ListenerHandle, Transport } from "./types.js";
import type { UUri } from "./uri.js";

/**
 * Standard events emitted by transports.
 */
export enum TransportEvents {
	error = "error",
	info = "info",
	warn = "warn",
	send = "send",
	receive = "receive",
	register = "register",
	unregister = "unregister",
	disconnect = "disconnect",
}

/**
 * Hook event names for before/after lifecycle hooks.
 * Before hooks receive a mutable context object that can be modified.
 * After hooks receive the final context after the operation completes.
 */
export enum TransportHooks {
	beforeSend = "before:send",
	afterSend = "after:send",
	beforeRegister = "before:register",
	afterRegister = "after:register",
	beforeUnregister = "before:unregister",
	afterUnregister = "after:unregister",
	beforeDisconnect = "before:disconnect",
	afterDisconnect = "after:disconnect",
}

/**
 * Passed on to Hookified. With `throwOnEmitError` set, a listener failure
 * makes `send` reject once every listener has run.
 */
export type BaseTransportOptions = {
	/**
	 * The unique identifier for this transport instance.
	 */
	id?: string;
} & HookifiedOptions;

/**
 * A backend subscription that feeds one topic into the transport.
 */
export type TopicSubscription = {
	close(): Promise<void>;
};

const localSubscription: TopicSubscription = {
	async close() {},
};

/**
 * Shared implementation of the {@link Transport} contract. It validates
 * topics, owns the listener registry and runs the lifecycle hooks; backends
 * supply {@link BaseTransport.transmit} and, when they receive from a broker,
 * {@link BaseTransport.openTopic} and {@link BaseTransport.close}.
 */
export abstract class BaseTransport extends Hookified implements Transport {
	private readonly _registry: ListenerRegistry;
	private readonly _subscriptions = new Map<string, Promise<TopicSubscription>>();
	private _id: string;
	private _connected = true;

	/**
	 * @param defaultId - The id used when the options do not set one.
	 * @param options - Optional configuration, passed on to Hookified.
	 */
	constructor(defaultId: string, options?: BaseTransportOptions) {
		super(options);
		this._id = options?.id ?? defaultId;
		this._registry = new ListenerRegistry({
			onError: (error, handle, message) => {
				this.emit(TransportEvents.error, error, { handle, message });
			},
		});
	}

	public get id(): string {
		return this._id;
	}

	public set id(id: string) {
		this._id = id;
	}

	/**
	 * Whether the transport accepts calls. False once disconnected.
	 */
	public get connected(): boolean {
		return this._connected;
	}

	/**
	 * The listeners registered on this transport.
	 */
	public get registry(): ListenerRegistry {
		return this._registry;
	}

	/**
	 * Sends a message to its source topic.
	 * @param message - The message to send.
	 */
	public async send(message: UMessage): Promise<void> {
		try {
			this.assertConnected();

			// Before hook - context can be mutated by hook handlers
			const context = { message };
			await this.hook(TransportHooks.beforeSend, context);

			context.message.source.validate();
			context.message.destination?.validate();
			await this.transmit(context.message);

			await this.hook(TransportHooks.afterSend, { message: context.message });
			this.emit(TransportEvents.send, { message: context.message });
		} catch (error) {
			this.emit(TransportEvents.error, error);
			throw error;
		}
	}

	/**
	 * Registers a listener on a topic. The first listener on a topic opens the
	 * backend subscription for it.
	 * @param topic - The topic to listen on.
	 * @param listener - The callback.
	 * @returns The handle of the registration.
	 */
	public async registerListener(
		topic: UUri,
		listener: Listener,
	): Promise<ListenerHandle> {
		try {
			this.assertConnected();

			const context = { topic, listener };
			await this.hook(TransportHooks.beforeRegister, context);

			const handle = this._registry.register(context.topic, context.listener);
			try {
				await this.subscribeTopic(context.topic);
			} catch (error) {
				if (this._registry.has(context.topic, handle)) {
					this._registry.unregister(context.topic, handle);
				}

				throw error;
			}

			await this.hook(TransportHooks.afterRegister, { handle });
			this.emit(TransportEvents.register, { handle });
			return handle;
		} catch (error) {
			this.emit(TransportEvents.error, error);
			throw error;
		}
	}

	/**
	 * Removes a registration. The last listener leaving a topic closes the
	 * backend subscription for it.
	 * @param topic - The topic the listener was registered on.
	 * @param listener - The listener, or the handle returned at registration.
	 */
	public async unregisterListener(
		topic: UUri,
		listener: Listener | ListenerHandle,
	): Promise<void> {
		try {
			this.assertConnected();

			const context = { topic, listener };
			await this.hook(TransportHooks.beforeUnregister, context);

			const handle = this._registry.unregister(context.topic, context.listener);
			if (this._registry.listenerCount(context.topic) === 0) {
				await this.unsubscribeTopic(context.topic);
			}

			await this.hook(TransportHooks.afterUnregister, { handle });
			this.emit(TransportEvents.unregister, { handle });
		} catch (error) {
			this.emit(TransportEvents.error, error);
			throw error;
		}
	}

	/**
	 * Drops all registrations, closes the backend subscriptions and session.
	 * A failing subscription does not keep the session open; the failures are
	 * rejected once every step ran. Calling it again is a no-op.
	 */
	public async disconnect(): Promise<void> {
		if (!this._connected) {
			return;
		}

		try {
			const context = { topicCount: this._registry.topics().length };
			await this.hook(TransportHooks.beforeDisconnect, context);

			this._connected = false;
			const pending = [...this._subscriptions.values()];
			this._subscriptions.clear();
			this._registry.clear();

			// Every step runs even when an earlier one fails.
			const closing = await Promise.allSettled(
				pending.map(async (subscription) =>
					(await this.settle(subscription))?.close(),
				),
			);
			const failures: unknown[] = [];
			for (const result of closing) {
				if (result.status === "rejected") {
					failures.push(result.reason);
				}
			}

			try {
				await this.close();
			} catch (error) {
				failures.push(error);
			}

			if (failures.length === 1) {
				throw failures[0];
			}

			if (failures.length > 1) {
				throw new AggregateError(
					failures,
					`${failures.length} steps of disconnecting ${this._id} failed`,
				);
			}

			await this.hook(TransportHooks.afterDisconnect, {
				topicCount: context.topicCount,
			});
			this.emit(TransportEvents.disconnect);
		} catch (error) {
			this.emit(TransportEvents.error, error);
			throw error;
		}
	}

	/**
	 * Hands a message to the listeners registered on its source topic.
	 * Listener failures are emitted as `error` events, with the failing
	 * `{handle, message}` as second argument, and do not reject.
	 * @param message - The message to deliver.
	 * @returns The number of listeners invoked.
	 */
	protected async deliver(message: UMessage): Promise<number> {
		const count = await this._registry.dispatch(message.source, message);
		this.emit(TransportEvents.receive, { message, listeners: count });
		return count;
	}

	protected assertConnected(): void {
		if (!this._connected) {
			throw new UnavailableError(`Transport ${this._id} is disconnected`);
		}
	}

	/**
	 * Puts a validated message on the backend.
	 */
	protected abstract transmit(message: UMessage): Promise<void>;

	/**
	 * Starts receiving a topic from the backend. Local delivery needs nothing.
	 */
	protected async openTopic(_topic: UUri): Promise<TopicSubscription> {
		return localSubscription;
	}

	/**
	 * Releases the backend session.
	 */
	protected async close(): Promise<void> {}

	private async subscribeTopic(topic: UUri): Promise<void> {
		let pending = this._subscriptions.get(topic.key);
		if (!pending) {
			pending = this.openTopic(topic);
			this._subscriptions.set(topic.key, pending);
		}

		try {
			await pending;
		} catch (error) {
			if (this._subscriptions.get(topic.key) === pending) {
				this._subscriptions.delete(topic.key);
			}

			throw error;
		}
	}

	private async unsubscribeTopic(topic: UUri): Promise<void> {
		const pending = this._subscriptions.get(topic.key);
		if (!pending) {
			return;
		}

		this._subscriptions.delete(topic.key);
		await (await this.settle(pending))?.close();
	}

	private async settle(
		pending: Promise<TopicSubscription>,
	): Promise<TopicSubscription | undefined> {
		try {
			return await pending;
		} catch {
			// The registration that opened it was rejected with this failure.
			return undefined;
		}
	}
}
