import { randomUUID } from "node:crypto";
import { ListenerNotFoundError } from "./errors.js";
import type { UMessage } from "./message.js";
import type { Listener, ListenerHandle } from "./types.js";
import type { UUri } from "./uri.js";

/**
 * Receives the failure of a listener during dispatch.
 */
export type ListenerErrorHandler = (
	error: unknown,
	handle: ListenerHandle,
	message: UMessage,
) => void;

export type ListenerRegistryOptions = {
	/**
	 * Called for each listener that throws or rejects during dispatch.
	 * Without it, or when it throws itself, dispatch rejects with an
	 * AggregateError once every listener ran.
	 */
	onError?: ListenerErrorHandler;
};

type TopicEntry = {
	topic: UUri;
	listeners: Map<Listener, ListenerHandle>;
};

function isHandle(target: Listener | ListenerHandle): target is ListenerHandle {
	return typeof target !== "function";
}

/**
 * Topic to listener-set index shared by the operations of one transport.
 * A listener is held at most once per topic. Dispatch works on a snapshot of
 * the topic's listeners, so registrations made by a listener while a message
 * is being delivered only apply to the next dispatch.
 */
export class ListenerRegistry {
	private readonly _topics = new Map<string, TopicEntry>();
	private _onError: ListenerErrorHandler | undefined;

	constructor(options?: ListenerRegistryOptions) {
		this._onError = options?.onError;
	}

	public get onError(): ListenerErrorHandler | undefined {
		return this._onError;
	}

	public set onError(handler: ListenerErrorHandler | undefined) {
		this._onError = handler;
	}

	/**
	 * Adds a listener to a topic.
	 * @param topic - The topic to register on. Must pass {@link UUri.validate}.
	 * @param listener - The callback.
	 * @returns The new handle, or the existing one if the listener is already registered on the topic.
	 */
	public register(topic: UUri, listener: Listener): ListenerHandle {
		topic.validate();

		let entry = this._topics.get(topic.key);
		if (!entry) {
			entry = { topic, listeners: new Map() };
			this._topics.set(topic.key, entry);
		}

		const existing = entry.listeners.get(listener);
		if (existing) {
			return existing;
		}

		const handle: ListenerHandle = Object.freeze({
			id: randomUUID(),
			topic,
			listener,
		});
		entry.listeners.set(listener, handle);
		return handle;
	}

	/**
	 * Removes a listener from a topic.
	 * @param topic - The topic the listener was registered on.
	 * @param target - The listener, or the handle its registration returned.
	 * @returns The handle of the removed registration.
	 */
	public unregister(topic: UUri, target: Listener | ListenerHandle): ListenerHandle {
		const entry = this._topics.get(topic.key);
		const handle = entry ? this.find(entry, target) : undefined;
		if (!entry || !handle) {
			throw new ListenerNotFoundError(
				`No matching listener is registered on ${topic.key}`,
			);
		}

		entry.listeners.delete(handle.listener);
		if (entry.listeners.size === 0) {
			this._topics.delete(topic.key);
		}

		return handle;
	}

	/**
	 * Delivers a message to every listener registered on the topic when the
	 * call starts, one after the other, in registration order.
	 * @param topic - The topic to deliver on.
	 * @param message - The message handed to each listener.
	 * @returns The number of listeners invoked.
	 */
	public async dispatch(topic: UUri, message: UMessage): Promise<number> {
		const entry = this._topics.get(topic.key);
		if (!entry) {
			return 0;
		}

		const snapshot = [...entry.listeners.values()];
		const errors: unknown[] = [];
		for (const handle of snapshot) {
			try {
				// Listeners run in order, each one awaited before the next.
				// eslint-disable-next-line no-await-in-loop
				await handle.listener(message);
			} catch (error) {
				if (this._onError) {
					this.report(error, handle, message, errors);
				} else {
					errors.push(error);
				}
			}
		}

		if (errors.length > 0) {
			throw new AggregateError(
				errors,
				`${errors.length} listener(s) on ${topic.key} failed`,
			);
		}

		return snapshot.length;
	}

	public has(topic: UUri, target: Listener | ListenerHandle): boolean {
		const entry = this._topics.get(topic.key);
		return entry !== undefined && this.find(entry, target) !== undefined;
	}

	/**
	 * The topics that currently have at least one listener.
	 */
	public topics(): UUri[] {
		return [...this._topics.values()].map((entry) => entry.topic);
	}

	/**
	 * The handles registered on a topic, in registration order.
	 */
	public handles(topic: UUri): ListenerHandle[] {
		return [...(this._topics.get(topic.key)?.listeners.values() ?? [])];
	}

	/**
	 * Counts the listeners on one topic, or on all topics when none is given.
	 */
	public listenerCount(topic?: UUri): number {
		if (topic) {
			return this._topics.get(topic.key)?.listeners.size ?? 0;
		}

		let count = 0;
		for (const entry of this._topics.values()) {
			count += entry.listeners.size;
		}

		return count;
	}

	public clear(): void {
		this._topics.clear();
	}

	private report(
		error: unknown,
		handle: ListenerHandle,
		message: UMessage,
		errors: unknown[],
	): void {
		try {
			this._onError?.(error, handle, message);
		} catch (handlerError) {
			// Delivery continues; dispatch rejects with it afterwards.
			errors.push(handlerError);
		}
	}

	private find(
		entry: TopicEntry,
		target: Listener | ListenerHandle,
	): ListenerHandle | undefined {
		if (!isHandle(target)) {
			return entry.listeners.get(target);
		}

		const handle = entry.listeners.get(target.listener);
		return handle?.id === target.id ? handle : undefined;
	}
}
