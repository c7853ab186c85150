import type { UMessage } from "./message.js";
import type { UUri } from "./uri.js";

/**
 * Callback invoked by a transport for every message that arrives on a topic
 * it was registered for.
 */
export type Listener = (message: UMessage) => void | Promise<void>;

/**
 * Returned by every listener registration. Unregistering with the handle
 * removes exactly that registration.
 */
export type ListenerHandle = {
	/**
	 * Unique identifier of the registration
	 */
	readonly id: string;
	/**
	 * The topic the listener is registered on
	 */
	readonly topic: UUri;
	/**
	 * The registered callback
	 */
	readonly listener: Listener;
};

/**
 * Transport interface implemented by every backend. Publishers and notifiers
 * depend on this contract only.
 */
export type Transport = {
	/**
	 * Sends a message. Publish and notification messages are fire-and-forget:
	 * the promise resolves once the message is handed to every local listener
	 * or to the network.
	 * @param message - The message to send
	 */
	send(message: UMessage): Promise<void>;

	/**
	 * Registers a listener for a topic. Registering the same listener on the same
	 * topic again returns the existing handle.
	 * @param topic - The topic to listen on
	 * @param listener - The callback to invoke for each message
	 * @returns The handle of the registration.
	 */
	registerListener(topic: UUri, listener: Listener): Promise<ListenerHandle>;

	/**
	 * Removes a registration, identified by the listener function or by its handle.
	 * Rejects with a ListenerNotFoundError if nothing matches on that topic.
	 * @param topic - The topic the listener was registered on
	 * @param listener - The listener or the handle returned at registration
	 */
	unregisterListener(
		topic: UUri,
		listener: Listener | ListenerHandle,
	): Promise<void>;

	/**
	 * Drops every registration and releases the backend's session.
	 */
	disconnect(): Promise<void>;
};

/**
 * Resolves an entity's static identity into full UUris.
 */
export type UriProvider = {
	/**
	 * The URI of a resource of this entity.
	 * @param resourceId - The resource id
	 */
	getResourceUri(resourceId: number): UUri;

	/**
	 * The URI identifying the entity itself (resource id 0).
	 */
	getSourceUri(): UUri;
};
