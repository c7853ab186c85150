import { UMessage } from "../message.js";
import type { UPayload } from "../payload.js";
import type {
	Listener,
	ListenerHandle,
	Transport,
	UriProvider,
} from "../types.js";
import type { UUri } from "../uri.js";

/**
 * Sends notifications from the resources of one entity and manages the
 * listeners that receive notifications from others.
 */
export class SimpleNotifier {
	private readonly _transport: Transport;
	private readonly _uriProvider: UriProvider;

	/**
	 * @param transport - The transport notifications are sent and received through.
	 * @param uriProvider - The identity of the notifying entity.
	 */
	constructor(transport: Transport, uriProvider: UriProvider) {
		this._transport = transport;
		this._uriProvider = uriProvider;
	}

	public get transport(): Transport {
		return this._transport;
	}

	public get uriProvider(): UriProvider {
		return this._uriProvider;
	}

	/**
	 * Sends a notification from one of the entity's resources to a recipient.
	 * @param resourceId - The notifying resource.
	 * @param destination - The recipient's URI.
	 * @param payload - Optional content.
	 */
	public async notify(
		resourceId: number,
		destination: UUri,
		payload?: UPayload,
	): Promise<void> {
		const source = this._uriProvider.getResourceUri(resourceId);
		await this._transport.send(
			UMessage.notification(source, destination, payload),
		);
	}

	/**
	 * Starts delivering notifications on a topic to a listener. Calling it again
	 * for the same topic and listener returns the existing handle.
	 * @param topic - The notifying resource to listen to.
	 * @param listener - The callback.
	 * @returns The handle to stop listening with.
	 */
	public async startListening(
		topic: UUri,
		listener: Listener,
	): Promise<ListenerHandle> {
		return this._transport.registerListener(topic, listener);
	}

	/**
	 * Stops delivering notifications on a topic to a listener.
	 * Rejects with a ListenerNotFoundError if it is not listening.
	 * @param topic - The topic passed to {@link SimpleNotifier.startListening}.
	 * @param listener - The listener, or the handle startListening returned.
	 */
	public async stopListening(
		topic: UUri,
		listener: Listener | ListenerHandle,
	): Promise<void> {
		await this._transport.unregisterListener(topic, listener);
	}
}
