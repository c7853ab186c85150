import { UMessage } from "../message.js";
import type { UPayload } from "../payload.js";
import type { Transport, UriProvider } from "../types.js";

/**
 * Publishes messages on the resources of one entity.
 */
export class SimplePublisher {
	private readonly _transport: Transport;
	private readonly _uriProvider: UriProvider;

	/**
	 * @param transport - The transport messages are sent through.
	 * @param uriProvider - The identity of the publishing entity.
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
	 * Publishes on the topic of one of the entity's resources.
	 * @param resourceId - The resource to publish on.
	 * @param payload - Optional content. Omit it for an event without content.
	 */
	public async publish(resourceId: number, payload?: UPayload): Promise<void> {
		const topic = this._uriProvider.getResourceUri(resourceId);
		await this._transport.send(UMessage.publish(topic, payload));
	}
}
