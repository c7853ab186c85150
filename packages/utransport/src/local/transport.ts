import type { UMessage } from "../message.js";
import { BaseTransport, type BaseTransportOptions } from "../transport.js";

/**
 * Configuration options for the local transport.
 */
export type LocalTransportOptions = BaseTransportOptions;

export const defaultLocalId = "utransport/local";

/**
 * In-process transport. A sent message is handed directly to the listeners
 * registered on its source topic, without serialization, before `send`
 * resolves. Notifications are routed by source topic like publish messages;
 * the destination travels with the message for the receiver's use.
 */
export class LocalTransport extends BaseTransport {
	/**
	 * Creates an instance of LocalTransport.
	 * @param options - Optional configuration for the transport.
	 */
	constructor(options?: LocalTransportOptions) {
		super(defaultLocalId, options);
	}

	protected async transmit(message: UMessage): Promise<void> {
		await this.deliver(message);
	}
}
