import { randomUUID } from "node:crypto";
import { InvalidMessageError } from "./errors.js";
import type { UPayload } from "./payload.js";
import type { UUri } from "./uri.js";

export enum UMessageType {
	publish = "publish",
	notification = "notification",
}

export type UMessageFields = {
	/**
	 * Unique identifier of the message. Generated when omitted.
	 */
	id?: string;
	type: UMessageType;
	/**
	 * The topic the message is published on. For a notification this is the
	 * notifying resource.
	 */
	source: UUri;
	/**
	 * The addressed recipient. Required for notifications, absent for publish.
	 */
	destination?: UUri;
	payload?: UPayload;
	/**
	 * Creation time in epoch milliseconds. Defaults to now.
	 */
	timestamp?: number;
};

/**
 * Message envelope handed to transports and delivered to listeners.
 * Frozen on construction.
 */
export class UMessage {
	public readonly id: string;
	public readonly type: UMessageType;
	public readonly source: UUri;
	public readonly destination: UUri | undefined;
	public readonly payload: UPayload | undefined;
	public readonly timestamp: number;

	constructor(fields: UMessageFields) {
		if (fields.type === UMessageType.notification && !fields.destination) {
			throw new InvalidMessageError("A notification requires a destination");
		}

		if (fields.type === UMessageType.publish && fields.destination) {
			throw new InvalidMessageError(
				"A publish message cannot carry a destination",
			);
		}

		this.id = fields.id ?? randomUUID();
		this.type = fields.type;
		this.source = fields.source;
		this.destination = fields.destination;
		this.payload = fields.payload;
		this.timestamp = fields.timestamp ?? Date.now();
		Object.freeze(this);
	}

	/**
	 * Builds a publish message for a topic.
	 * @param topic - The topic to publish on.
	 * @param payload - Optional content. A publish without payload is valid.
	 */
	public static publish(topic: UUri, payload?: UPayload): UMessage {
		return new UMessage({ type: UMessageType.publish, source: topic, payload });
	}

	/**
	 * Builds a notification from a resource to a recipient.
	 * @param source - The notifying resource; listeners subscribe to it.
	 * @param destination - The recipient's URI.
	 * @param payload - Optional content.
	 */
	public static notification(
		source: UUri,
		destination: UUri,
		payload?: UPayload,
	): UMessage {
		return new UMessage({
			type: UMessageType.notification,
			source,
			destination,
			payload,
		});
	}

	/**
	 * The payload decoded as UTF-8, or `undefined` when there is no payload or
	 * it is not valid UTF-8.
	 */
	public payloadText(): string | undefined {
		return this.payload?.toText();
	}
}
