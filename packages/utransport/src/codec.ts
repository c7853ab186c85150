import { InvalidMessageError, TransportError } from "./errors.js";
import { UMessage, UMessageType } from "./message.js";
import { UPayload } from "./payload.js";
import { UUri } from "./uri.js";

/**
 * JSON frame used by network transports. URIs travel in their text form and
 * the payload as base64, so bytes that are not UTF-8 survive the trip.
 */
export type WireMessage = {
	id: string;
	type: UMessageType;
	source: string;
	destination?: string;
	payload?: string;
	timestamp: number;
};

const base64Pattern = /^[A-Za-z\d+/]*={0,2}$/;

function isMessageType(value: unknown): value is UMessageType {
	return value === UMessageType.publish || value === UMessageType.notification;
}

export function encodeMessage(message: UMessage): string {
	const wire: WireMessage = {
		id: message.id,
		type: message.type,
		source: message.source.key,
		destination: message.destination?.key,
		payload: message.payload?.toBase64(),
		timestamp: message.timestamp,
	};
	return JSON.stringify(wire);
}

/**
 * Rebuilds a message from a frame written by {@link encodeMessage}.
 * @param raw - The frame text.
 * @returns The decoded message.
 */
export function decodeMessage(raw: string): UMessage {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new InvalidMessageError("Frame is not valid JSON", { cause: error });
	}

	if (typeof parsed !== "object" || parsed === null) {
		throw new InvalidMessageError("Frame is not a JSON object");
	}

	const frame: Record<string, unknown> = { ...parsed };
	const { id, type, source, destination, payload, timestamp } = frame;
	if (typeof id !== "string" || id.length === 0) {
		throw new InvalidMessageError("Frame has no message id");
	}

	if (!isMessageType(type)) {
		throw new InvalidMessageError(`Frame has unknown message type ${String(type)}`);
	}

	if (typeof source !== "string") {
		throw new InvalidMessageError("Frame has no source");
	}

	if (destination !== undefined && typeof destination !== "string") {
		throw new InvalidMessageError("Frame destination is not a string");
	}

	if (payload !== undefined && typeof payload !== "string") {
		throw new InvalidMessageError("Frame payload is not a string");
	}

	if (typeof timestamp !== "number" || !Number.isFinite(timestamp)) {
		throw new InvalidMessageError("Frame has no timestamp");
	}

	return new UMessage({
		id,
		type,
		source: parseUri(source),
		destination: typeof destination === "string" ? parseUri(destination) : undefined,
		payload: typeof payload === "string" ? parsePayload(payload) : undefined,
		timestamp,
	});
}

function parseUri(text: string): UUri {
	try {
		return UUri.parse(text);
	} catch (error) {
		if (error instanceof TransportError) {
			throw new InvalidMessageError(error.message, { cause: error });
		}

		throw error;
	}
}

function parsePayload(text: string): UPayload {
	if (!base64Pattern.test(text)) {
		throw new InvalidMessageError("Frame payload is not base64");
	}

	return UPayload.fromBase64(text);
}
