/**
 * Error codes carried by every {@link TransportError}.
 */
export enum TransportErrorCode {
	invalidTopic = "INVALID_TOPIC",
	invalidMessage = "INVALID_MESSAGE",
	listenerNotFound = "LISTENER_NOT_FOUND",
	unavailable = "UNAVAILABLE",
	configuration = "CONFIGURATION",
}

export type TransportErrorOptions = {
	cause?: unknown;
};

/**
 * Base class for all errors raised by transports and the helpers built on them.
 */
export class TransportError extends Error {
	public readonly code: TransportErrorCode;

	constructor(
		code: TransportErrorCode,
		message: string,
		options?: TransportErrorOptions,
	) {
		super(message, options);
		this.name = "TransportError";
		this.code = code;
	}
}

/**
 * A UUri is structurally malformed (empty authority, out-of-range id, bad text form).
 */
export class InvalidTopicError extends TransportError {
	constructor(message: string, options?: TransportErrorOptions) {
		super(TransportErrorCode.invalidTopic, message, options);
		this.name = "InvalidTopicError";
	}
}

/**
 * A message or a wire frame does not describe a valid UMessage.
 */
export class InvalidMessageError extends TransportError {
	constructor(message: string, options?: TransportErrorOptions) {
		super(TransportErrorCode.invalidMessage, message, options);
		this.name = "InvalidMessageError";
	}
}

export class ListenerNotFoundError extends TransportError {
	constructor(message: string, options?: TransportErrorOptions) {
		super(TransportErrorCode.listenerNotFound, message, options);
		this.name = "ListenerNotFoundError";
	}
}

/**
 * The backend cannot serve the call right now, e.g. its session is closed.
 */
export class UnavailableError extends TransportError {
	constructor(message: string, options?: TransportErrorOptions) {
		super(TransportErrorCode.unavailable, message, options);
		this.name = "UnavailableError";
	}
}

/**
 * A transport builder was given a configuration it cannot build from.
 */
export class ConfigurationError extends TransportError {
	constructor(message: string, options?: TransportErrorOptions) {
		super(TransportErrorCode.configuration, message, options);
		this.name = "ConfigurationError";
	}
}
