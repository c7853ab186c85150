export { decodeMessage, encodeMessage, type WireMessage } from "./codec.js";
export { SimpleNotifier } from "./communication/notifier.js";
export { SimplePublisher } from "./communication/publisher.js";
export {
	ConfigurationError,
	InvalidMessageError,
	InvalidTopicError,
	ListenerNotFoundError,
	TransportError,
	TransportErrorCode,
	type TransportErrorOptions,
	UnavailableError,
} from "./errors.js";
export {
	defaultLocalId,
	LocalTransport,
	type LocalTransportOptions,
} from "./local/transport.js";
export { UMessage, type UMessageFields, UMessageType } from "./message.js";
export { UPayload } from "./payload.js";
export {
	type ListenerErrorHandler,
	ListenerRegistry,
	type ListenerRegistryOptions,
} from "./registry.js";
export {
	BaseTransport,
	type BaseTransportOptions,
	type TopicSubscription,
	TransportEvents,
	TransportHooks,
} from "./transport.js";
export type {
	Listener,
	ListenerHandle,
	Transport,
	UriProvider,
} from "./types.js";
export {
	isValidAuthority,
	maxEntityId,
	maxResourceId,
	maxVersion,
	UUri,
	type UUriFields,
} from "./uri.js";
export { StaticUriProvider } from "./uri-provider.js";
