import {
	connect,
	type Msg,
	type NatsConnection,
	type Subscription,
} from "@nats-io/transport-node";
import {
	BaseTransport,
	type BaseTransportOptions,
	ConfigurationError,
	decodeMessage,
	encodeMessage,
	InvalidTopicError,
	isValidAuthority,
	type TopicSubscription,
	TransportEvents,
	type UMessage,
	UnavailableError,
	type UUri,
} from "utransport";

export type NatsTransportOptions = BaseTransportOptions & {
	/**
	 * The authority this transport runs on. Used as the NATS connection name.
	 */
	authority: string;
	/**
	 * The NATS server the connection was opened to.
	 */
	uri?: string;
	/**
	 * First token of every subject. Defaults to "up".
	 */
	subjectPrefix?: string;
};

export const defaultNatsUri = "localhost:4222";
export const defaultNatsId = "utransport/nats";
export const defaultSubjectPrefix = "up";

const subjectPrefixPattern = /^[\w-]+(\.[\w-]+)*$/;

function hex(value: number): string {
	return value.toString(16).toUpperCase();
}

/**
 * Transport over NATS core pub/sub. Each topic maps to one subject,
 * `<prefix>.<authority>.<entity>.<version>.<resource>`, and messages travel as
 * JSON frames. Notifications are published on their source topic's subject.
 */
export class NatsTransport extends BaseTransport {
	private readonly _connection: NatsConnection;
	private readonly _authority: string;
	private readonly _uri: string;
	private readonly _subjectPrefix: string;

	/**
	 * Wraps an open connection. Use {@link NatsTransport.builder} to open one.
	 * @param connection - The NATS connection to publish and subscribe on.
	 * @param options - Configuration for the transport.
	 */
	constructor(connection: NatsConnection, options: NatsTransportOptions) {
		super(defaultNatsId, options);
		this._connection = connection;
		this._authority = options.authority;
		this._uri = options.uri ?? defaultNatsUri;
		this._subjectPrefix = options.subjectPrefix ?? defaultSubjectPrefix;
	}

	/**
	 * Starts configuring a transport for an authority.
	 * @param authority - The authority the transport runs on.
	 */
	public static builder(authority: string): NatsTransportBuilder {
		return new NatsTransportBuilder(authority);
	}

	public get authority(): string {
		return this._authority;
	}

	public get uri(): string {
		return this._uri;
	}

	public get subjectPrefix(): string {
		return this._subjectPrefix;
	}

	public get connection(): NatsConnection {
		return this._connection;
	}

	/**
	 * The NATS subject a topic is published on.
	 * @param topic - The topic.
	 */
	public subject(topic: UUri): string {
		const tokens = topic.authority.split(".");
		if (tokens.includes("")) {
			throw new InvalidTopicError(
				`${topic.key} cannot be mapped to a NATS subject`,
			);
		}

		return `${this._subjectPrefix}.${topic.authority}.${hex(topic.entityId)}.${hex(topic.version)}.${hex(topic.resourceId)}`;
	}

	protected async transmit(message: UMessage): Promise<void> {
		if (this._connection.isClosed()) {
			throw new UnavailableError(`NATS connection to ${this._uri} is closed`);
		}

		this._connection.publish(this.subject(message.source), encodeMessage(message));
	}

	protected async openTopic(topic: UUri): Promise<TopicSubscription> {
		const subject = this.subject(topic);
		if (this._connection.isClosed()) {
			throw new UnavailableError(`NATS connection to ${this._uri} is closed`);
		}

		const subscription = this._connection.subscribe(subject);
		const consuming = this.consume(topic, subscription);
		try {
			await this._connection.flush();
		} catch (error) {
			subscription.unsubscribe();
			await consuming;
			throw new UnavailableError(`Cannot subscribe to ${subject}`, {
				cause: error,
			});
		}

		this.emit(TransportEvents.info, `Subscribed to ${subject}`);

		return {
			close: async () => {
				subscription.unsubscribe();
				await consuming;
				this.emit(TransportEvents.info, `Unsubscribed from ${subject}`);
			},
		};
	}

	protected async close(): Promise<void> {
		await this._connection.close();
	}

	private async consume(topic: UUri, subscription: Subscription): Promise<void> {
		try {
			for await (const raw of subscription) {
				await this.receive(topic, raw);
			}
		} catch (error) {
			this.emit(TransportEvents.error, error);
		}
	}

	private async receive(topic: UUri, raw: Msg): Promise<void> {
		let message: UMessage;
		try {
			message = decodeMessage(raw.string());
		} catch (error) {
			this.emit(
				TransportEvents.warn,
				`Dropped undecodable frame on ${raw.subject}: ${String(error)}`,
			);
			return;
		}

		if (!message.source.equals(topic)) {
			this.emit(
				TransportEvents.warn,
				`Dropped frame from ${message.source.key} received on ${raw.subject}`,
			);
			return;
		}

		await this.deliver(message);
	}
}

/**
 * Collects the configuration of a {@link NatsTransport} and opens its connection.
 */
export class NatsTransportBuilder {
	private readonly _authority: string;
	private _uri = defaultNatsUri;
	private _id: string | undefined;
	private _subjectPrefix = defaultSubjectPrefix;

	constructor(authority: string) {
		this._authority = authority;
	}

	public get authority(): string {
		return this._authority;
	}

	/**
	 * Sets the NATS server to connect to, e.g. "localhost:4222".
	 */
	public withUri(uri: string): this {
		this._uri = uri;
		return this;
	}

	public withId(id: string): this {
		this._id = id;
		return this;
	}

	public withSubjectPrefix(prefix: string): this {
		this._subjectPrefix = prefix;
		return this;
	}

	/**
	 * Validates the configuration and connects.
	 * @returns A connected transport.
	 */
	public async build(): Promise<NatsTransport> {
		if (
			!isValidAuthority(this._authority) ||
			this._authority.split(".").includes("")
		) {
			throw new ConfigurationError(
				`"${this._authority}" is not a valid authority`,
			);
		}

		if (!subjectPrefixPattern.test(this._subjectPrefix)) {
			throw new ConfigurationError(
				`"${this._subjectPrefix}" is not a valid subject prefix`,
			);
		}

		let connection: NatsConnection;
		try {
			connection = await connect({ servers: this._uri, name: this._authority });
		} catch (error) {
			throw new ConfigurationError(
				`Cannot open a NATS connection to ${this._uri}`,
				{ cause: error },
			);
		}

		return new NatsTransport(connection, {
			authority: this._authority,
			uri: this._uri,
			subjectPrefix: this._subjectPrefix,
			id: this._id,
		});
	}
}
