import {
	BaseTransport,
	type BaseTransportOptions,
	ConfigurationError,
	decodeMessage,
	encodeMessage,
	isValidAuthority,
	type TopicSubscription,
	TransportEvents,
	type UMessage,
	UnavailableError,
	type UUri,
} from "utransport";
import { createClient, type RedisClientType } from "redis";

/**
 * Configuration options for the Redis transport.
 */
export type RedisTransportOptions = BaseTransportOptions & {
	/** The authority this transport runs on. */
	authority: string;
	/** Redis connection URI. Defaults to "redis://localhost:6379" */
	uri?: string;
	/** Prefix of every channel name. Defaults to "up" */
	channelPrefix?: string;
};

/** Default Redis connection URI */
export const defaultRedisUri = "redis://localhost:6379";

/** Default Redis transport identifier */
export const defaultRedisId = "utransport/redis";

/** Default channel prefix */
export const defaultChannelPrefix = "up";

/**
 * Redis-based transport.
 * Uses Redis pub/sub, one channel per topic named `<prefix>:<topic key>`, so
 * messages reach every process subscribed to the topic.
 */
export class RedisTransport extends BaseTransport {
	/** Redis client used for publishing messages */
	private readonly _pub: RedisClientType;

	/** Redis client used for subscribing to messages */
	private readonly _sub: RedisClientType;

	private readonly _authority: string;
	private readonly _uri: string;
	private readonly _channelPrefix: string;

	/**
	 * Wraps two connected clients. Use {@link RedisTransport.builder} to connect them.
	 * @param pub - Client used to publish
	 * @param sub - Client used to subscribe, in subscriber mode
	 * @param options - Configuration for the transport
	 */
	constructor(
		pub: RedisClientType,
		sub: RedisClientType,
		options: RedisTransportOptions,
	) {
		super(defaultRedisId, options);
		this._pub = pub;
		this._sub = sub;
		this._authority = options.authority;
		this._uri = options.uri ?? defaultRedisUri;
		this._channelPrefix = options.channelPrefix ?? defaultChannelPrefix;

		const forward = (error: unknown) => {
			this.emit(TransportEvents.error, error);
		};

		this._pub.on("error", forward);
		this._sub.on("error", forward);
	}

	/**
	 * Starts configuring a transport for an authority.
	 * @param authority The authority the transport runs on
	 */
	public static builder(authority: string): RedisTransportBuilder {
		return new RedisTransportBuilder(authority);
	}

	public get authority(): string {
		return this._authority;
	}

	public get uri(): string {
		return this._uri;
	}

	public get channelPrefix(): string {
		return this._channelPrefix;
	}

	/**
	 * The channel a topic is published on.
	 * @param topic The topic
	 */
	public channel(topic: UUri): string {
		return `${this._channelPrefix}:${topic.key}`;
	}

	protected async transmit(message: UMessage): Promise<void> {
		if (!this._pub.isOpen) {
			throw new UnavailableError(`Redis connection to ${this._uri} is closed`);
		}

		await this._pub.publish(this.channel(message.source), encodeMessage(message));
	}

	protected async openTopic(topic: UUri): Promise<TopicSubscription> {
		const channel = this.channel(topic);
		if (!this._sub.isOpen) {
			throw new UnavailableError(`Redis connection to ${this._uri} is closed`);
		}

		await this._sub.subscribe(channel, (raw) => {
			this.receive(topic, raw).catch((error: unknown) => {
				this.emit(TransportEvents.error, error);
			});
		});
		this.emit(TransportEvents.info, `Subscribed to ${channel}`);

		return {
			close: async () => {
				await this._sub.unsubscribe(channel);
				this.emit(TransportEvents.info, `Unsubscribed from ${channel}`);
			},
		};
	}

	/**
	 * Quits both clients. Each one is quit even when the other fails.
	 */
	protected async close(): Promise<void> {
		const results = await Promise.allSettled([
			this._pub.quit(),
			this._sub.quit(),
		]);
		const failures: unknown[] = [];
		for (const result of results) {
			if (result.status === "rejected") {
				failures.push(result.reason);
			}
		}

		if (failures.length === 1) {
			throw failures[0];
		}

		if (failures.length > 1) {
			throw new AggregateError(
				failures,
				`Cannot close the Redis connections to ${this._uri}`,
			);
		}
	}

	private async receive(topic: UUri, raw: string): Promise<void> {
		let message: UMessage;
		try {
			message = decodeMessage(raw);
		} catch (error) {
			this.emit(
				TransportEvents.warn,
				`Dropped undecodable frame on ${this.channel(topic)}: ${String(error)}`,
			);
			return;
		}

		if (!message.source.equals(topic)) {
			this.emit(
				TransportEvents.warn,
				`Dropped frame from ${message.source.key} received on ${this.channel(topic)}`,
			);
			return;
		}

		await this.deliver(message);
	}
}

/**
 * Collects the configuration of a {@link RedisTransport} and connects its clients.
 */
export class RedisTransportBuilder {
	private readonly _authority: string;
	private _uri = defaultRedisUri;
	private _id: string | undefined;
	private _channelPrefix = defaultChannelPrefix;

	constructor(authority: string) {
		this._authority = authority;
	}

	public get authority(): string {
		return this._authority;
	}

	/**
	 * Sets the Redis server to connect to, e.g. "redis://localhost:6379".
	 */
	public withUri(uri: string): this {
		this._uri = uri;
		return this;
	}

	public withId(id: string): this {
		this._id = id;
		return this;
	}

	public withChannelPrefix(prefix: string): this {
		this._channelPrefix = prefix;
		return this;
	}

	/**
	 * Validates the configuration and connects a publishing and a subscribing client.
	 * The clients do not reconnect; a lost session surfaces as an UnavailableError.
	 * @returns A connected transport.
	 */
	public async build(): Promise<RedisTransport> {
		if (!isValidAuthority(this._authority)) {
			throw new ConfigurationError(
				`"${this._authority}" is not a valid authority`,
			);
		}

		if (this._channelPrefix.length === 0) {
			throw new ConfigurationError("The channel prefix cannot be empty");
		}

		const pub: RedisClientType = createClient({
			url: this._uri,
			socket: { reconnectStrategy: false },
		});
		const sub = pub.duplicate();
		// connect() rejects with the same failure the clients emit.
		const ignore = (_error: unknown) => {};

		pub.on("error", ignore);
		sub.on("error", ignore);
		try {
			await pub.connect();
			await sub.connect();
		} catch (error) {
			if (pub.isOpen) {
				await pub.quit();
			}

			throw new ConfigurationError(
				`Cannot open a Redis connection to ${this._uri}`,
				{ cause: error },
			);
		} finally {
			pub.off("error", ignore);
			sub.off("error", ignore);
		}

		return new RedisTransport(pub, sub, {
			authority: this._authority,
			uri: this._uri,
			channelPrefix: this._channelPrefix,
			id: this._id,
		});
	}
}
