import { InvalidTopicError } from "./errors.js";

export const maxEntityId = 0xff_ff_ff_ff;
export const maxVersion = 0xff;
export const maxResourceId = 0xff_ff;

const authorityPattern = /^[\w.~-]+$/;
const uriPattern =
	/^\/\/([^/]*)\/([\dA-Fa-f]{1,8})\/([\dA-Fa-f]{1,2})\/([\dA-Fa-f]{1,4})$/;

export type UUriFields = {
	authority: string;
	entityId: number;
	version: number;
	resourceId: number;
};

/**
 * Whether a string can be the authority of a topic.
 */
export function isValidAuthority(authority: string): boolean {
	return authorityPattern.test(authority);
}

function checkRange(name: string, value: number, max: number): void {
	if (!Number.isInteger(value) || value < 0 || value > max) {
		throw new InvalidTopicError(
			`${name} must be an integer between 0 and ${hex(max)}, got ${value}`,
		);
	}
}

function hex(value: number): string {
	return value.toString(16).toUpperCase();
}

/**
 * Structured address of a resource: the authority (device) that hosts an entity,
 * the entity's id and major version, and the resource within it.
 * Two UUris are the same topic when all four fields are equal.
 */
export class UUri {
	public readonly authority: string;
	public readonly entityId: number;
	public readonly version: number;
	public readonly resourceId: number;
	private readonly _key: string;

	/**
	 * Numeric fields are range-checked here. The authority is only checked by
	 * {@link UUri.validate} so a malformed topic can still be handed to a
	 * transport, which rejects it.
	 * @param fields - The four address fields.
	 */
	constructor(fields: UUriFields) {
		checkRange("entity id", fields.entityId, maxEntityId);
		checkRange("version", fields.version, maxVersion);
		checkRange("resource id", fields.resourceId, maxResourceId);
		this.authority = fields.authority;
		this.entityId = fields.entityId;
		this.version = fields.version;
		this.resourceId = fields.resourceId;
		this._key = `//${fields.authority}/${hex(fields.entityId)}/${hex(fields.version)}/${hex(fields.resourceId)}`;
		Object.freeze(this);
	}

	/**
	 * Parses the text form produced by {@link UUri.toString}, e.g. `//veh/A34B/1/8001`.
	 * @param text - The URI text.
	 * @returns The parsed and validated UUri.
	 */
	public static parse(text: string): UUri {
		const match = uriPattern.exec(text);
		if (!match) {
			throw new InvalidTopicError(`"${text}" is not a valid UUri`);
		}

		const [, authority, entityId, version, resourceId] = match;
		const uri = new UUri({
			authority,
			entityId: Number.parseInt(entityId, 16),
			version: Number.parseInt(version, 16),
			resourceId: Number.parseInt(resourceId, 16),
		});
		uri.validate();
		return uri;
	}

	/**
	 * Canonical text form, identical for every pair of equal UUris.
	 */
	public get key(): string {
		return this._key;
	}

	public equals(other: UUri): boolean {
		return (
			this.authority === other.authority &&
			this.entityId === other.entityId &&
			this.version === other.version &&
			this.resourceId === other.resourceId
		);
	}

	/**
	 * Whether the UUri can be used as a topic.
	 */
	public isValid(): boolean {
		return isValidAuthority(this.authority);
	}

	/**
	 * Throws {@link InvalidTopicError} if the UUri cannot be used as a topic.
	 */
	public validate(): void {
		if (this.authority.length === 0) {
			throw new InvalidTopicError(`${this._key} has an empty authority`);
		}

		if (!this.isValid()) {
			throw new InvalidTopicError(
				`${this._key} has an invalid authority "${this.authority}"`,
			);
		}
	}

	/**
	 * Returns a copy of this UUri addressing another resource of the same entity.
	 * @param resourceId - The resource id of the copy.
	 */
	public withResource(resourceId: number): UUri {
		return new UUri({
			authority: this.authority,
			entityId: this.entityId,
			version: this.version,
			resourceId,
		});
	}

	public toString(): string {
		return this._key;
	}
}
