import type { UriProvider } from "./types.js";
import { UUri } from "./uri.js";

/**
 * Resolves a fixed entity identity into UUris.
 */
export class StaticUriProvider implements UriProvider {
	private readonly _source: UUri;

	/**
	 * @param authority - The authority hosting the entity, e.g. a device name.
	 * @param entityId - The entity id.
	 * @param version - The entity's major version.
	 */
	constructor(authority: string, entityId: number, version: number) {
		this._source = new UUri({ authority, entityId, version, resourceId: 0 });
		this._source.validate();
	}

	public get authority(): string {
		return this._source.authority;
	}

	public get entityId(): number {
		return this._source.entityId;
	}

	public get version(): number {
		return this._source.version;
	}

	public getResourceUri(resourceId: number): UUri {
		return this._source.withResource(resourceId);
	}

	public getSourceUri(): UUri {
		return this._source;
	}
}
