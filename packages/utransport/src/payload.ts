import { Buffer } from "node:buffer";

const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Opaque message content. The bytes are copied on construction and never
 * handed out for mutation.
 */
export class UPayload {
	private readonly _bytes: Uint8Array;

	private constructor(bytes: Uint8Array) {
		this._bytes = bytes;
	}

	/**
	 * Creates a payload holding the UTF-8 encoding of a string.
	 * @param value - The text to encode.
	 */
	public static fromString(value: string): UPayload {
		return new UPayload(new Uint8Array(Buffer.from(value, "utf8")));
	}

	/**
	 * Creates a payload from raw bytes.
	 * @param data - The bytes, either as a byte array or a list of integers 0..255.
	 */
	public static fromBytes(data: Uint8Array | readonly number[]): UPayload {
		if (!(data instanceof Uint8Array)) {
			for (const value of data) {
				if (!Number.isInteger(value) || value < 0 || value > 0xff) {
					throw new TypeError(`${value} is not a byte value`);
				}
			}
		}

		return new UPayload(Uint8Array.from(data));
	}

	/**
	 * A copy of the payload bytes.
	 */
	public get bytes(): Uint8Array {
		return Uint8Array.from(this._bytes);
	}

	public get length(): number {
		return this._bytes.length;
	}

	/**
	 * Decodes the payload as UTF-8.
	 * @returns The text, or `undefined` if the bytes are not valid UTF-8.
	 */
	public toText(): string | undefined {
		try {
			return decoder.decode(this._bytes);
		} catch {
			return undefined;
		}
	}

	public toBase64(): string {
		return Buffer.from(this._bytes).toString("base64");
	}

	public static fromBase64(value: string): UPayload {
		return new UPayload(new Uint8Array(Buffer.from(value, "base64")));
	}

	public equals(other: UPayload): boolean {
		return Buffer.from(this._bytes).equals(Buffer.from(other._bytes));
	}
}
