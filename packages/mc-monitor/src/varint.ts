/**
 * VarInt encoding/decoding for the Minecraft Java protocol.
 * VarInts are 1-5 bytes, using 7 bits per byte with MSB as continuation flag.
 * See: https://wiki.vg/Protocol#VarInt_and_VarLong
 */

const SEGMENT_BITS = 0x7f;
const CONTINUE_BIT = 0x80;
const MAX_VARINT_BYTES = 5;

/**
 * Encode a number as a VarInt
 */
export function encodeVarInt(value: number): Uint8Array {
	const bytes: number[] = [];
	while (true) {
		if ((value & ~SEGMENT_BITS) === 0) {
			bytes.push(value);
			break;
		}
		bytes.push((value & SEGMENT_BITS) | CONTINUE_BIT);
		value >>>= 7;
	}
	return new Uint8Array(bytes);
}

/**
 * Decode a VarInt from a buffer, returning the value and bytes consumed
 */
export function decodeVarInt(buffer: Uint8Array, offset = 0): { value: number; bytesRead: number } {
	let value = 0;
	let position = 0;
	let bytesRead = 0;

	while (true) {
		const currentByte = buffer[offset + bytesRead];
		if (currentByte === undefined) {
			throw new Error("VarInt is too short");
		}
		value |= (currentByte & SEGMENT_BITS) << position;
		bytesRead++;

		if ((currentByte & CONTINUE_BIT) === 0) {
			break;
		}

		position += 7;
		if (position >= 32) {
			throw new Error("VarInt is too big");
		}
	}

	return { value, bytesRead };
}

/**
 * Whether a complete VarInt (terminated, or already too long to be valid) starts at offset.
 * Lets a stream reader wait for more bytes instead of failing on a split packet.
 */
export function hasCompleteVarInt(buffer: Uint8Array, offset = 0): boolean {
	for (let i = 0; i < MAX_VARINT_BYTES; i++) {
		const currentByte = buffer[offset + i];
		if (currentByte === undefined) {
			return false;
		}
		if ((currentByte & CONTINUE_BIT) === 0) {
			return true;
		}
	}
	return true;
}
