import { describe, expect, test } from "vitest";
import { decodeVarInt, encodeVarInt, hasCompleteVarInt } from "./varint";

describe("encodeVarInt", () => {
	test("encodes single-byte values (0-127)", () => {
		expect(encodeVarInt(0)).toEqual(new Uint8Array([0x00]));
		expect(encodeVarInt(1)).toEqual(new Uint8Array([0x01]));
		expect(encodeVarInt(127)).toEqual(new Uint8Array([0x7f]));
	});

	test("encodes two-byte values (128-16383)", () => {
		expect(encodeVarInt(128)).toEqual(new Uint8Array([0x80, 0x01]));
		expect(encodeVarInt(255)).toEqual(new Uint8Array([0xff, 0x01]));
		expect(encodeVarInt(16383)).toEqual(new Uint8Array([0xff, 0x7f]));
	});

	test("encodes three-byte values", () => {
		expect(encodeVarInt(16384)).toEqual(new Uint8Array([0x80, 0x80, 0x01]));
		expect(encodeVarInt(2097151)).toEqual(new Uint8Array([0xff, 0xff, 0x7f]));
	});

	test("encodes protocol version 767 (1.21.x)", () => {
		// 767 = 0x2FF = 0b10_1111111 -> [0xFF, 0x05]
		expect(encodeVarInt(767)).toEqual(new Uint8Array([0xff, 0x05]));
	});

	test("encodes max 32-bit value", () => {
		expect(encodeVarInt(2147483647)).toEqual(
			new Uint8Array([0xff, 0xff, 0xff, 0xff, 0x07])
		);
	});
});

describe("decodeVarInt", () => {
	test("decodes single-byte values", () => {
		expect(decodeVarInt(new Uint8Array([0x00]))).toEqual({ value: 0, bytesRead: 1 });
		expect(decodeVarInt(new Uint8Array([0x01]))).toEqual({ value: 1, bytesRead: 1 });
		expect(decodeVarInt(new Uint8Array([0x7f]))).toEqual({ value: 127, bytesRead: 1 });
	});

	test("decodes two-byte values", () => {
		expect(decodeVarInt(new Uint8Array([0x80, 0x01]))).toEqual({ value: 128, bytesRead: 2 });
		expect(decodeVarInt(new Uint8Array([0xff, 0x01]))).toEqual({ value: 255, bytesRead: 2 });
		expect(decodeVarInt(new Uint8Array([0xff, 0x7f]))).toEqual({ value: 16383, bytesRead: 2 });
	});

	test("decodes with offset", () => {
		const buffer = new Uint8Array([0x00, 0x00, 0xff, 0x05, 0x00]);
		expect(decodeVarInt(buffer, 2)).toEqual({ value: 767, bytesRead: 2 });
	});

	test("throws on empty buffer", () => {
		expect(() => decodeVarInt(new Uint8Array([]))).toThrow("VarInt is too short");
	});

	test("throws on incomplete varint", () => {
		// 0x80 has continuation bit set but no next byte
		expect(() => decodeVarInt(new Uint8Array([0x80]))).toThrow("VarInt is too short");
	});

	test("throws on varint > 5 bytes", () => {
		// All continuation bits set for 5+ bytes
		expect(() =>
			decodeVarInt(new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]))
		).toThrow("VarInt is too big");
	});
});

describe("hasCompleteVarInt", () => {
	test("is false for an empty buffer", () => {
		expect(hasCompleteVarInt(new Uint8Array([]))).toBe(false);
	});

	test("is false while the continuation bit is still set", () => {
		expect(hasCompleteVarInt(new Uint8Array([0xff]))).toBe(false);
		expect(hasCompleteVarInt(new Uint8Array([0xff, 0xff, 0xff]))).toBe(false);
	});

	test("is true once a terminating byte arrives", () => {
		expect(hasCompleteVarInt(new Uint8Array([0x7f]))).toBe(true);
		expect(hasCompleteVarInt(new Uint8Array([0xff, 0x05, 0x99]))).toBe(true);
	});

	test("respects the offset", () => {
		expect(hasCompleteVarInt(new Uint8Array([0x01, 0x80]), 1)).toBe(false);
		expect(hasCompleteVarInt(new Uint8Array([0x80, 0x01]), 1)).toBe(true);
	});

	test("reports an over-long varint as complete so decoding can reject it", () => {
		const buffer = new Uint8Array([0x80, 0x80, 0x80, 0x80, 0x80, 0x01]);
		expect(hasCompleteVarInt(buffer)).toBe(true);
		expect(() => decodeVarInt(buffer)).toThrow("VarInt is too big");
	});
});
