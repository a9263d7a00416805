import { describe, expect, it } from "vitest";
import {
	decodeUnsigned,
	encodeUnsigned,
	maxUnsigned,
	parseHexString,
	sizeOf,
	toHexString,
	unsignedTypeForWidth,
} from "../src/binary.js";

describe("Unsigned field codecs", () => {
	describe("unsignedTypeForWidth", () => {
		it("maps byte widths to types", () => {
			expect(unsignedTypeForWidth(1)).toBe("u8");
			expect(unsignedTypeForWidth(2)).toBe("u16");
			expect(unsignedTypeForWidth(4)).toBe("u32");
		});

		it("rejects widths without a type", () => {
			expect(() => unsignedTypeForWidth(3)).toThrow(
				"Unsupported field width: 3 bytes",
			);
		});
	});

	it("reports sizes and maxima", () => {
		expect(sizeOf("u8")).toBe(1);
		expect(sizeOf("u32")).toBe(4);
		expect(maxUnsigned("u8")).toBe(255);
		expect(maxUnsigned("u16")).toBe(65535);
		expect(maxUnsigned("u32")).toBe(4294967295);
	});

	describe("decodeUnsigned", () => {
		it("reads big-endian values", () => {
			const buffer = new Uint8Array([0x0f, 0xa0, 0xff, 0xff, 0xff, 0xff]);
			expect(decodeUnsigned(buffer, 0, "u8")).toBe(0x0f);
			expect(decodeUnsigned(buffer, 0, "u16")).toBe(4000);
			expect(decodeUnsigned(buffer, 2, "u32")).toBe(4294967295);
		});

		it("respects the view offset of a subarray", () => {
			const frame = new Uint8Array([0x41, 0x0c, 0x0f, 0xa0]);
			expect(decodeUnsigned(frame.subarray(2), 0, "u16")).toBe(4000);
		});

		it("throws on a negative offset", () => {
			expect(() => decodeUnsigned(new Uint8Array(2), -1, "u8")).toThrow(
				"Offset cannot be negative: -1",
			);
		});

		it("throws when the field runs past the buffer", () => {
			expect(() => decodeUnsigned(new Uint8Array(1), 0, "u16")).toThrow(
				"Offset 0 out of bounds for u16 in buffer of length 1",
			);
		});
	});

	describe("encodeUnsigned", () => {
		it("writes big-endian values", () => {
			expect(Array.from(encodeUnsigned(4000, "u16"))).toEqual([0x0f, 0xa0]);
			expect(Array.from(encodeUnsigned(0x80000001, "u32"))).toEqual([
				0x80, 0x00, 0x00, 0x01,
			]);
		});

		it("rounds to the nearest integer", () => {
			expect(Array.from(encodeUnsigned(254.6, "u8"))).toEqual([255]);
			expect(Array.from(encodeUnsigned(1.4, "u8"))).toEqual([1]);
		});

		it("clamps to the type's range", () => {
			expect(Array.from(encodeUnsigned(300, "u8"))).toEqual([255]);
			expect(Array.from(encodeUnsigned(-5, "u16"))).toEqual([0, 0]);
		});
	});
});

describe("Hex helpers", () => {
	it("formats bytes as upper-case pairs", () => {
		expect(toHexString(new Uint8Array([0x41, 0x0c, 0x0f, 0xa0]))).toBe(
			"41 0C 0F A0",
		);
		expect(toHexString([])).toBe("");
	});

	it("parses spaced, packed and prefixed input", () => {
		expect(Array.from(parseHexString("41 0C"))).toEqual([0x41, 0x0c]);
		expect(Array.from(parseHexString("410c"))).toEqual([0x41, 0x0c]);
		expect(Array.from(parseHexString("0x41,0x0C"))).toEqual([0x41, 0x0c]);
		expect(Array.from(parseHexString(""))).toEqual([]);
	});

	it("rejects non-hex characters", () => {
		expect(() => parseHexString("4G")).toThrow('Invalid hex string: "4G"');
	});

	it("rejects an odd digit count", () => {
		expect(() => parseHexString("410")).toThrow(
			'Hex string has an odd number of digits: "410"',
		);
	});
});
