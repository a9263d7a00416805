import { describe, expect, it } from "vitest";
import { InvalidCanIdError, InvalidParameterError } from "../src/errors.js";
import {
	canHeaders,
	decodeResponse,
	encodeDtcResponse,
	encodeRequest,
	encodeResponse,
	encodeVinResponse,
} from "../src/messages.js";

describe("Requests", () => {
	it("builds mode and PID bytes", () => {
		expect(Array.from(encodeRequest("RPM"))).toEqual([0x01, 0x0c]);
		expect(Array.from(encodeRequest("vin"))).toEqual([0x09, 0x02]);
		expect(Array.from(encodeRequest("DTC"))).toEqual([0x03]);
	});

	it("rejects unknown codes", () => {
		expect(() => encodeRequest("NOPE")).toThrow(InvalidParameterError);
	});
});

describe("Responses", () => {
	it("prefixes Mode 01 payloads with 41 and the PID", () => {
		expect(Array.from(encodeResponse("ECT", 0))).toEqual([0x41, 0x05, 0x28]);
		expect(Array.from(encodeResponse("rpm", 1000))).toEqual([
			0x41, 0x0c, 0x0f, 0xa0,
		]);
	});

	it("refuses VIN and DTC as Mode 01 responses", () => {
		expect(() => encodeResponse("VIN", 0)).toThrow(InvalidParameterError);
	});

	it("wraps a VIN in a Mode 09 response", () => {
		const response = encodeVinResponse("TESTVIN0123456789");
		expect(response).toHaveLength(20);
		expect(Array.from(response.subarray(0, 4))).toEqual([0x49, 0x02, 0x01, 0x54]);
	});

	it("wraps DTCs in a Mode 03 response", () => {
		expect(Array.from(encodeDtcResponse(["P0101"]))).toEqual([
			0x43, 0x01, 0x01, 0x01,
		]);
	});

	describe("decodeResponse", () => {
		it("identifies the parameter by its PID", () => {
			const { parameter, value } = decodeResponse([0x41, 0x0c, 0x0f, 0xa0]);
			expect(parameter.code).toBe("RPM");
			expect(value).toBe(1000);
		});

		it("decodes what encodeResponse builds", () => {
			expect(decodeResponse(encodeResponse("DEF", [50, 20, 100])).value).toEqual(
				[50, 20, 100],
			);
		});

		it("rejects short and foreign responses", () => {
			expect(() => decodeResponse([0x41])).toThrow("Response too short: 1 bytes");
			expect(() => decodeResponse([0x43, 0x01])).toThrow(
				"Not a Mode 01 response: 43 01",
			);
		});

		it("rejects PIDs the registry does not know", () => {
			expect(() => decodeResponse([0x41, 0x02, 0x00])).toThrow(
				"'2' is an invalid parameter name.",
			);
		});
	});
});

describe("CAN headers", () => {
	it("returns 11-bit and 29-bit identifiers", () => {
		expect(canHeaders(11)).toEqual({
			request: [0x07, 0xdf],
			response: [0x07, 0xe8],
		});
		expect(canHeaders(29).response).toEqual([0x98, 0xda, 0xf1, 0x33]);
	});

	it("rejects other widths", () => {
		expect(() => canHeaders(12)).toThrow(InvalidCanIdError);
		expect(() => canHeaders(12)).toThrow(
			"'12' is an invalid CAN ID, must be 11 or 29",
		);
	});
});
