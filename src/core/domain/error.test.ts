import { describe, expect, it } from "vitest";

import {
    classifyBoardError,
    FeedParseError,
    FrameDimensionMismatchError,
    IndexOutOfBoundsError,
    isRecoverable,
    MalformedValueError,
    MissingFieldError,
    TerminalIOError,
    UnknownVehicleCodeError,
} from "@core/domain/error";
import { HttpError, TransportError } from "@core/network/fetchAPI";
import { getBoardErrorMessage } from "@board/utils/errorMessages";

describe("classifyBoardError", () => {
    it.each([
        [new HttpError("down", 503), "ERR:TRANSPORT"],
        [new TransportError("refused"), "ERR:TRANSPORT"],
        [new FeedParseError("bad json"), "ERR:PARSE"],
        [new MissingFieldError("monitors"), "ERR:NORMALIZATION"],
        [new MalformedValueError("data.monitors[0].lines", "array"), "ERR:NORMALIZATION"],
        [new UnknownVehicleCodeError("ptFerry"), "ERR:NORMALIZATION"],
        [new IndexOutOfBoundsError(3, null), "ERR:RENDERING"],
        [new FrameDimensionMismatchError("size"), "ERR:RENDERING"],
        [new TerminalIOError("EPIPE"), "ERR:TERMINAL"],
        [new RangeError("other"), "ERR:UNKNOWN"],
        ["not an error", "ERR:UNKNOWN"],
    ])("classifies %s", (error, code) => {
        expect(classifyBoardError(error)).toBe(code);
    });

    it("recovers only from feed side failures", () => {
        expect(isRecoverable("ERR:TRANSPORT")).toBe(true);
        expect(isRecoverable("ERR:PARSE")).toBe(true);
        expect(isRecoverable("ERR:NORMALIZATION")).toBe(true);
        expect(isRecoverable("ERR:RENDERING")).toBe(false);
        expect(isRecoverable("ERR:TERMINAL")).toBe(false);
        expect(isRecoverable("ERR:UNKNOWN")).toBe(false);
    });
});

describe("error messages", () => {
    it("describes the index error for missing notes", () => {
        expect(new IndexOutOfBoundsError(2, null).message).toBe("Traffic note index 2 supplied without traffic notes");
        expect(new IndexOutOfBoundsError(2, 0).message).toBe("Traffic note index 2 out of bounds for 0 note(s)");
    });

    it("prefixes the operator message with the code", () => {
        expect(getBoardErrorMessage("ERR:NORMALIZATION", new UnknownVehicleCodeError("ptFerry"))).toBe(
            "[ERR:NORMALIZATION] The departure feed has an unexpected format: Unknown vehicle type code: ptFerry"
        );
        expect(getBoardErrorMessage("ERR:UNKNOWN", "boom")).toBe("[ERR:UNKNOWN] Unexpected error: boom");
    });
});
