import { describe, expect, it } from "vitest";

import {
    getEnv,
    getEnvArray,
    getEnvBoolean,
    getEnvInteger,
    getEnvIntegerArray,
    getEnvNumber,
} from "@core/utils/parser";

describe("env parsers", () => {
    it("falls back for unset or blank strings", () => {
        expect(getEnv(undefined, "x")).toBe("x");
        expect(getEnv("  ", "x")).toBe("x");
        expect(getEnv(" Europe/Vienna ", "x")).toBe("Europe/Vienna");
    });

    it("parses numbers with a fallback", () => {
        expect(getEnvNumber("2.5", 1)).toBe(2.5);
        expect(getEnvNumber("soon", 1)).toBe(1);
        expect(getEnvNumber("", 1)).toBe(1);
    });

    it("accepts only whole numbers at or above the minimum", () => {
        expect(getEnvInteger("10", 1)).toBe(10);
        expect(getEnvInteger("0", 1)).toBe(1);
        expect(getEnvInteger("1.5", 1)).toBe(1);
        expect(getEnvInteger("0", 5, 0)).toBe(0);
    });

    it("reads booleans leniently", () => {
        expect(getEnvBoolean("YES")).toBe(true);
        expect(getEnvBoolean("off")).toBe(false);
        expect(getEnvBoolean(undefined, true)).toBe(true);
    });

    it("splits lists and drops empty entries", () => {
        expect(getEnvArray("a, b,,c")).toEqual(["a", "b", "c"]);
        expect(getEnvArray(undefined, ",", ["z"])).toEqual(["z"]);
    });

    it("keeps only the integers of a stop id list", () => {
        expect(getEnvIntegerArray("252, 269,abc,4.5,17")).toEqual([252, 269, 17]);
        expect(getEnvIntegerArray("abc", ",", [1])).toEqual([1]);
    });
});
