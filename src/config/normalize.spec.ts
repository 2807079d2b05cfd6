/**
 * @file Tests for stream option normalization
 */
import { normalizeStreamOptions, parseBufferSize, parseFlag, resolveStreamDefaults } from "./normalize";
import { DEFAULT_BUFFER_SIZE } from "../stream/buffer";

describe("config/normalize", () => {
  it("parses flag spellings", () => {
    expect(parseFlag("X", "1")).toBe(true);
    expect(parseFlag("X", " Yes ")).toBe(true);
    expect(parseFlag("X", "off")).toBe(false);
    expect(parseFlag("X", "")).toBe(false);
    expect(() => parseFlag("X", "maybe")).toThrow("X must be one of 1/true/yes/on or 0/false/no/off, got 'maybe'");
  });

  it("parses buffer sizes", () => {
    expect(parseBufferSize("N", "4096")).toBe(4096);
    expect(parseBufferSize("N", 16)).toBe(16);
    expect(() => parseBufferSize("N", "0")).toThrow("N must be a positive integer, got '0'");
    expect(() => parseBufferSize("N", "1.5")).toThrow("N must be a positive integer, got '1.5'");
    expect(() => parseBufferSize("N", "abc")).toThrow("N must be a positive integer, got 'abc'");
  });

  it("uses defaults when the environment is empty", () => {
    expect(resolveStreamDefaults({})).toEqual({ verbose: false, bufferSize: DEFAULT_BUFFER_SIZE });
  });

  it("reads defaults from the environment", () => {
    expect(resolveStreamDefaults({ STREAMWRAP_VERBOSE: "true", STREAMWRAP_BUFSIZE: "512" })).toEqual({
      verbose: true,
      bufferSize: 512,
    });
  });

  it("names the variable in environment errors", () => {
    expect(() => resolveStreamDefaults({ STREAMWRAP_BUFSIZE: "-1" })).toThrow(
      "STREAMWRAP_BUFSIZE must be a positive integer, got '-1'",
    );
  });

  it("lets explicit options override the environment", () => {
    const env = { STREAMWRAP_VERBOSE: "1", STREAMWRAP_BUFSIZE: "512" };
    expect(normalizeStreamOptions({ verbose: false }, env)).toEqual({ verbose: false, bufferSize: 512 });
    expect(normalizeStreamOptions({ bufferSize: 64 }, env)).toEqual({ verbose: true, bufferSize: 64 });
    expect(() => normalizeStreamOptions({ bufferSize: 0 }, env)).toThrow("bufferSize must be a positive integer, got '0'");
  });
});
