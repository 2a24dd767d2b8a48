/**
 * Tests for logger creation functionality
 * Tests logger configuration without side effects
 */

// Mock pino first
const mockPino = jest.fn();
jest.mock("pino", () => mockPino);

import { createLogger, isLogLevel } from "../../src/core/logger.js";

const prettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    singleLine: true,
  },
};

describe("Logger Creation", () => {
  beforeEach(() => {
    mockPino.mockReset();
    mockPino.mockReturnValue({
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
    });
  });

  describe("createLogger", () => {
    it("should create logger with default options", () => {
      createLogger();

      expect(mockPino).toHaveBeenCalledWith({
        name: "solstice",
        level: "info",
        transport: prettyTransport,
      });
    });

    it("should create logger with verbose logging enabled", () => {
      createLogger({ verbose: true });

      expect(mockPino).toHaveBeenCalledWith({
        name: "solstice",
        level: "debug",
        transport: prettyTransport,
      });
    });

    it("should prefer an explicit level over verbose", () => {
      createLogger({ verbose: true, level: "warn" });

      expect(mockPino).toHaveBeenCalledWith({
        name: "solstice",
        level: "warn",
        transport: prettyTransport,
      });
    });

    it("should create logger without pretty formatting", () => {
      createLogger({ pretty: false });

      expect(mockPino).toHaveBeenCalledWith({
        name: "solstice",
        level: "info",
        transport: undefined,
      });
    });

    it("should let custom pino options override the defaults", () => {
      createLogger({
        name: "test-logger",
        redact: ["password"],
        verbose: true,
        pretty: false,
      });

      expect(mockPino).toHaveBeenCalledWith({
        name: "test-logger",
        level: "debug",
        transport: undefined,
        redact: ["password"],
      });
    });
  });

  describe("isLogLevel", () => {
    it("should accept pino levels", () => {
      expect(isLogLevel("trace")).toBe(true);
      expect(isLogLevel("error")).toBe(true);
    });

    it("should reject anything else", () => {
      expect(isLogLevel("verbose")).toBe(false);
      expect(isLogLevel("INFO")).toBe(false);
    });
  });
});
