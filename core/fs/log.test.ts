import { afterEach, expect, test, vi } from "vitest";
import { consoleLogger, silentLogger } from "./log.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

test("consoleLogger() writes messages at or above the level", () => {
  const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
  const info = vi.spyOn(console, "info").mockImplementation(() => {});
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const logger = consoleLogger("warn");
  logger.debug("debug message");
  logger.info("info message");
  logger.warn("warn message", 42);
  logger.error("error message");
  expect(debug).not.toHaveBeenCalled();
  expect(info).not.toHaveBeenCalled();
  expect(warn).toHaveBeenCalledWith("warn message", 42);
  expect(error).toHaveBeenCalledWith("error message");
});

test("consoleLogger() defaults to the info level", () => {
  const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
  const info = vi.spyOn(console, "info").mockImplementation(() => {});
  const logger = consoleLogger();
  logger.debug("debug message");
  logger.info("info message");
  expect(debug).not.toHaveBeenCalled();
  expect(info).toHaveBeenCalledWith("info message");
});

test("silentLogger writes nothing", () => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  silentLogger.warn("warn message");
  expect(warn).not.toHaveBeenCalled();
});
