import { expect, test } from "vitest";
import { ioError, isErrnoException, TempError } from "./errors.ts";
import { errno } from "./testing.ts";

test("TempError carries kind, path and cause", () => {
  const cause = new Error("boom");
  const error = new TempError("NotFound", "missing", { path: "/x", cause });
  expect(error).toBeInstanceOf(Error);
  expect(error.name).toBe("TempError");
  expect(error.kind).toBe("NotFound");
  expect(error.message).toBe("missing");
  expect(error.path).toBe("/x");
  expect(error.cause).toBe(cause);
});

test("TempError leaves path undefined when not given", () => {
  expect(new TempError("AlreadyConsumed", "used").path).toBe(undefined);
});

test("isErrnoException() matches system errors", () => {
  const error = errno("ENOENT", "ENOENT: missing");
  expect(isErrnoException(error)).toBe(true);
  expect(isErrnoException(error, "ENOENT")).toBe(true);
  expect(isErrnoException(error, "EEXIST")).toBe(false);
});

test("isErrnoException() rejects other values", () => {
  expect(isErrnoException(new Error("plain"))).toBe(false);
  expect(isErrnoException({ code: "ENOENT" })).toBe(false);
  expect(isErrnoException(undefined)).toBe(false);
});

test("ioError() wraps the cause into an Io error", () => {
  const cause = errno("EACCES", "EACCES: denied");
  const error = ioError("Cannot remove /x", "/x", cause);
  expect(error.kind).toBe("Io");
  expect(error.message).toBe("Cannot remove /x: EACCES: denied");
  expect(error.path).toBe("/x");
  expect(error.cause).toBe(cause);
});

test("ioError() keeps errors that are already TempError", () => {
  const cause = new TempError("AlreadyConsumed", "used");
  expect(ioError("Cannot remove /x", "/x", cause)).toBe(cause);
});

test("ioError() handles non-error causes", () => {
  const error = ioError("Cannot remove /x", "/x", "text");
  expect(error.message).toBe("Cannot remove /x");
  expect(error.cause).toBe("text");
});
