import { mkdir, writeFile } from "node:fs/promises";
import { expect, test, vi } from "vitest";
import {
  canDispatch,
  removeBlocking,
  removeCollected,
  removeInBackground,
  removeObject,
  type RemovalTarget,
} from "./deletion.ts";
import { TempError } from "./errors.ts";
import { type Logger, silentLogger } from "./log.ts";
import { nodeFileSystem, type TempFileSystem } from "./system.ts";
import { tempDirectory } from "./temp.ts";
import { exists, failingFileSystem } from "./testing.ts";

function target(
  path: string,
  kind: "file" | "directory",
  options?: { fs?: TempFileSystem; logger?: Logger; concurrency?: number },
): RemovalTarget {
  return {
    path,
    kind,
    fs: options?.fs ?? nodeFileSystem,
    logger: options?.logger ?? silentLogger,
    concurrency: options?.concurrency ?? 16,
  };
}

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

test("canDispatch() is true while the process runs", () => {
  expect(canDispatch()).toBe(true);
});

test("removeObject() removes a file", async () => {
  await using root = await tempDirectory();
  await writeFile(root.path("file.txt"), "content");
  await removeObject(target(root.path("file.txt"), "file"));
  expect(await exists(root.path("file.txt"))).toBe(false);
});

test("removeObject() removes a directory tree", async () => {
  await using root = await tempDirectory();
  await mkdir(root.path("tree", "a", "b"), { recursive: true });
  await writeFile(root.path("tree", "a", "b", "file.txt"), "content");
  await writeFile(root.path("tree", "a", "file.txt"), "content");
  await writeFile(root.path("tree", "file.txt"), "content");
  await removeObject(target(root.path("tree"), "directory"));
  expect(await exists(root.path("tree"))).toBe(false);
  expect(await exists(root.path())).toBe(true);
});

test("removeObject() succeeds for missing objects", async () => {
  await using root = await tempDirectory();
  await removeObject(target(root.path("missing.txt"), "file"));
  await removeObject(target(root.path("missing"), "directory"));
});

test("removeObject() logs removal at debug level", async () => {
  await using root = await tempDirectory();
  await writeFile(root.path("file.txt"), "content");
  const logger = spyLogger();
  await removeObject(target(root.path("file.txt"), "file", { logger }));
  expect(logger.debug).toHaveBeenCalledWith(
    `Removed temporary file ${root.path("file.txt")}`,
  );
});

test("removeObject() wraps a single failure", async () => {
  await using root = await tempDirectory();
  const path = root.path("file.txt");
  await writeFile(path, "content");
  const fs = failingFileSystem({ unlink: () => true });
  const error = await removeObject(target(path, "file", { fs })).catch((
    e: unknown,
  ) => e);
  expect(error).toBeInstanceOf(TempError);
  expect(error).toMatchObject({
    kind: "Io",
    path,
    message: `Cannot remove ${path}: EACCES: unlink ${path}`,
  });
  expect(await exists(path)).toBe(true);
});

test("removeObject() continues past failures and aggregates them", async () => {
  await using root = await tempDirectory();
  const tree = root.path("tree");
  await mkdir(root.path("tree", "a"), { recursive: true });
  await mkdir(root.path("tree", "b"));
  await writeFile(root.path("tree", "a", "bad.txt"), "content");
  await writeFile(root.path("tree", "a", "good.txt"), "content");
  await writeFile(root.path("tree", "b", "bad.txt"), "content");
  await writeFile(root.path("tree", "good.txt"), "content");
  const fs = failingFileSystem({ unlink: (path) => path.endsWith("bad.txt") });
  const error = await removeObject(target(tree, "directory", { fs })).catch((
    e: unknown,
  ) => e);
  expect(error).toBeInstanceOf(TempError);
  expect(error).toMatchObject({
    kind: "Io",
    message: `Cannot remove ${tree}: 2 entries failed`,
  });
  const cause = error instanceof TempError ? error.cause : undefined;
  expect(cause).toBeInstanceOf(AggregateError);
  const messages = cause instanceof AggregateError
    ? cause.errors.map((e: Error) => e.message).sort()
    : [];
  expect(messages).toEqual([
    `EACCES: unlink ${root.path("tree", "a", "bad.txt")}`,
    `EACCES: unlink ${root.path("tree", "b", "bad.txt")}`,
  ]);
  expect(await exists(root.path("tree", "a", "bad.txt"))).toBe(true);
  expect(await exists(root.path("tree", "b", "bad.txt"))).toBe(true);
  expect(await exists(root.path("tree", "a", "good.txt"))).toBe(false);
  expect(await exists(root.path("tree", "good.txt"))).toBe(false);
});

test("removeObject() limits concurrency within a directory", async () => {
  await using root = await tempDirectory();
  for (const name of ["1", "2", "3", "4"]) {
    await writeFile(root.path(name), "content");
  }
  let running = 0;
  let peak = 0;
  const fs: TempFileSystem = {
    ...nodeFileSystem,
    unlink: async (path) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      await nodeFileSystem.unlink(path);
      running--;
    },
  };
  await removeObject(target(root.path(), "directory", { fs, concurrency: 2 }));
  expect(peak).toBe(2);
  expect(await exists(root.path())).toBe(false);
});

test("removeInBackground() removes the object later", async () => {
  await using root = await tempDirectory();
  await writeFile(root.path("file.txt"), "content");
  removeInBackground(target(root.path("file.txt"), "file"));
  await vi.waitFor(async () => {
    expect(await exists(root.path("file.txt"))).toBe(false);
  });
});

test("removeInBackground() runs the step before removal", async () => {
  await using root = await tempDirectory();
  await writeFile(root.path("file.txt"), "content");
  const steps: string[] = [];
  const logger = spyLogger();
  logger.debug.mockImplementation((message: string) => steps.push(message));
  removeInBackground(target(root.path("file.txt"), "file", { logger }), () => {
    steps.push("before");
    return Promise.resolve();
  });
  await vi.waitFor(() => expect(steps).toHaveLength(2));
  expect(steps).toEqual([
    "before",
    `Removed temporary file ${root.path("file.txt")}`,
  ]);
});

test("removeInBackground() logs failures instead of throwing", async () => {
  await using root = await tempDirectory();
  const path = root.path("file.txt");
  await writeFile(path, "content");
  const logger = spyLogger();
  const fs = failingFileSystem({ unlink: () => true });
  removeInBackground(target(path, "file", { fs, logger }));
  await vi.waitFor(() => expect(logger.warn).toHaveBeenCalledTimes(1));
  expect(logger.warn.mock.calls[0]?.[0]).toBe(
    `Failed to remove temporary file ${path}`,
  );
  expect(logger.warn.mock.calls[0]?.[1]).toBeInstanceOf(TempError);
  expect(await exists(path)).toBe(true);
});

test("removeInBackground() removes the object when the step before fails", async () => {
  await using root = await tempDirectory();
  const path = root.path("file.txt");
  await writeFile(path, "content");
  const logger = spyLogger();
  removeInBackground(
    target(path, "file", { logger }),
    () => Promise.reject(new Error("busy")),
  );
  await vi.waitFor(async () => expect(await exists(path)).toBe(false));
  expect(logger.warn).toHaveBeenCalledWith(
    `Failed to close ${path}`,
    new Error("busy"),
  );
});

test("removeBlocking() removes a directory tree before returning", async () => {
  await using root = await tempDirectory();
  await mkdir(root.path("tree", "a"), { recursive: true });
  await writeFile(root.path("tree", "a", "file.txt"), "content");
  const logger = spyLogger();
  removeBlocking(target(root.path("tree"), "directory", { logger }));
  expect(await exists(root.path("tree"))).toBe(false);
  expect(logger.debug).toHaveBeenCalledWith(
    `Removed temporary directory ${root.path("tree")} on exit`,
  );
});

test("removeBlocking() logs failures instead of throwing", async () => {
  await using root = await tempDirectory();
  const path = root.path("file.txt");
  await writeFile(path, "content");
  const logger = spyLogger();
  const fs = failingFileSystem({ removeSync: () => true });
  removeBlocking(target(path, "file", { fs, logger }));
  expect(logger.warn).toHaveBeenCalledWith(
    `Failed to remove temporary file ${path} on exit`,
    new Error(`EACCES: removeSync ${path}`),
  );
  expect(await exists(path)).toBe(true);
});

test("removeCollected() warns and removes the object", async () => {
  await using root = await tempDirectory();
  const path = root.path("file.txt");
  await writeFile(path, "content");
  const logger = spyLogger();
  removeCollected(target(path, "file", { logger }));
  expect(logger.warn).toHaveBeenCalledWith(
    `Temporary file ${path} was never disposed, removing`,
  );
  await vi.waitFor(async () => expect(await exists(path)).toBe(false));
});
