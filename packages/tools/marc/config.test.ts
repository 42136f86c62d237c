import { expect, test } from "vitest";
import { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.js";
import { type ConfigSources, resolveConfig } from "./config.js";

function sources(overrides: Partial<ConfigSources> = {}): ConfigSources {
  return {
    env: {},
    cwd: "/work/project/sub",
    home: "/home/test",
    isTTY: false,
    ...overrides,
  };
}

test("resolveConfig - defaults to the store in the home directory", async () => {
  const config = await resolveConfig(sources(), new InMemoryFileSystem());

  expect(config).toEqual({
    storePath: "/home/test/.marc/todos.json",
    logLevel: "warn",
    color: false,
  });
});

test("resolveConfig - nearest workspace store above cwd", async () => {
  const fs = new InMemoryFileSystem();
  fs.setFile("/work/.marc/todos.json", "{}");

  const config = await resolveConfig(sources(), fs);

  expect(config.storePath).toBe("/work/.marc/todos.json");
});

test("resolveConfig - MARC_FILE beats workspace discovery", async () => {
  const fs = new InMemoryFileSystem();
  fs.setFile("/work/.marc/todos.json", "{}");

  const config = await resolveConfig(
    sources({ env: { MARC_FILE: "notes.json" } }),
    fs,
  );

  expect(config.storePath).toBe("/work/project/sub/notes.json");
});

test("resolveConfig - --file beats MARC_FILE", async () => {
  const config = await resolveConfig(
    sources({ file: "/tmp/mine.json", env: { MARC_FILE: "/tmp/env.json" } }),
    new InMemoryFileSystem(),
  );

  expect(config.storePath).toBe("/tmp/mine.json");
});

test("resolveConfig - log level from MARC_LOG_LEVEL", async () => {
  const config = await resolveConfig(
    sources({ env: { MARC_LOG_LEVEL: "debug" } }),
    new InMemoryFileSystem(),
  );

  expect(config.logLevel).toBe("debug");
});

test("resolveConfig - invalid log level is an argument error", async () => {
  await expect(
    resolveConfig(
      sources({ env: { MARC_LOG_LEVEL: "loud" } }),
      new InMemoryFileSystem(),
    ),
  ).rejects.toMatchObject({ code: "invalid_args" });
});

test("resolveConfig - colour needs a terminal and no opt-out", async () => {
  const fs = new InMemoryFileSystem();

  expect((await resolveConfig(sources({ isTTY: true }), fs)).color).toBe(true);
  expect(
    (await resolveConfig(sources({ isTTY: true, color: false }), fs)).color,
  ).toBe(false);
  expect(
    (await resolveConfig(sources({ isTTY: true, env: { NO_COLOR: "1" } }), fs))
      .color,
  ).toBe(false);
});
