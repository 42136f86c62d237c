import { expect, test } from "vitest";
import { MarcError } from "../entities/errors.js";
import {
  EDITOR_HELP,
  EditTodosUseCase,
  parseEditCommand,
} from "./edit-todos.js";
import {
  createMockTodoRepo,
  createScriptedView,
  NOW,
  todo,
} from "./test-helpers.js";

function seed() {
  return createMockTodoRepo([
    todo("e000001", "buy milk", { tag: "errand" }),
    todo("e000002", "write report"),
  ], ["errand"]);
}

function editor(lines: string[]) {
  const repo = seed();
  const script = createScriptedView(lines);
  const useCase = new EditTodosUseCase({
    todoRepo: repo,
    view: script.view,
    getTimestamp: () => NOW,
  });
  return { repo, script, useCase };
}

// --- parseEditCommand ---

test("parseEditCommand - short and long forms", () => {
  expect(parseEditCommand("d 1")).toEqual({ kind: "drop", selector: "1" });
  expect(parseEditCommand("done milk")).toEqual({
    kind: "toggle",
    selector: "milk",
  });
  expect(parseEditCommand("Q!")).toEqual({ kind: "abort" });
  expect(parseEditCommand("?")).toEqual({ kind: "help" });
});

test("parseEditCommand - edit keeps inner spacing of the new text", () => {
  expect(parseEditCommand("e 2   two  spaces ")).toEqual({
    kind: "content",
    selector: "2",
    content: "two  spaces",
  });
});

test("parseEditCommand - tag with and without a value", () => {
  expect(parseEditCommand("t 1 home")).toEqual({
    kind: "tag",
    selector: "1",
    tag: "home",
  });
  expect(parseEditCommand("t 1")).toEqual({ kind: "tag", selector: "1" });
});

test("parseEditCommand - blank line is ignored", () => {
  expect(parseEditCommand("   ")).toBeNull();
});

test("parseEditCommand - unknown command and missing selector", () => {
  expect(() => parseEditCommand("zz")).toThrow(
    "Unknown command: zz (h for help)",
  );
  expect(() => parseEditCommand("d")).toThrow("Missing selector for 'drop'");
});

// --- EditTodosUseCase ---

test("EditTodosUseCase - drop then end of input saves", async () => {
  const { repo, script, useCase } = editor(["d 1"]);

  const output = await useCase.execute();

  expect(output).toEqual({ status: "saved", dropped: 1, updated: 0 });
  expect(repo.store.todos.map((t) => t.id)).toEqual(["e000002"]);
  expect(script.shown).toEqual([
    ["buy milk", "write report"],
    ["write report"],
  ]);
  expect(script.closed()).toBe(true);
});

test("EditTodosUseCase - toggle marks done with a timestamp", async () => {
  const { repo, useCase } = editor(["x report", "q"]);

  const output = await useCase.execute();

  expect(output).toEqual({ status: "saved", dropped: 0, updated: 1 });
  expect(repo.store.todos[1]).toMatchObject({ done: true, done_at: NOW });
});

test("EditTodosUseCase - edit replaces the content", async () => {
  const { repo, useCase } = editor(["e 1 buy oat milk", "q"]);

  await useCase.execute();

  expect(repo.store.todos[0].content).toBe("buy oat milk");
  expect(repo.store.todos[0].tag).toBe("errand");
});

test("EditTodosUseCase - tag sets and clears the tag", async () => {
  const { repo, useCase } = editor(["t 2 work", "t 1", "q"]);

  const output = await useCase.execute();

  expect(output.updated).toBe(2);
  expect(repo.store.todos.map((t) => t.tag)).toEqual([undefined, "work"]);
  expect(repo.store.tags).toEqual(["errand", "work"]);
});

test("EditTodosUseCase - abort discards changes", async () => {
  const { repo, useCase } = editor(["d 1", "q!"]);

  const output = await useCase.execute();

  expect(output.status).toBe("discarded");
  expect(repo.saves).toBe(0);
  expect(repo.store.todos.length).toBe(2);
});

test("EditTodosUseCase - errors are reported and the loop continues", async () => {
  const { repo, script, useCase } = editor(["zz", "d 9", "e 1", "d 2", "q"]);

  const output = await useCase.execute();

  expect(script.messages).toEqual([
    "error: Unknown command: zz (h for help)",
    "error: No todo found matching: 9",
    "error: Todo content cannot be empty",
  ]);
  expect(output).toEqual({ status: "saved", dropped: 1, updated: 0 });
  expect(repo.store.todos.map((t) => t.id)).toEqual(["e000001"]);
});

test("EditTodosUseCase - help, list and quit without changes", async () => {
  const { repo, script, useCase } = editor(["h", "l", "", "quit"]);

  const output = await useCase.execute();

  expect(output).toEqual({ status: "unchanged", dropped: 0, updated: 0 });
  expect(script.messages).toEqual([EDITOR_HELP]);
  expect(script.shown.length).toBe(2);
  expect(repo.saves).toBe(0);
});

test("EditTodosUseCase - closes the view when the store fails to load", async () => {
  const script = createScriptedView(["q"]);
  const useCase = new EditTodosUseCase({
    todoRepo: {
      load: () =>
        Promise.reject(new MarcError("invalid_store", "Store is not valid JSON")),
      save: () => Promise.resolve(),
      exists: () => Promise.resolve(true),
    },
    view: script.view,
  });

  await expect(useCase.execute()).rejects.toThrow("Store is not valid JSON");
  expect(script.closed()).toBe(true);
  expect(script.shown).toEqual([]);
});
