import { expect, test } from "vitest";
import { CompleteTodosUseCase } from "./complete-todos.js";
import { RemoveTodosUseCase } from "./remove-todos.js";
import { createMockTodoRepo, NOW, todo } from "./test-helpers.js";

function seed() {
  return createMockTodoRepo([
    todo("c000001", "buy milk"),
    todo("c000002", "write report"),
    todo("c000003", "post letter", {
      done: true,
      done_at: "2026-01-01T08:00:00+00:00",
    }),
  ]);
}

test("CompleteTodosUseCase - marks the selected record done", async () => {
  const repo = seed();
  const useCase = new CompleteTodosUseCase({
    todoRepo: repo,
    getTimestamp: () => NOW,
  });

  const output = await useCase.execute({ selectors: ["2"] });

  expect(output.status).toBe("todo_done");
  expect(output.todos.map((t) => t.id)).toEqual(["c000002"]);
  expect(repo.store.todos[1]).toMatchObject({ done: true, done_at: NOW });
  expect(repo.store.todos[0].done).toBe(false);
});

test("CompleteTodosUseCase - handles several selectors", async () => {
  const repo = seed();
  const useCase = new CompleteTodosUseCase({
    todoRepo: repo,
    getTimestamp: () => NOW,
  });

  await useCase.execute({ selectors: ["milk", "c000002"] });

  expect(repo.store.todos.map((t) => t.done)).toEqual([true, true, true]);
  expect(repo.saves).toBe(1);
});

test("CompleteTodosUseCase - already done keeps its timestamp", async () => {
  const repo = seed();
  const useCase = new CompleteTodosUseCase({
    todoRepo: repo,
    getTimestamp: () => NOW,
  });

  const output = await useCase.execute({ selectors: ["3"] });

  expect(output.todos[0].done_at).toBe("2026-01-01T08:00:00+00:00");
  expect(repo.saves).toBe(0);
});

test("CompleteTodosUseCase - undo clears the flag", async () => {
  const repo = seed();
  const useCase = new CompleteTodosUseCase({
    todoRepo: repo,
    getTimestamp: () => NOW,
  });

  const output = await useCase.execute({ selectors: ["letter"], undo: true });

  expect(output.status).toBe("todo_undone");
  expect(repo.store.todos[2]).toMatchObject({ done: false, done_at: null });
});

test("CompleteTodosUseCase - unknown selector changes nothing", async () => {
  const repo = seed();
  const useCase = new CompleteTodosUseCase({ todoRepo: repo });

  await expect(useCase.execute({ selectors: ["1", "9"] })).rejects
    .toMatchObject({ code: "todo_not_found" });
  expect(repo.saves).toBe(0);
  expect(repo.store.todos[0].done).toBe(false);
});

test("CompleteTodosUseCase - requires a selector", async () => {
  const useCase = new CompleteTodosUseCase({ todoRepo: seed() });
  await expect(useCase.execute({ selectors: [] })).rejects.toMatchObject({
    code: "invalid_args",
  });
});

test("CompleteTodosUseCase - done then rm --done removes exactly that record", async () => {
  const repo = createMockTodoRepo([
    todo("d000001", "one"),
    todo("d000002", "two"),
    todo("d000003", "three"),
  ]);

  await new CompleteTodosUseCase({ todoRepo: repo, getTimestamp: () => NOW })
    .execute({ selectors: ["two"] });
  const output = await new RemoveTodosUseCase(repo).execute({
    selectors: [],
    done: true,
  });

  expect(output.removed.map((t) => t.id)).toEqual(["d000002"]);
  expect(repo.store.todos.map((t) => t.id)).toEqual(["d000001", "d000003"]);
});
