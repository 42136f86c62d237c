#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import { Chalk, type ChalkInstance } from "chalk";
import { Command, CommanderError } from "commander";
import type { Logger } from "pino";
import { MarcError } from "./domain/entities/errors.js";
import type { TodoRecord } from "./domain/entities/todo.js";
import type { EditorView } from "./domain/ports/editor-view.js";
import type { FileSystem } from "./domain/ports/filesystem.js";
import type { TodoRepository } from "./domain/ports/todo-repository.js";
import { AddTodosUseCase } from "./domain/use-cases/add-todos.js";
import { CompleteTodosUseCase } from "./domain/use-cases/complete-todos.js";
import { EditTodosUseCase } from "./domain/use-cases/edit-todos.js";
import { LogTodosUseCase } from "./domain/use-cases/log-todos.js";
import { ManageTagsUseCase } from "./domain/use-cases/manage-tags.js";
import { RemoveTodosUseCase } from "./domain/use-cases/remove-todos.js";
import {
  formatAdd,
  formatComplete,
  formatEdit,
  formatError,
  formatLog,
  formatRemove,
  formatTagCreate,
  formatTagPrune,
  formatTagRename,
  formatTags,
  formatTodos,
} from "./adapters/cli/formatter.js";
import { ReadlineEditorView } from "./adapters/editor/readline-editor-view.js";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.js";
import { JsonTodoRepository } from "./adapters/repositories/json-todo-repo.js";
import { resolveConfig } from "./config.js";
import { createRootLogger, type LogLevel } from "./logger.js";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.2.0";

// ============================================================================
// Context
// ============================================================================

/**
 * Everything the CLI touches outside its own process state.
 * Tests swap in an in-memory file system and captured output.
 */
export interface CliContext {
  readonly fs: FileSystem;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly cwd: string;
  readonly home: string;
  /** Whether stdout is a terminal (enables colours). */
  readonly isTTY: boolean;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Non-empty trimmed stdin lines, or null when stdin is a terminal. */
  readonly readStdin: () => Promise<string[] | null>;
  readonly createEditorView: (
    render: (todos: readonly TodoRecord[]) => string,
  ) => EditorView;
  readonly createLogger: (level: LogLevel) => Logger;
  readonly generateId?: () => string;
  readonly getTimestamp?: () => string;
}

async function readStdinLines(stdin: NodeJS.ReadStream): Promise<string[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks)
    .toString("utf-8")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function createDefaultContext(): CliContext {
  return {
    fs: new NodeFileSystem(),
    env: process.env,
    cwd: process.cwd(),
    home: homedir(),
    isTTY: process.stdout.isTTY === true,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readStdin: () =>
      process.stdin.isTTY
        ? Promise.resolve(null)
        : readStdinLines(process.stdin),
    createEditorView: (render) =>
      new ReadlineEditorView(process.stdin, process.stdout, render),
    createLogger: createRootLogger,
  };
}

// ============================================================================
// Option types
// ============================================================================

type GlobalOptions = {
  file?: string;
  color: boolean;
};

interface JsonOption {
  json?: boolean;
}

interface AddOptions extends JsonOption {
  tag?: string;
  meta: string[];
}

interface LogOptions extends JsonOption {
  tag?: string;
  done?: boolean;
  undone?: boolean;
}

interface DoneOptions extends JsonOption {
  undo?: boolean;
}

interface RemoveOptions extends JsonOption {
  done?: boolean;
}

interface TagOptions extends JsonOption {
  create?: string;
  prune?: boolean;
  rename?: string;
  to?: string;
}

// ============================================================================
// Helpers
// ============================================================================

interface Services {
  readonly logger: Logger;
  readonly todoRepo: TodoRepository;
  readonly chalk: ChalkInstance;
}

interface CliState {
  exitCode: number;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse --meta key=value into record
 */
export function parseMetaOption(
  values: readonly string[],
): Record<string, string> | undefined {
  if (values.length === 0) return undefined;
  const meta: Record<string, string> = {};
  for (const kv of values) {
    const eqIndex = kv.indexOf("=");
    if (eqIndex <= 0) {
      throw new MarcError(
        "invalid_args",
        `Invalid --meta '${kv}': expected key=value`,
      );
    }
    meta[kv.slice(0, eqIndex)] = kv.slice(eqIndex + 1);
  }
  return meta;
}

/**
 * Map --done / --no-done / --undone to a completion filter.
 * Asking for both done and pending records means no filter.
 */
export function doneFilter(options: LogOptions): boolean | undefined {
  const wantDone = options.done === true;
  const wantPending = options.undone === true || options.done === false;
  if (wantDone === wantPending) return undefined;
  return wantDone;
}

function handleError(
  e: unknown,
  json: boolean,
  context: CliContext,
  state: CliState,
): void {
  if (e instanceof MarcError) {
    context.stderr(
      (json ? JSON.stringify(e.toJSON()) : formatError(e)) + "\n",
    );
    state.exitCode = 1;
    return;
  }
  throw e;
}

// ============================================================================
// CLI with Commander
// ============================================================================

function createCli(context: CliContext, state: CliState): Command {
  const print = (text: string) => context.stdout(text + "\n");

  /**
   * Resolve configuration for the invoked command, run it, and report
   * MarcErrors on stderr.
   */
  async function run(
    command: Command,
    json: boolean,
    body: (services: Services) => Promise<string | object>,
  ): Promise<void> {
    try {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const config = await resolveConfig(
        {
          file: globals.file,
          color: globals.color,
          env: context.env,
          cwd: context.cwd,
          home: context.home,
          isTTY: context.isTTY,
        },
        context.fs,
      );
      const logger = context.createLogger(config.logLevel);
      logger.debug(
        { command: command.name(), store: config.storePath },
        "running command",
      );

      const services: Services = {
        logger,
        todoRepo: new JsonTodoRepository(
          context.fs,
          config.storePath,
          logger.child({ component: "repo" }),
        ),
        chalk: new Chalk({ level: config.color ? 1 : 0 }),
      };

      const output = await body(services);
      print(typeof output === "string" ? output : JSON.stringify(output));
    } catch (e) {
      handleError(e, json, context, state);
    }
  }

  const program = new Command()
    .name("marc")
    .version(VERSION, "-v, --version", "Show the version number")
    .description(
      "Marc - Keep a small list of todos and annotations\n\n" +
        "Core workflow:\n" +
        '  1. marc add "buy milk" -t errand   # Add todos (one per argument)\n' +
        "  2. marc log [-t errand]            # List them, with their index\n" +
        "  3. marc done <selector>            # Mark one done\n" +
        "  4. marc rm --done                  # Clear completed todos\n\n" +
        "A selector is an index from 'marc log', an ID prefix, or part of the content.\n\n" +
        "See 'marc <command> --help' for details",
    )
    .option("-f, --file <path>", "Path to the todo store")
    .option("--no-color", "Disable coloured output")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => context.stdout(str),
      writeErr: (str) => context.stderr(str),
    });

  program
    .command("add")
    .description(
      "Add todos, one per argument (reads lines from stdin when piped or given '-')",
    )
    .argument("[contents...]", "Todo contents")
    .option("-t, --tag <name>", "Tag the new todos")
    .option(
      "-m, --meta <key=value>",
      "Extra attribute (repeatable)",
      collect,
      [],
    )
    .option("--json", "Output as JSON")
    .action(
      async (contentArgs: string[], options: AddOptions, command: Command) => {
        await run(command, options.json ?? false, async ({ todoRepo }) => {
          let contents = contentArgs;
          if (contents.length === 0 || contents.includes("-")) {
            const lines = await context.readStdin() ?? [];
            contents = contents.length === 0
              ? lines
              : contents.flatMap((c) => (c === "-" ? lines : [c]));
          }

          const output = await new AddTodosUseCase({
            todoRepo,
            generateId: context.generateId,
            getTimestamp: context.getTimestamp,
          }).execute({
            contents,
            tag: options.tag,
            metadata: parseMetaOption(options.meta),
          });
          return options.json ? output : formatAdd(output);
        });
      },
    );

  program
    .command("log")
    .alias("ls")
    .description("List todos in insertion order")
    .option("-t, --tag <name>", "Only todos with this tag")
    .option("-d, --done", "Only completed todos")
    .option("--no-done", "Only pending todos")
    .option("-u, --undone", "Only pending todos")
    .option("--json", "Output as JSON")
    .action(async (options: LogOptions, command: Command) => {
      await run(
        command,
        options.json ?? false,
        async ({ todoRepo, chalk }) => {
          const output = await new LogTodosUseCase(todoRepo).execute({
            tag: options.tag,
            done: doneFilter(options),
          });
          return options.json ? output : formatLog(output, chalk);
        },
      );
    });

  program
    .command("done")
    .description("Mark todos done")
    .argument("<selectors...>", "Index, ID prefix or content of the todos")
    .option("--undo", "Mark the todos pending again")
    .option("--json", "Output as JSON")
    .action(
      async (selectors: string[], options: DoneOptions, command: Command) => {
        await run(command, options.json ?? false, async ({ todoRepo }) => {
          const output = await new CompleteTodosUseCase({
            todoRepo,
            getTimestamp: context.getTimestamp,
          }).execute({ selectors, undo: options.undo });
          return options.json ? output : formatComplete(output);
        });
      },
    );

  program
    .command("rm")
    .description("Remove todos, or every completed todo with --done")
    .argument("[selectors...]", "Index, ID prefix or content of the todos")
    .option("-d, --done", "Remove all completed todos")
    .option("--json", "Output as JSON")
    .action(
      async (selectors: string[], options: RemoveOptions, command: Command) => {
        await run(command, options.json ?? false, async ({ todoRepo }) => {
          const output = await new RemoveTodosUseCase(todoRepo).execute({
            selectors,
            done: options.done,
          });
          return options.json ? output : formatRemove(output);
        });
      },
    );

  program
    .command("edit")
    .description("Edit todos interactively (h for help inside)")
    .action(async (_options: JsonOption, command: Command) => {
      await run(command, false, async ({ todoRepo, chalk, logger }) => {
        const view = context.createEditorView((todos) =>
          formatTodos(todos, chalk)
        );
        const output = await new EditTodosUseCase({
          todoRepo,
          view,
          getTimestamp: context.getTimestamp,
        }).execute();
        logger.debug({ ...output }, "editor session finished");
        return formatEdit(output);
      });
    });

  program
    .command("tag")
    .description("List tags with their todo counts, or manage them")
    .option("-c, --create <name>", "Declare a tag")
    .option("-p, --prune", "Delete tags no todo uses")
    .option("--rename <old>", "Rename a tag (with --to)")
    .option("--to <new>", "New name for --rename")
    .option("--json", "Output as JSON")
    .action(async (options: TagOptions, command: Command) => {
      await run(command, options.json ?? false, async ({ todoRepo }) => {
        const tags = new ManageTagsUseCase(todoRepo);
        const actions = [
          options.create !== undefined,
          options.prune === true,
          options.rename !== undefined,
        ].filter(Boolean).length;

        if (actions > 1) {
          throw new MarcError(
            "invalid_args",
            "Use only one of --create, --prune and --rename",
          );
        }
        if ((options.rename === undefined) !== (options.to === undefined)) {
          throw new MarcError(
            "invalid_args",
            "--rename and --to go together",
          );
        }

        if (options.create !== undefined) {
          const output = await tags.create(options.create);
          return options.json ? output : formatTagCreate(output);
        }
        if (options.prune) {
          const output = await tags.prune();
          return options.json ? output : formatTagPrune(output);
        }
        if (options.rename !== undefined && options.to !== undefined) {
          const output = await tags.rename({
            oldTag: options.rename,
            newTag: options.to,
          });
          return options.json ? output : formatTagRename(output);
        }
        const output = await tags.list();
        return options.json ? output : formatTags(output);
      });
    });

  return program;
}

// ============================================================================
// Main CLI
// ============================================================================

/**
 * Run the CLI with user arguments (no program name). Resolves to the exit
 * code.
 */
export async function main(
  args: string[],
  context: CliContext = createDefaultContext(),
): Promise<number> {
  const state: CliState = { exitCode: 0 };
  const program = createCli(context, state);

  // Show help when no arguments provided
  if (args.length === 0) {
    context.stdout(program.helpInformation());
    return 0;
  }

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    throw e;
  }
  return state.exitCode;
}

/**
 * Entry point wrapper: anything main() lets through is an unexpected
 * failure, logged on the diagnostics logger with exit code 1.
 */
export async function runMain(
  args: string[],
  context: CliContext,
  logger: Logger,
): Promise<number> {
  try {
    return await main(args, context);
  } catch (e) {
    logger.fatal({ err: e }, "unexpected error");
    return 1;
  }
}

function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(moduleUrl);
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint(import.meta.url)) {
  process.exitCode = await runMain(
    process.argv.slice(2),
    createDefaultContext(),
    createRootLogger("error"),
  );
}
