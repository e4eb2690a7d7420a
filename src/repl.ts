/**
 * REPL - Read-Eval-Print Loop for equations.
 */

import * as readline from "readline";
import { compile } from "./expression";
import { EquationError, formatDiagnostic, formatError } from "./errors";
import { tokenize } from "./lexer";
import { Clock } from "./clock";

// ============================================================================
// REPL Mode
// ============================================================================

type ReplMode = "eval" | "ast" | "tokens" | "format";

const MODES: readonly ReplMode[] = ["eval", "ast", "tokens", "format"];

function isReplMode(text: string): text is ReplMode {
  return MODES.some((mode) => mode === text);
}

// ============================================================================
// REPL State
// ============================================================================

export interface ReplState {
  mode: ReplMode;
  x: number;
  /** A fixed t, or "clock" to follow wall-clock seconds. */
  t: number | "clock";
  clock: Clock;
  /** Last equation evaluated in eval mode, for `:table`. */
  last: string | null;
}

export function createState(clock: Clock = new Clock()): ReplState {
  return { mode: "eval", x: 0, t: 0, clock, last: null };
}

function currentT(state: ReplState): number {
  return state.t === "clock" ? state.clock.seconds : state.t;
}

/** The largest number of rows `:table` prints. */
const MAX_TABLE_ROWS = 1000;

// ============================================================================
// Commands
// ============================================================================

type Command = { description: string; handler: (state: ReplState, args: string) => void };

function parseValue(text: string): number | null {
  const value = Number(text);
  return text.trim() !== "" && Number.isFinite(value) ? value : null;
}

const COMMANDS: Record<string, Command> = {
  help: {
    description: "Show this help message",
    handler: () => showHelp(),
  },
  x: {
    description: "Set x: :x <value>",
    handler: (state, args) => {
      const value = parseValue(args);
      if (value === null) {
        console.log(`x = ${state.x}`);
        return;
      }
      state.x = value;
      console.log(`x = ${value}`);
    },
  },
  t: {
    description: "Set t: :t <value>, :t clock to follow the clock, :t reset to restart it",
    handler: (state, args) => {
      const arg = args.trim();
      if (arg === "clock") {
        state.t = "clock";
        console.log("t follows the clock");
        return;
      }
      if (arg === "reset") {
        state.clock.reset();
        console.log("Clock reset");
        return;
      }
      const value = parseValue(arg);
      if (value === null) {
        console.log(state.t === "clock" ? `t = ${state.clock.seconds} (clock)` : `t = ${state.t}`);
        return;
      }
      state.t = value;
      console.log(`t = ${value}`);
    },
  },
  mode: {
    description: "Set mode: eval, ast, tokens, or format",
    handler: (state, args) => {
      const mode = args.trim();
      if (isReplMode(mode)) {
        state.mode = mode;
        console.log(`Mode set to: ${mode}`);
      } else {
        console.log(`Valid modes: ${MODES.join(", ")}`);
      }
    },
  },
  table: {
    description: "Tabulate the last equation: :table <from> <to> <step>",
    handler: (state, args) => showTable(state, args),
  },
  clear: {
    description: "Clear the screen",
    handler: () => {
      console.clear();
    },
  },
  exit: {
    description: "Exit the REPL",
    handler: () => {
      process.exit(0);
    },
  },
};

function showHelp(): void {
  console.log("\nCommands:");
  for (const [name, { description }] of Object.entries(COMMANDS)) {
    console.log(`  :${name.padEnd(8)} ${description}`);
  }
  console.log("\nModes:");
  console.log("  eval       Evaluate f(x, t) with the current bindings (default)");
  console.log("  ast        Show the parsed tree");
  console.log("  tokens     Show the tokens");
  console.log("  format     Show the canonical equation text");
  console.log("\nExamples:");
  console.log("  sin(x) * cos(t)");
  console.log("  2^3^2");
  console.log("  -x^2 + g");
  console.log("");
}

function showTable(state: ReplState, args: string): void {
  const source = state.last;
  if (source === null) {
    console.log("No equation yet.");
    return;
  }
  const bounds = args.trim().split(/\s+/).map(parseValue);
  const [from, to, step] = bounds;
  if (bounds.length !== 3 || from == null || to == null || step == null || step <= 0 || from > to) {
    console.log("Usage: :table <from> <to> <step> with from <= to and step > 0");
    return;
  }
  const rows = Math.floor((to - from) / step) + 1;
  if (rows > MAX_TABLE_ROWS) {
    console.log(`Too many rows (${rows}); the limit is ${MAX_TABLE_ROWS}.`);
    return;
  }
  const expression = compile(source);
  const t = currentT(state);
  for (let i = 0; i < rows; i++) {
    const x = from + i * step;
    console.log(`${String(x).padStart(12)}  ${expression.evaluate(x, t)}`);
  }
}

// ============================================================================
// Evaluation
// ============================================================================

export function processInput(state: ReplState, input: string): void {
  const trimmed = input.trim();

  // Empty input
  if (!trimmed) return;

  // Command
  if (trimmed.startsWith(":")) {
    const spaceIdx = trimmed.indexOf(" ");
    const cmdName = spaceIdx > 0 ? trimmed.slice(1, spaceIdx) : trimmed.slice(1);
    const cmdArgs = spaceIdx > 0 ? trimmed.slice(spaceIdx + 1) : "";

    const cmd = Object.hasOwn(COMMANDS, cmdName) ? COMMANDS[cmdName] : undefined;
    if (cmd) {
      cmd.handler(state, cmdArgs);
    } else {
      console.log(`Unknown command: :${cmdName}. Type :help for available commands.`);
    }
    return;
  }

  // Equation
  try {
    switch (state.mode) {
      case "eval": {
        const expression = compile(trimmed);
        state.last = trimmed;
        console.log(String(expression.evaluate(state.x, currentT(state))));
        break;
      }
      case "ast":
        console.log(JSON.stringify(compile(trimmed).root, null, 2));
        break;
      case "tokens":
        for (const tok of tokenize(trimmed)) {
          console.log(`${String(tok.position).padStart(4)}  ${tok.kind.padEnd(10)} ${tok.text}`);
        }
        break;
      case "format":
        console.log(compile(trimmed).toString());
        break;
    }
  } catch (e) {
    console.log(e instanceof EquationError ? formatDiagnostic(e, trimmed) : formatError(e));
  }
}

// ============================================================================
// Main
// ============================================================================

export function startRepl(): void {
  console.log("Equation evaluator");
  console.log("Type :help for available commands, :exit to quit\n");

  const state = createState();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });

  rl.prompt();

  rl.on("line", (line: string) => {
    processInput(state, line);
    rl.prompt();
  });

  rl.on("close", () => {
    console.log("\nGoodbye!");
    process.exit(0);
  });
}
