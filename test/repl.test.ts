/**
 * Tests for REPL input handling.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { Clock } from "../src/clock";
import { createState, processInput, type ReplState } from "../src/repl";

let logs: string[];
let now: number;
let state: ReplState;

beforeEach(() => {
  logs = [];
  now = 0;
  state = createState(new Clock(() => now));
  vi.spyOn(console, "log").mockImplementation((message: unknown) => {
    logs.push(String(message));
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

function run(...lines: string[]): string[] {
  for (const line of lines) {
    processInput(state, line);
  }
  return logs;
}

describe("REPL Evaluation", () => {
  it("evaluates with x and t at zero", () => {
    expect(run("x + 1", "cos(t)")).toEqual(["1", "1"]);
  });

  it("ignores blank input", () => {
    expect(run("", "   ")).toEqual([]);
  });

  it("sets x and t", () => {
    expect(run(":x 2", ":t 3", "x^2 + t")).toEqual(["x = 2", "t = 3", "7"]);
  });

  it("shows the current bindings", () => {
    expect(run(":x", ":t")).toEqual(["x = 0", "t = 0"]);
  });

  it("follows the clock", () => {
    run(":t clock");
    now = 1500;
    run("t");
    now = 2000;
    run(":t reset", "t");
    expect(logs).toEqual(["t follows the clock", "1.5", "Clock reset", "0"]);
  });

  it("prints errors with a caret", () => {
    expect(run("(1+2")).toEqual(["Parse error: Expected ')' at position 4, found end of input\n  (1+2\n      ^"]);
  });

  it("prints non-finite values", () => {
    expect(run("1/x", "log(x)")).toEqual(["Infinity", "NaN"]);
  });
});

describe("REPL Modes", () => {
  it("switches modes", () => {
    expect(run(":mode format", "(1+2)*3")).toEqual(["Mode set to: format", "(1 + 2) * 3"]);
    expect(state.mode).toBe("format");
  });

  it("rejects unknown modes", () => {
    expect(run(":mode bogus")).toEqual(["Valid modes: eval, ast, tokens, format"]);
    expect(state.mode).toBe("eval");
  });

  it("shows tokens", () => {
    expect(run(":mode tokens", "x+1")).toEqual([
      "Mode set to: tokens",
      "   0  Identifier x",
      "   1  Operator   +",
      "   2  Number     1",
    ]);
  });

  it("shows the tree", () => {
    expect(run(":mode ast", "x")).toEqual(["Mode set to: ast", '{\n  "tag": "variable",\n  "name": "x"\n}']);
  });
});

describe("REPL Commands", () => {
  it("rejects unknown commands", () => {
    expect(run(":nope", ":constructor")).toEqual([
      "Unknown command: :nope. Type :help for available commands.",
      "Unknown command: :constructor. Type :help for available commands.",
    ]);
  });

  it("lists commands", () => {
    run(":help");
    expect(logs).toContain("  :table    Tabulate the last equation: :table <from> <to> <step>");
  });

  it("tabulates the last equation", () => {
    expect(run(":table 0 2 1")).toEqual(["No equation yet."]);
    logs.length = 0;
    expect(run("x^2", ":table 0 2 1")).toEqual(["0", "           0  0", "           1  1", "           2  4"]);
  });

  it("rejects bad table bounds", () => {
    const usage = "Usage: :table <from> <to> <step> with from <= to and step > 0";
    expect(run("x", ":table 2 0 1", ":table 0 1", ":table 0 1 0")).toEqual(["0", usage, usage, usage]);
  });

  it("limits the table size", () => {
    expect(run("x", ":table 0 10000 1")).toEqual(["0", "Too many rows (10001); the limit is 1000."]);
  });
});
