/**
 * Command-line interface: plot an equation to SVG, or print its value.
 *
 * Usage:
 *   eqplot <equation> [options]
 *   eqplot --repl
 *   eqplot --help
 */

import * as fs from "fs";
import * as path from "path";
import { type Expression, compile } from "./expression";
import { EquationError, formatDiagnostic, formatError } from "./errors";
import { tokenize } from "./lexer";
import { type SavedPoint, savePoint } from "./sample";
import { renderSvg } from "./svg";
import { type Interval, Viewport, parseInterval } from "./viewport";
import { startRepl } from "./repl";

export interface CliOptions {
  equation: string;
  domain: Interval;
  range: Interval;
  /** Gridline spacing; no grid when null. */
  step: number | null;
  axis: boolean;
  precision: number;
  time: number;
  width: number;
  height: number;
  /** Print f(at, t) instead of rendering. */
  at: number | null;
  /** x positions of points to mark on the curve. */
  save: number[];
  outputFile: string | null;
  debug: boolean;
  repl: boolean;
  help: boolean;
}

export const DEFAULT_OPTIONS: Readonly<Omit<CliOptions, "equation">> = {
  domain: [-1, 1],
  range: [-1, 1],
  step: null,
  axis: true,
  precision: 2,
  time: 0,
  width: 900,
  height: 900,
  at: null,
  save: [],
  outputFile: null,
  debug: false,
  repl: false,
  help: false,
};

export function printHelp(): void {
  console.log(`
eqplot - plot y = f(x, t)

Usage:
  eqplot <equation> [options]
  eqplot --repl

Options:
  -d, --domain "[a, b]"  Initial domain (default: [-1, 1])
  -r, --range "[a, b]"   Initial range (default: [-1, 1])
  -s, --step <n>         Draw gridlines every n units
  -a, --noaxis           Don't draw the axes
  -p, --precision <n>    Decimals in labels (default: 2)
  -t, --time <t>         Value of t (default: 0)
  -W, --width <px>       Image width (default: 900)
  -H, --height <px>      Image height (default: 900)
      --at <x>           Print f(x, t) instead of plotting
      --save <x>         Mark the point at x (repeatable)
  -o, --output <file>    Output file path (default: stdout)
      --debug            Log tokens, the parsed tree and sample counts
      --repl             Start the interactive evaluator
  -h, --help             Show this help

Equations use x, t, pi, e, g, + - * / % ^ and
sin cos tan asin acos atan sinh cosh tanh asinh acosh atanh
rad deg log abs round sign. Use -- before an equation starting with '-'.

Examples:
  eqplot "sin(x * pi)" -d "[-2, 2]" -s 0.5 -o sine.svg
  eqplot "x^2 - 1" --at 3
  eqplot -- "-x^2" -r "[-4, 1]"
`);
}

// ============================================================================
// Argument Parsing
// ============================================================================

/** Options that take a value, by every spelling. */
const VALUE_OPTIONS = new Set([
  "-d", "--domain", "-r", "--range", "-s", "--step", "-p", "--precision", "-t", "--time",
  "-W", "--width", "-H", "--height", "--at", "--save", "-o", "--output",
]);

const FLAG_OPTIONS = new Set(["-a", "--noaxis", "--debug", "--repl", "-h", "--help"]);

// "-x^2" is an equation, "-x" or "--foo" is an option
function looksLikeOption(arg: string): boolean {
  return /^--?[A-Za-z][A-Za-z-]*$/.test(arg);
}

function parseNumber(option: string, text: string): number | null {
  const value = Number(text);
  if (text.trim() === "" || !Number.isFinite(value)) {
    console.error(`Error: ${option} expects a number, got '${text}'`);
    return null;
  }
  return value;
}

function parsePositiveInteger(option: string, text: string): number | null {
  const value = parseNumber(option, text);
  if (value === null) return null;
  if (!Number.isInteger(value) || value <= 0) {
    console.error(`Error: ${option} expects a positive integer, got '${text}'`);
    return null;
  }
  return value;
}

/**
 * Parse command-line arguments. Problems are reported on stderr and give null.
 */
export function parseArgs(args: string[]): CliOptions | null {
  const options: CliOptions = { ...DEFAULT_OPTIONS, save: [], equation: "" };
  let equation: string | null = null;
  let optionsEnded = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (!optionsEnded && arg === "--") {
      optionsEnded = true;
    } else if (!optionsEnded && FLAG_OPTIONS.has(arg)) {
      if (arg === "-a" || arg === "--noaxis") options.axis = false;
      else if (arg === "--debug") options.debug = true;
      else if (arg === "--repl") options.repl = true;
      else options.help = true;
    } else if (!optionsEnded && VALUE_OPTIONS.has(arg)) {
      i++;
      if (i >= args.length) {
        console.error(`Error: ${arg} requires a value`);
        return null;
      }
      if (!applyValueOption(options, arg, args[i])) {
        return null;
      }
    } else if (!optionsEnded && looksLikeOption(arg)) {
      console.error(`Error: Unknown option: ${arg}`);
      return null;
    } else {
      if (equation !== null) {
        console.error("Error: Multiple equations not supported");
        return null;
      }
      equation = arg;
    }
    i++;
  }

  if (equation === null) {
    if (options.help || options.repl) {
      return options;
    }
    console.error("Error: No equation specified");
    return null;
  }

  options.equation = equation.toLowerCase();
  return options;
}

function applyValueOption(options: CliOptions, option: string, value: string): boolean {
  switch (option) {
    case "-d":
    case "--domain":
    case "-r":
    case "--range": {
      const interval = parseInterval(value);
      if (interval === null) {
        console.error(`Error: Invalid ${option} format: ${value}`);
        return false;
      }
      if (option === "-d" || option === "--domain") options.domain = interval;
      else options.range = interval;
      return true;
    }
    case "-s":
    case "--step": {
      const step = parseNumber(option, value);
      if (step === null) return false;
      if (step <= 0) {
        console.error("Error: Grid step must be positive.");
        return false;
      }
      options.step = step;
      return true;
    }
    case "-p":
    case "--precision": {
      const precision = parseNumber(option, value);
      if (precision === null) return false;
      if (!Number.isInteger(precision) || precision < 0 || precision > 100) {
        console.error("Error: Precision must be an integer from 0 to 100.");
        return false;
      }
      options.precision = precision;
      return true;
    }
    case "-t":
    case "--time": {
      const time = parseNumber(option, value);
      if (time === null) return false;
      options.time = time;
      return true;
    }
    case "-W":
    case "--width":
    case "-H":
    case "--height": {
      const size = parsePositiveInteger(option, value);
      if (size === null) return false;
      if (option === "-W" || option === "--width") options.width = size;
      else options.height = size;
      return true;
    }
    case "--at": {
      const at = parseNumber(option, value);
      if (at === null) return false;
      options.at = at;
      return true;
    }
    case "--save": {
      const x = parseNumber(option, value);
      if (x === null) return false;
      options.save.push(x);
      return true;
    }
    case "-o":
    case "--output":
      options.outputFile = value;
      return true;
    default:
      console.error(`Error: Unknown option: ${option}`);
      return false;
  }
}

// ============================================================================
// Main
// ============================================================================

/**
 * Run the CLI and return the process exit code.
 */
export function main(args: string[]): number {
  if (args.length === 0) {
    printHelp();
    return 1;
  }

  const options = parseArgs(args);
  if (!options) {
    return 1;
  }
  if (options.help) {
    printHelp();
    return 0;
  }
  if (options.repl) {
    startRepl();
    return 0;
  }

  const debug = (message: string): void => {
    if (options.debug) {
      console.error(`[debug] ${message}`);
    }
  };

  let expression: Expression;
  try {
    debug(`tokens: ${tokenize(options.equation).map((tok) => tok.text).join(" ")}`);
    expression = compile(options.equation);
  } catch (err) {
    console.error(err instanceof EquationError ? formatDiagnostic(err, options.equation) : formatError(err));
    return 1;
  }
  debug(`tree: ${JSON.stringify(expression.root)}`);
  debug(`canonical: ${expression.toString()}`);

  if (options.at !== null) {
    process.stdout.write(`${expression.evaluate(options.at, options.time)}\n`);
    return 0;
  }

  const saved: SavedPoint[] = options.save.map((x) => savePoint(expression, x, options.time));
  let output: string;
  try {
    const viewport = new Viewport(options.domain, options.range);
    output = renderSvg(expression, viewport, {
      width: options.width,
      height: options.height,
      t: options.time,
      step: options.step,
      axis: options.axis,
      precision: options.precision,
      saved,
    });
  } catch (err) {
    console.error(formatError(err));
    return 1;
  }
  debug(`rendered ${options.width} samples at t = ${options.time}`);

  if (options.outputFile) {
    const outputPath = path.resolve(options.outputFile);
    try {
      fs.writeFileSync(outputPath, output);
      console.error(`Plotted ${options.equation} -> ${options.outputFile}`);
    } catch (err) {
      console.error(`Error writing file: ${outputPath}`);
      if (err instanceof Error) {
        console.error(err.message);
      }
      return 1;
    }
  } else {
    process.stdout.write(output);
  }

  return 0;
}
