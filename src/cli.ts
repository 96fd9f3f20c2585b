#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements argument parsing for xpresso.
 * Tokenizes and parses one X-presso source file and reports diagnostics.
 */

import {
  formatSnippet,
  formatToken,
  readVersion,
  serializeDiagnostic,
  serializeToken,
  serializeTree,
} from './cli-shared.js';
import {
  isOutputFormat,
  loadConfig,
  type OutputFormat,
  type XpressoConfig,
} from './config.js';
import { type Diagnostic, DiagnosticSink } from './diagnostics.js';
import { ERROR_REGISTRY } from './error-registry.js';
import { significantTokens, tokenize } from './lexer/index.js';
import { parseTokens } from './parser/index.js';
import { readSourceFile } from './source.js';
import { type ParseTreeNode, renderTree } from './tree.js';
import {
  SourceReadError,
  type Token,
  UsageError,
  XpressoError,
} from './types.js';

/**
 * Parsed command-line arguments for xpresso. Unset options fall back to
 * the configuration file.
 */
export type ParsedArgs =
  | {
      mode: 'check';
      file: string;
      verbose: boolean | undefined;
      output: OutputFormat | undefined;
      tokens: boolean;
      tree: boolean;
      configDir: string | undefined;
    }
  | { mode: 'help' }
  | { mode: 'version' };

export const HELP_TEXT = `xpresso - Check X-presso source files

Usage: xpresso [options] <file>

Options:
  --output=<fmt>  Output format: text (default) or json
  --tokens        Include the token stream
  --tree          Include the parse tree
  --verbose       Show source lines, tokens and the parse tree
  --config <dir>  Directory holding .xpresso.yml (default: current directory)
  -h, --help      Show this help message
  -v, --version   Show version number`;

/** Split `--flag=value` into flag and value */
function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * Parse command-line arguments for xpresso
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws {UsageError} On unknown options, missing values or a missing file
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let verbose: boolean | undefined;
  let output: OutputFormat | undefined;
  let tokens = false;
  let tree = false;
  let configDir: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-')) {
      if (file !== undefined) {
        throw new UsageError(`Unexpected argument: ${arg}`);
      }
      file = arg;
      continue;
    }

    const [flag, inline] = splitFlag(arg);
    switch (flag) {
      case '--verbose':
        verbose = true;
        break;
      case '--tokens':
        tokens = true;
        break;
      case '--tree':
        tree = true;
        break;
      case '--output': {
        const value = inline ?? argv[++i];
        if (value === undefined || value.startsWith('-')) {
          throw new UsageError('--output requires argument: text or json');
        }
        if (!isOutputFormat(value)) {
          throw new UsageError(
            `Invalid output format: ${value}. Expected text or json`
          );
        }
        output = value;
        break;
      }
      case '--config': {
        const value = inline ?? argv[++i];
        if (value === undefined || value.startsWith('-')) {
          throw new UsageError('--config requires a directory argument');
        }
        configDir = value;
        break;
      }
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new UsageError('Missing file argument');
  }

  return { mode: 'check', file, verbose, output, tokens, tree, configDir };
}

// ============================================================
// REPORT
// ============================================================

export interface CheckReport {
  readonly file: string;
  readonly source: string;
  readonly diagnostics: readonly Diagnostic[];
  /** Present when the token dump was requested */
  readonly tokens?: readonly Token[] | undefined;
  /** Present when the tree was requested */
  readonly tree?: ParseTreeNode | undefined;
}

export interface DiagnosticSummary {
  readonly total: number;
  readonly lexical: number;
  readonly syntax: number;
  /** Counts per kind, in first-reported order */
  readonly byKind: Record<string, number>;
}

export function summarize(
  diagnostics: readonly Diagnostic[]
): DiagnosticSummary {
  const byKind: Record<string, number> = {};
  for (const d of diagnostics) {
    byKind[d.kind] = (byKind[d.kind] ?? 0) + 1;
  }
  return {
    total: diagnostics.length,
    lexical: diagnostics.filter((d) => d.phase === 'lexical').length,
    syntax: diagnostics.filter((d) => d.phase === 'syntax').length,
    byKind,
  };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format a check report for output
 *
 * Text format: file:line:col: phase error [CODE] KIND: message
 * JSON format: file, diagnostics, summary, and tokens/tree when present
 * Verbose mode: adds the source line and a caret under the column
 */
export function formatDiagnostics(
  report: CheckReport,
  format: OutputFormat,
  verbose: boolean
): string {
  if (format === 'json') {
    return formatDiagnosticsJSON(report);
  }
  return formatDiagnosticsText(report, verbose);
}

/** One line per diagnostic, a suggestion line, then the summary */
function formatDiagnosticsText(report: CheckReport, verbose: boolean): string {
  const lines: string[] = [];

  for (const d of report.diagnostics) {
    lines.push(
      `${report.file}:${d.line}:${d.column}: ${d.phase} error [${d.code}] ${d.kind}: ${d.message}`
    );
    if (verbose) lines.push(...formatSnippet(report.source, d.line, d.column));
    if (d.suggestion !== undefined) {
      lines.push(`  suggestion: ${d.suggestion}`);
    }
  }

  if (report.tokens !== undefined) {
    lines.push('Tokens:');
    for (const token of report.tokens) lines.push(`  ${formatToken(token)}`);
  }
  if (report.tree !== undefined) {
    lines.push('Parse tree:');
    lines.push(renderTree(report.tree));
  }

  lines.push(formatSummary(summarize(report.diagnostics)));
  return lines.join('\n');
}

/** `2 diagnostics (1 lexical, 1 syntax): INVALID_CHARACTER 1, ...` */
export function formatSummary(summary: DiagnosticSummary): string {
  if (summary.total === 0) return 'No problems found';
  const noun = summary.total === 1 ? 'diagnostic' : 'diagnostics';
  const kinds = Object.entries(summary.byKind)
    .map(([kind, count]) => `${kind} ${count}`)
    .join(', ');
  return `${summary.total} ${noun} (${summary.lexical} lexical, ${summary.syntax} syntax): ${kinds}`;
}

function formatDiagnosticsJSON(report: CheckReport): string {
  const output = {
    file: report.file,
    diagnostics: report.diagnostics.map((d) => serializeDiagnostic(d)),
    summary: summarize(report.diagnostics),
    ...(report.tokens === undefined
      ? {}
      : { tokens: report.tokens.map((t) => serializeToken(t)) }),
    ...(report.tree === undefined ? {} : { tree: serializeTree(report.tree) }),
  };
  return JSON.stringify(output, null, 2);
}

// ============================================================
// RUN
// ============================================================

export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Directory searched for configuration when --config is absent */
  readonly cwd: string;
}

const DEFAULT_IO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  cwd: process.cwd(),
};

/** Exit codes: read and checked, usage or config problem, unreadable file */
export const EXIT_CODES = { OK: 0, USAGE: 1, FATAL: 2 } as const;

/**
 * Print an XpressoError and map it to an exit code; rethrow anything else.
 * An unreadable file is reported under its registry code, like a diagnostic.
 */
function reportFailure(err: unknown, io: CliIO): number {
  if (!(err instanceof XpressoError)) throw err;
  if (err instanceof SourceReadError) {
    const fatal = ERROR_REGISTRY.get('SOURCE_READ_ERROR');
    io.stderr(`Error [${fatal.code}] ${fatal.kind}: ${err.message}`);
    io.stderr(`  suggestion: ${fatal.resolution}`);
    return EXIT_CODES.FATAL;
  }
  io.stderr(`Error: ${err.message}`);
  return EXIT_CODES.USAGE;
}

/**
 * Run xpresso against the arguments. Diagnostics in the source never
 * change the exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = DEFAULT_IO
): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.mode === 'help') {
      io.stdout(HELP_TEXT);
      return EXIT_CODES.OK;
    }
    if (args.mode === 'version') {
      io.stdout(`xpresso ${readVersion()}`);
      return EXIT_CODES.OK;
    }

    const config = loadConfig(args.configDir ?? io.cwd);
    const source = await readSourceFile(args.file);
    io.stdout(checkSource(args, config, source));
    return EXIT_CODES.OK;
  } catch (err) {
    return reportFailure(err, io);
  }
}

/** Tokenize and parse with one sink; flags override the config file */
export function checkSource(
  args: Extract<ParsedArgs, { mode: 'check' }>,
  config: XpressoConfig,
  source: string
): string {
  const verbose = args.verbose ?? config.verbose;
  const format = args.output ?? config.output;

  const sink = new DiagnosticSink();
  const { tokens } = tokenize(source, {
    sink,
    maxLookahead: config.maxLookahead,
  });
  const { tree } = parseTokens(tokens, { sink });

  let dumped: readonly Token[] | undefined;
  if (args.tokens || verbose) {
    dumped = verbose && config.trivia ? tokens : significantTokens(tokens);
  }

  const report: CheckReport = {
    file: args.file,
    source,
    diagnostics: sink.all(),
    tokens: dumped,
    tree: args.tree || verbose ? tree : undefined,
  };
  return formatDiagnostics(report, format, verbose);
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (err) {
    // Handle unexpected errors
    if (err instanceof Error) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exitCode = EXIT_CODES.USAGE;
  }
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
