#!/usr/bin/env node
/**
 * Aki interpreter CLI entry point.
 *
 * Usage: aki <file.aki>
 *        aki run <file.aki>
 *        aki check <file.aki> [...]
 *        aki ast <file.aki>
 *        aki repl
 *        aki --eval "<code>"
 *
 * Config flags (--log-level, --scope-writes, --max-call-depth,
 * --no-auto-main, --quiet) may appear anywhere on the command line.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseSource } from './parser';
import { Interpreter } from './interpreter';
import { AkiError } from './errors';
import { astToSExpr } from './ast';
import { executeSource } from './runner';
import { valueToString } from './values';
import { AkiConfig, loadConfig, parseConfigFlags } from './config';
import { createLogger, Logger } from './logger';
import { startRepl } from './repl';

export interface CliIO {
  /** Program output from print/println. */
  write: (text: string) => void;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

const defaultIO: CliIO = {
  write: text => { process.stdout.write(text); },
  stdout: line => console.log(line),
  stderr: line => console.error(line),
  cwd: process.cwd(),
  env: process.env,
};

/**
 * Run the CLI. Returns the exit code, or null when the REPL has taken over
 * the process.
 */
export function runCli(argv: readonly string[], io: Partial<CliIO> = {}): number | null {
  const cli: CliIO = { ...defaultIO, ...io };

  let config: AkiConfig;
  let args: string[];
  try {
    const flags = parseConfigFlags(argv);
    args = flags.rest;
    config = loadConfig({ cwd: cli.cwd, env: cli.env, overrides: flags.overrides });
  } catch (e) {
    if (e instanceof AkiError) {
      cli.stderr(e.message);
      return 1;
    }
    throw e;
  }

  const logger = createLogger({ level: config.logLevel, sink: cli.stderr });

  if (args[0] === '--help' || args[0] === '-h' || args[0] === 'help') {
    printUsage(cli);
    return 0;
  }

  if (args.length === 0 || args[0] === 'repl') {
    startRepl({
      interpreter: {
        scopeWrites: config.scopeWrites,
        autoInvokeMain: config.autoInvokeMain,
        maxCallDepth: config.maxCallDepth,
        logger,
      },
      logger,
    });
    return null;
  }

  if (args[0] === 'check') {
    const files = args.slice(1);
    if (files.length === 0) {
      cli.stderr('Error: check requires at least one file argument');
      return 1;
    }
    return runCheck(files, cli);
  }

  if (args[0] === 'ast') {
    if (args.length < 2) {
      cli.stderr('Error: ast requires a file argument');
      return 1;
    }
    const text = tryReadFile(args[1], cli);
    if (text === null) return 1;
    return guard(cli, logger, () => {
      for (const node of parseSource(text)) {
        cli.stdout(astToSExpr(node));
      }
    });
  }

  let source: string;
  let filename: string;

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) {
      cli.stderr('Error: --eval requires a code argument');
      return 1;
    }
    source = args[1];
    filename = '<eval>';
  } else {
    // `aki run <file>` or the `aki <file>` shorthand
    filename = args[0] === 'run' && args.length >= 2 ? args[1] : args[0];
    const text = tryReadFile(filename, cli);
    if (text === null) return 1;
    source = text;
  }

  const interpreter = new Interpreter({
    scopeWrites: config.scopeWrites,
    autoInvokeMain: config.autoInvokeMain,
    maxCallDepth: config.maxCallDepth,
    write: cli.write,
    logger,
  });

  logger.info(`executing ${filename}`, { scopeWrites: config.scopeWrites, autoInvokeMain: config.autoInvokeMain });
  return guard(cli, logger, () => {
    executeSource(source, interpreter, {
      onResult: value => {
        if (config.printResults) cli.stdout(`=> ${valueToString(value)}`);
      },
    });
  });
}

/**
 * Run `body`, turning an AkiError into exit code 1.
 */
function guard(cli: CliIO, logger: Logger, body: () => void): number {
  try {
    body();
    return 0;
  } catch (e) {
    if (e instanceof AkiError) {
      logger.error('execution failed', { error: e.name });
      cli.stderr(e.message);
      return 1;
    }
    throw e;
  }
}

/**
 * Lex and parse each file. Returns 0 if all files are clean, 1 otherwise.
 */
function runCheck(files: string[], cli: CliIO): number {
  let hasAnyErrors = false;

  for (const filepath of files) {
    const source = tryReadFile(filepath, cli);
    if (source === null) {
      hasAnyErrors = true;
      continue;
    }
    try {
      const count = parseSource(source).length;
      cli.stdout(`✓ ${filepath} — ${count} top-level node${count === 1 ? '' : 's'}`);
    } catch (e) {
      if (!(e instanceof AkiError)) throw e;
      hasAnyErrors = true;
      cli.stdout(`✗ ${filepath}`);
      cli.stdout(`  ${e.message}`);
    }
  }

  return hasAnyErrors ? 1 : 0;
}

function tryReadFile(filepath: string, cli: CliIO): string | null {
  const resolved = path.resolve(cli.cwd, filepath);
  if (!fs.existsSync(resolved)) {
    cli.stderr(`Error: File not found: ${resolved}`);
    return null;
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(cli: CliIO): void {
  cli.stdout('Aki interpreter');
  cli.stdout('');
  cli.stdout('Usage:');
  cli.stdout('  aki <file.aki>               Run a file');
  cli.stdout('  aki run <file.aki>           Run a file');
  cli.stdout('  aki check <file.aki> [...]   Lex and parse files');
  cli.stdout('  aki ast <file.aki>           Print the AST as S-expressions');
  cli.stdout('  aki repl                     Start the interactive REPL');
  cli.stdout('  aki --eval "<code>"          Run inline code');
  cli.stdout('');
  cli.stdout('Options:');
  cli.stdout('  --log-level <level>          silent, error, warn, info or debug');
  cli.stdout('  --scope-writes <policy>      shadow or outer');
  cli.stdout('  --max-call-depth <n>         Deepest allowed function call nesting');
  cli.stdout('  --no-auto-main               Do not call main() on declaration');
  cli.stdout('  --quiet                      Do not print top-level results');
}

if (require.main === module) {
  const code = runCli(process.argv.slice(2));
  if (code !== null) process.exitCode = code;
}
