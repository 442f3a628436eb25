import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { checkSource, formatDiagnostic, type CheckOptions } from './check.js';

export const VERSION = '0.1.0';

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// Exit codes: 0 clean, 1 diagnostics or unreadable file, 2 unimplemented literal family
export function runCli(argv: string[], io: CliIO = consoleIO): number {
  let exitCode = 0;

  const program = new Command()
    .name('nsp-check')
    .description('Check digit grouping of underscore-separated numeric literals in Python files')
    .version(VERSION)
    .argument('<files...>', 'Python files to check')
    .option('--select <codes>', 'only report codes starting with these comma-separated prefixes', parseCodes)
    .option('--ignore <codes>', 'skip codes starting with these comma-separated prefixes', parseCodes)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .action((files: string[], options: CheckOptions) => {
      for (const file of files) {
        exitCode = Math.max(exitCode, checkFile(file, options, io));
      }
    });

  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  return exitCode;
}

function checkFile(file: string, options: CheckOptions, io: CliIO): number {
  let source: string;
  try {
    source = readFileSync(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error) {
      io.err(`error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const outcome = checkSource(source, options);
  for (const d of outcome.diagnostics) {
    io.err(formatDiagnostic(file, d));
  }

  if (outcome.type === 'error') {
    const { token } = outcome.error;
    io.err(`error: ${file}:${token.start.line}:${token.start.col + 1}: ${outcome.error.message}`);
    return 2;
  }

  return outcome.diagnostics.length > 0 ? 1 : 0;
}

function parseCodes(value: string): string[] {
  return value.split(',').map((code) => code.trim()).filter((code) => code.length > 0);
}
