import { Command } from 'commander';

import { EXIT_CODES, PROGRAM, loadEnvConfig } from '../config/index.js';
import { runSum } from '../core/index.js';
import * as log from '../utils/logger.js';

// ── Output streams ───────────────────────────────────────────

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

// ── Program ──────────────────────────────────────────────────

/**
 * Build the commander program. It declares no options of its own. The count
 * check runs on the raw `args`: commander drops a bare `--` from what it
 * hands the action.
 */
export function createProgram(
  args: readonly string[],
  io: CliIO,
  onExit: (code: number) => void,
): Command {
  return new Command()
    .name(PROGRAM.NAME)
    .description('Add two integers and print the sum')
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .argument('[operands...]', 'two integers')
    .action(() => {
      const outcome = runSum([PROGRAM.NAME, ...args]);
      log.debug(`outcome ${outcome.kind}, exit ${String(outcome.exitCode)}`);
      io.stdout(outcome.line + '\n');
      onExit(outcome.exitCode);
    });
}

/**
 * Run the add CLI over user arguments (program name excluded) and resolve
 * to the process exit code.
 */
export async function runCli(
  args: readonly string[],
  io: CliIO = processIO,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  let exitCode: number = EXIT_CODES.SUCCESS;

  try {
    log.setLevel(loadEnvConfig(env).logLevel);

    const program = createProgram(args, io, (code) => {
      exitCode = code;
    });
    await program.parseAsync([...args], { from: 'user' });
  } catch (err) {
    const message =
      err instanceof Error ? err.message : String(err);
    io.stderr(`Error: ${message}\n`);
    exitCode = EXIT_CODES.INTERNAL;
  }

  return exitCode;
}
