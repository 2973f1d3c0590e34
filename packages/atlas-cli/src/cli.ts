import { Command, CommanderError } from 'commander';
import { isAtlasError } from '@atlas/core';
import { depsCommand } from './commands/deps.js';
import type { QueryFlags } from './commands/deps.js';
import { rdepsCommand } from './commands/rdeps.js';
import { scanCommand } from './commands/scan.js';
import { treeCommand } from './commands/tree.js';
import { validateCommand } from './commands/validate.js';
import { processIO } from './lib/context.js';
import type { CommandContext } from './lib/context.js';
import { logger } from './lib/logger.js';
import { CONFIG_FILE } from './lib/paths.js';
import { reportError } from './lib/setup.js';
import type { OutputFlags } from './lib/setup.js';

export const VERSION = '0.1.0';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function withOutputOptions(cmd: Command): Command {
  return cmd
    .option('--format <format>', 'Output format: toon | json')
    .option('--direct-result', 'Print the full result to stdout instead of writing a file')
    .option('--output <path>', 'Write the result to this file')
    .option('--config <path>', `Config file (default: ${CONFIG_FILE})`);
}

function withSourceOptions(cmd: Command): Command {
  return cmd
    .option('--root <path>', 'Bundle root, repeatable (default: config roots)', collect, [])
    .option('--catalog <file>', 'Use a JSON catalog from `scan --format json` instead of scanning')
    .option('--include-project-scope', 'Also index the project-local component set')
    .option('--include-tests', 'Also index test components');
}

function withQueryOptions(cmd: Command): Command {
  return cmd
    .option('--component <notation>', 'Target component')
    .option('--dep-types <csv>', 'Reference types to follow: script,skill,import,path,implements')
    .option('--depth <n>', 'Maximum traversal depth (default: 10)');
}

/**
 * Build the program. Every action records its exit code instead of exiting,
 * so the same program runs in-process under test.
 */
export function buildProgram(ctx: CommandContext, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('atlas')
    .description('Component inventory and dependency resolution for bundle trees')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => ctx.io.stdout(str),
      writeErr: (str) => ctx.io.stderr(str),
    });

  const action =
    <F extends OutputFlags>(command: (flags: F, ctx: CommandContext) => Promise<number>) =>
    async (flags: F): Promise<void> => {
      try {
        setExitCode(await command(flags, ctx));
      } catch (err) {
        if (!isAtlasError(err)) throw err;
        setExitCode(reportError(err.toJSON(), flags.format === 'json' ? 'json' : 'toon', ctx));
      }
    };

  // atlas scan
  withOutputOptions(
    program
      .command('scan')
      .description('Index bundles and list their components')
      .option('--root <path>', 'Bundle root, repeatable (default: config roots)', collect, [])
      .option('--resource-types <csv>', 'Component types: skill,command,agent,script,test')
      .option('--bundles <csv>', 'Only these bundles')
      .option('--name-pattern <glob|glob>', 'Component name filter, alternatives separated by |')
      .option('--content-pattern <regex>', 'Keep components whose text matches')
      .option('--include-tests', 'Also index test components')
      .option('--include-descriptions', 'Read descriptions from metadata headers')
      .option('--include-project-scope', 'Also index the project-local component set'),
  ).action(action(scanCommand));

  // atlas deps
  withOutputOptions(
    withSourceOptions(withQueryOptions(program.command('deps').description('What a component depends on'))),
  ).action(action<QueryFlags>(depsCommand));

  // atlas rdeps
  withOutputOptions(
    withSourceOptions(withQueryOptions(program.command('rdeps').description('What depends on a component'))),
  ).action(action<QueryFlags>(rdepsCommand));

  // atlas tree
  withOutputOptions(
    withSourceOptions(withQueryOptions(program.command('tree').description('Dependency tree of a component'))),
  ).action(action<QueryFlags>(treeCommand));

  // atlas validate
  withOutputOptions(
    withSourceOptions(
      program
        .command('validate')
        .description('Report broken references and cycles')
        .option('--component <csv>', 'Restrict to these components')
        .option('--bundles <csv>', 'Restrict to these bundles')
        .option('--dep-types <csv>', 'Reference types to check: script,skill,import,path,implements'),
    ),
  ).action(action(validateCommand));

  return program;
}

export async function run(argv: string[], ctx: Partial<CommandContext> = {}): Promise<number> {
  const context: CommandContext = {
    cwd: ctx.cwd ?? process.cwd(),
    io: ctx.io ?? processIO,
    ...(ctx.now ? { now: ctx.now } : {}),
  };
  let exitCode = 0;
  const program = buildProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    // Help, version and bad flags arrive here under exitOverride
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : 1;
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
  return exitCode;
}
