import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import * as fs from 'fs';
import { BaseException, ValidationException } from '../common/exceptions';
import { GraphTransliterator } from '../transliteration';
import { GRAPH_TRANSLITERATOR_VERSION } from '../transliteration/version';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): string;
  writeFile(path: string, data: string): void;
}

export const nodeIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readFile: (path) => fs.readFileSync(path, 'utf8'),
  writeFile: (path, data) => fs.writeFileSync(path, data),
};

interface SettingsOptions {
  easyReading?: boolean;
}

interface CompileOptions extends SettingsOptions {
  output?: string;
  checkAmbiguity: boolean;
  ignoreErrors?: boolean;
}

interface TransliterateOptions extends SettingsOptions {
  settings?: boolean;
  ignoreErrors?: boolean;
}

interface OutputOptions {
  output?: string;
}

function readJson(io: CliIO, path: string): unknown {
  const text = io.readFile(path);
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationException(`${path} is not valid JSON`, [{ path: 'root', message }]);
  }
}

function fromSettingsFile(
  io: CliIO,
  path: string,
  options: SettingsOptions & { checkAmbiguity?: boolean; ignoreErrors?: boolean },
): GraphTransliterator {
  const raw = readJson(io, path);
  const buildOptions = { checkAmbiguity: options.checkAmbiguity, ignoreErrors: options.ignoreErrors };
  return options.easyReading
    ? GraphTransliterator.fromEasyReading(raw, buildOptions)
    : GraphTransliterator.fromSettings(raw, buildOptions);
}

function writeDump(io: CliIO, transliterator: GraphTransliterator, output: string | undefined): void {
  if (output) {
    io.writeFile(output, transliterator.dumps());
    io.stdout(chalk.green(`✔ Wrote ${transliterator.rules.length} rules to ${output}`));
  } else {
    io.stdout(transliterator.dumps());
  }
}

export function createProgram(io: CliIO = nodeIO): Command {
  const program = new Command();

  program
    .name('transliterate')
    .description('Compile, inspect and run graph transliterators')
    .version(GRAPH_TRANSLITERATOR_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command('compile')
    .description('Build a transliterator from settings and write its dump')
    .argument('<settings>', 'settings JSON file')
    .option('-o, --output <file>', 'write the dump to a file instead of stdout')
    .option('--easy-reading', 'settings use compact rule notation')
    .option('--no-check-ambiguity', 'skip the ambiguity check')
    .option('--ignore-errors', 'store the transliterator with errors ignored')
    .action((settings: string, options: CompileOptions) => {
      writeDump(io, fromSettingsFile(io, settings, options), options.output);
    });

  program
    .command('check')
    .description('Validate settings and check them for ambiguous rules')
    .argument('<settings>', 'settings JSON file')
    .option('--easy-reading', 'settings use compact rule notation')
    .action((settings: string, options: SettingsOptions) => {
      const transliterator = fromSettingsFile(io, settings, options);
      io.stdout(
        chalk.green(
          `✔ ${settings}: ${transliterator.rules.length} rules, ${transliterator.tokens.size} tokens, no ambiguity`,
        ),
      );
    });

  program
    .command('tokenize')
    .description('Print the tokens of a text as JSON')
    .argument('<dump>', 'transliterator dump file')
    .argument('<text>', 'text to tokenize')
    .action((dump: string, text: string) => {
      const transliterator = GraphTransliterator.loads(io.readFile(dump));
      io.stdout(JSON.stringify(transliterator.tokenize(text)));
    });

  program
    .command('transliterate')
    .description('Transliterate a text')
    .argument('<file>', 'transliterator dump file, or settings with --settings')
    .argument('<text>', 'text to transliterate')
    .option('--settings', 'the file holds settings rather than a dump')
    .option('--easy-reading', 'settings use compact rule notation (implies --settings)')
    .option('--ignore-errors', 'skip unrecognized and unmatched tokens')
    .action((file: string, text: string, options: TransliterateOptions) => {
      const transliterator =
        options.settings || options.easyReading
          ? fromSettingsFile(io, file, options)
          : GraphTransliterator.loads(io.readFile(file));
      if (options.ignoreErrors) {
        transliterator.ignoreErrors = true;
      }
      io.stdout(transliterator.transliterate(text));
    });

  program
    .command('prune')
    .description('Remove the rules producing the given productions')
    .argument('<dump>', 'transliterator dump file')
    .argument('<production...>', 'productions to remove')
    .option('-o, --output <file>', 'write the dump to a file instead of stdout')
    .action((dump: string, productions: string[], options: OutputOptions) => {
      const transliterator = GraphTransliterator.loads(io.readFile(dump));
      writeDump(io, transliterator.prunedOf(productions), options.output);
    });

  return program;
}

function reportError(io: CliIO, error: unknown): void {
  if (error instanceof BaseException) {
    io.stderr(chalk.red(`✖ ${error.errorCode}: ${error.message}`));
    if (error instanceof ValidationException) {
      for (const issue of error.validationErrors) {
        io.stderr(chalk.dim(`  ${issue.path}: ${issue.message}`));
      }
    }
    return;
  }
  io.stderr(chalk.red(`✖ ${error instanceof Error ? error.message : String(error)}`));
}

/**
 * Run the program on user arguments and resolve to the process exit code
 */
export async function runCli(args: string[], io: CliIO = nodeIO): Promise<number> {
  try {
    await createProgram(io).parseAsync(args, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    reportError(io, error);
    return 1;
  }
}
