#!/usr/bin/env node
import { input, select } from '@inquirer/prompts';

import type { TextFileService, WriteTextOptions } from './application/services/text-file-service';
import { ENCODING } from './domain/encoding';
import { EncodingError, FsToolkitError, InvalidOptionError, WritePermissionError, errorMessage } from './domain/errors';
import { mergeAsDirectory, mergeAsFile } from './domain/path-composer';
import { formatPath, isFileForm, parseDirectoryPath, parsePath } from './domain/path-model';
import type { Path } from './domain/path-model';
import { IF_MISSING, INCLUDE_DIRECTORIES, INCLUDE_DIRECTORIES_SCHEMA } from './domain/walk-options';
import type { IncludeDirectories } from './domain/walk-options';
import { IF_EXISTS } from './application/ports/file-system.port';
import type { IfExists } from './application/ports/file-system.port';
import { createToolkit } from './toolkit';
import { getLogger } from './utils/get-logger';
import { loadConfig } from './utils/load-config';

type ParsedArgs = {
  command: string | null;
  positional: string[];
  followSymlinks: boolean;
  ignoreMissing: boolean;
  order: string | null;
  encoding: string | null;
  ifExists: IfExists;
};

const logger = getLogger();

export const main = async (argv: string[]) => {
  const args = parseArgs(argv);

  if (!args.command || args.command === 'help' || args.command === '--help') {
    printHelp();
    return;
  }

  const config = loadConfig();
  logger.level = config.logLevel;
  const toolkit = createToolkit(config);

  if (args.command === 'canon') {
    process.stdout.write(`${formatPath(composeArguments(args.positional))}\n`);
    return;
  }

  const [target] = args.positional;
  if (!target) {
    logger.error({ command: args.command }, 'Missing path argument');
    printHelp();
    process.exitCode = 1;
    return;
  }

  if (args.command === 'ls') {
    const entries = await toolkit.lister.listDirectory(parseDirectoryPath(target), {
      followSymlinks: args.followSymlinks,
    });
    for (const entry of entries) {
      process.stdout.write(`${entry.kind}\t${formatPath(entry.path)}\n`);
    }
    return;
  }

  if (args.command === 'walk') {
    let visited = 0;
    await toolkit.walker.walk(
      parseDirectoryPath(target),
      (entry) => {
        visited += 1;
        process.stdout.write(`${formatPath(entry.path)}\n`);
      },
      {
        includeDirectories: parseOrder(args.order),
        ifMissing: args.ignoreMissing ? IF_MISSING.IGNORE : IF_MISSING.ERROR,
        followSymlinks: args.followSymlinks,
      },
    );
    logger.debug({ visited }, 'Walk complete');
    return;
  }

  if (args.command === 'cat') {
    const text = await readWithRecovery(toolkit.text, parsePath(target), args.encoding ?? config.defaultEncoding);
    process.stdout.write(text);
    return;
  }

  if (args.command === 'write') {
    const content = args.positional[1] ?? '';
    const written = await writeWithRecovery(toolkit.text, parsePath(target), content, {
      encoding: args.encoding ?? config.defaultEncoding,
      ifExists: args.ifExists,
    });
    if (written) {
      logger.info({ path: target, characters: content.length }, 'File written');
    }
    return;
  }

  logger.error({ command: args.command }, 'Unknown command');
  printHelp();
  process.exitCode = 1;
};

// Every argument but the last names a directory, with or without a trailing separator
const composeArguments = (values: string[]): Path => {
  const paths = values.map((value, index) =>
    index === values.length - 1 ? parsePath(value) : parseDirectoryPath(value),
  );
  const last = paths[paths.length - 1];
  return last && isFileForm(last) ? mergeAsFile(paths) : mergeAsDirectory(paths);
};

const parseOrder = (value: string | null): IncludeDirectories => {
  if (value === null) {
    return INCLUDE_DIRECTORIES.DEPTH_FIRST;
  }
  const parsed = INCLUDE_DIRECTORIES_SCHEMA.safeParse(value);
  if (!parsed.success) {
    throw new InvalidOptionError(`Unknown walk order: ${value}`);
  }
  return parsed.data;
};

const canPrompt = () => Boolean(process.stdin.isTTY && process.stdout.isTTY);

const readWithRecovery = async (text: TextFileService, file: Path, encoding: string): Promise<string> => {
  try {
    return await text.readText(file, encoding);
  } catch (error) {
    if (!(error instanceof EncodingError) || !error.recoverable || !canPrompt()) {
      throw error;
    }
    const suggested = await text.detectEncoding(file);
    const override = await input({
      message: `${error.message}. Encoding to use instead:`,
      default: suggested ?? ENCODING.LATIN1,
    });
    return text.readTextWithOverride(file, override);
  }
};

const writeWithRecovery = async (
  text: TextFileService,
  file: Path,
  content: string,
  options: WriteTextOptions,
): Promise<boolean> => {
  try {
    await text.writeText(file, content, options);
    return true;
  } catch (error) {
    if (!(error instanceof FsToolkitError) || !error.recoverable || !canPrompt()) {
      throw error;
    }

    if (error instanceof WritePermissionError) {
      const choice = await select({
        message: `${error.message}. What would you like to do?`,
        choices: [
          { name: 'Make it writable and retry', value: 'force' },
          { name: 'Abort', value: 'abort' },
        ],
      });
      if (choice === 'abort') {
        logger.warn({ path: error.path }, 'Write aborted');
        process.exitCode = 1;
        return false;
      }
      return writeWithRecovery(text, file, content, { ...options, forceWritable: true });
    }

    if (error instanceof EncodingError) {
      const override = await input({
        message: `${error.message}. Encoding to use instead:`,
        default: ENCODING.UTF8,
      });
      return writeWithRecovery(text, file, content, { ...options, overrideEncoding: override });
    }

    throw error;
  }
};

const parseArgs = (args: string[]): ParsedArgs => {
  const [command, ...rest] = args;
  const parsed: ParsedArgs = {
    command: command ?? null,
    positional: [],
    followSymlinks: false,
    ignoreMissing: false,
    order: null,
    encoding: null,
    ifExists: IF_EXISTS.OVERWRITE,
  };

  let index = 0;
  while (index < rest.length) {
    const token = rest[index];
    if (token === undefined) {
      index += 1;
      continue;
    }
    if (token === '--follow' || token === '-L') {
      parsed.followSymlinks = true;
      index += 1;
      continue;
    }
    if (token === '--ignore-missing') {
      parsed.ignoreMissing = true;
      index += 1;
      continue;
    }
    if (token === '--order') {
      parsed.order = rest[index + 1] ?? null;
      index += 2;
      continue;
    }
    if (token === '--encoding' || token === '-e') {
      parsed.encoding = rest[index + 1] ?? null;
      index += 2;
      continue;
    }
    if (token === '--append') {
      parsed.ifExists = IF_EXISTS.APPEND;
      index += 1;
      continue;
    }
    if (token === '--no-clobber') {
      parsed.ifExists = IF_EXISTS.ERROR;
      index += 1;
      continue;
    }
    parsed.positional.push(token);
    index += 1;
  }

  return parsed;
};

const printHelp = () => {
  const message = `
fs-toolkit

Usage:
  fs-toolkit <command> [options]

Commands:
  ls <dir>              - List immediate entries of a directory
  walk <dir>            - Visit every entry below a directory
  cat <file>            - Print a file as text
  write <file> <text>   - Write text to a file, creating parent directories
  canon <path>...       - Merge paths left to right and print the canonical result

Options:
  --follow, -L             Resolve symbolic links (ls, walk)
  --order <order>          none | depth-first | breadth-first (walk, default: depth-first)
  --ignore-missing         Do nothing if the walk root does not exist
  --encoding, -e <enc>     utf-8 | utf-16le | utf-16be | latin1 | ascii (cat, write)
  --append                 Append instead of overwriting (write)
  --no-clobber             Fail if the file exists (write)

Environment:
  FS_TOOLKIT_TMPDIR        Directory for temporary resources (default: OS temp dir)
  FS_TOOLKIT_ENCODING      Default text encoding (default: utf-8)
  LOG_LEVEL                pino log level (default: info)

Examples:
  fs-toolkit walk ./src --order breadth-first
  fs-toolkit cat notes.txt --encoding latin1
  fs-toolkit canon /var/log ../tmp ./cache/
`;

  process.stdout.write(message);
};

export const run = async (argv: string[] = process.argv.slice(2)) => {
  try {
    await main(argv);
  } catch (error) {
    logger.error(
      { error: errorMessage(error), code: error instanceof FsToolkitError ? error.code : undefined },
      'Fatal error',
    );
    process.exitCode = 1;
  }
};

if (require.main === module) {
  void run();
}
