/**
 * Command line front end: schema file in, C# source out
 */

import { promises as fs } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { CSharpGeneratorSettings } from '../types/index.js';
import { CodegenError, ConfigurationError } from '../types/errors.js';
import { CSharpCodeGenerator } from '../generator/csharp/code-generator.js';
import { validateGeneratorSettings, validateJSONSchema } from '../utils/validation.js';
import { createConsoleLogger, silentLogger } from '../utils/logger.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface CliArgs {
  schemaPath?: string;
  outputPath?: string;
  configPath?: string;
  overrides: Partial<CSharpGeneratorSettings>;
  verbose: boolean;
  help: boolean;
}

type ParseResult = { ok: true; args: CliArgs } | { ok: false; message: string };

export const USAGE = `
schema-typegen <schema.(json|yaml)> [options]

Generates C# classes and enums from a JSON Schema document.

Options:
  -o, --output <file>         Write to a file instead of stdout
  --config <file>             Generator settings (JSON or YAML)
  --namespace <ns>            Namespace of the generated file
  --array-type <type>         Generic sequence type
  --dictionary-type <type>    Generic map type
  --root-type-name <name>     Name of the root type
  --verbose                   Log generation steps to stderr
  -h, --help                  Show this help
`.trim();

const VALUE_FLAGS = new Set([
  '-o',
  '--output',
  '--config',
  '--namespace',
  '--array-type',
  '--dictionary-type',
  '--root-type-name',
]);

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

function parseArgs(argv: string[]): ParseResult {
  const args: CliArgs = { overrides: {}, verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      args.help = true;
      continue;
    }
    if (arg === '--verbose') {
      args.verbose = true;
      continue;
    }

    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        return { ok: false, message: `Option ${arg} requires a value` };
      }
      i++;

      switch (arg) {
        case '-o':
        case '--output':
          args.outputPath = value;
          break;
        case '--config':
          args.configPath = value;
          break;
        case '--namespace':
          args.overrides.namespace = value;
          break;
        case '--array-type':
          args.overrides.arrayType = value;
          break;
        case '--dictionary-type':
          args.overrides.dictionaryType = value;
          break;
        case '--root-type-name':
          args.overrides.rootTypeName = value;
          break;
      }
      continue;
    }

    if (arg.startsWith('-')) {
      return { ok: false, message: `Unknown option: ${arg}` };
    }
    if (args.schemaPath !== undefined) {
      return { ok: false, message: `Unexpected argument: ${arg}` };
    }
    args.schemaPath = arg;
  }

  return { ok: true, args };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads a JSON or YAML document; the format follows the file extension
 */
async function readDocument(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Could not read ${path}: ${describeError(error)}`,
      path,
      undefined,
      error instanceof Error ? error : undefined
    );
  }

  try {
    const extension = extname(path).toLowerCase();
    return extension === '.yaml' || extension === '.yml' ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse ${path}: ${describeError(error)}`,
      path,
      undefined,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Runs the CLI and resolves to the process exit code:
 * 0 on success, 1 on a generation or input error, 2 on a usage error
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    io.stderr(`${parsed.message}\n\n${USAGE}\n`);
    return 2;
  }

  const { args } = parsed;
  if (args.help) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }
  if (args.schemaPath === undefined) {
    io.stderr(`Missing schema file\n\n${USAGE}\n`);
    return 2;
  }

  const logger = args.verbose ? createConsoleLogger() : silentLogger;

  try {
    const fileSettings = args.configPath
      ? validateGeneratorSettings(await readDocument(args.configPath))
      : {};
    const schema = validateJSONSchema(await readDocument(args.schemaPath));

    const generator = new CSharpCodeGenerator(schema, { ...fileSettings, ...args.overrides }, { logger });
    const code = generator.generateFile();

    if (args.outputPath === undefined) {
      io.stdout(code);
      return 0;
    }

    try {
      await fs.writeFile(args.outputPath, code, 'utf8');
    } catch (error) {
      throw new ConfigurationError(
        `Could not write ${args.outputPath}: ${describeError(error)}`,
        args.outputPath,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
    logger('Wrote generated file', { path: args.outputPath });
    return 0;
  } catch (error) {
    if (error instanceof CodegenError) {
      io.stderr(`${error.name}: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}
