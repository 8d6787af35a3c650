#!/usr/bin/env node

// CLI entry point
// - `typebridge extract <file>`: JSON Schema document -> type-language source on stdout.
// - `typebridge generate <file>`: JSON data -> JSON Schema 2020-12 document on stdout.
// - `typebridge versions`: the schema versions the tables know about.
// Errors print one per line to stderr, `#<pointer>: <message>`, and the
// process exits with the code mapped from the first error's code.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorCode,
  GenerationError,
  VERSIONS,
  DEFAULT_VERSION,
  describeVersion,
  isTranslationError,
  schemaURI,
  type TranslationError,
} from '@typebridge/core';
import { registerExtractCommand } from './commands/extract.js';
import { registerGenerateCommand } from './commands/generate.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('typebridge')
    .description('Translate between JSON Schema and type-language constraints')
    .version('0.3.0');

  registerExtractCommand(program);
  registerGenerateCommand(program);

  program
    .command('versions')
    .description('List the supported schema versions')
    .action(() => {
      for (const v of VERSIONS) {
        const uri = schemaURI(v);
        const marker = v === DEFAULT_VERSION ? ' (default)' : '';
        process.stdout.write(
          `${v}\t${describeVersion(v)}${marker}${uri === undefined ? '' : `\t${uri}`}\n`
        );
      }
    });

  return program;
}

function handleCliError(err: unknown): never {
  let error: TranslationError;
  if (isTranslationError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new GenerationError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
    });
  }

  console.error(error.describe());

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
