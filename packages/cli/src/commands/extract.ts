import type { Command } from 'commander';

import {
  ConfigurationError,
  extractSource,
  versionFromName,
  type ExtractOptions,
} from '@typebridge/core';
import { readJsonFile } from './input.js';

export interface ExtractCommandOptions {
  root?: string;
  singleRoot?: boolean;
  allowNonexistentRoot?: boolean;
  id?: string;
  pkg?: string;
  strict?: boolean;
  strictKeywords?: boolean;
  strictFeatures?: boolean;
  defaultVersion?: string;
  openOnlyWhenExplicit?: boolean;
  debug?: boolean;
}

/**
 * Maps command line flags onto Extract options. Flags left unset keep
 * the library defaults.
 */
export function toExtractOptions(options: ExtractCommandOptions): ExtractOptions {
  const out: ExtractOptions = {};
  if (options.root !== undefined) out.root = options.root;
  if (options.singleRoot) out.singleRoot = true;
  if (options.allowNonexistentRoot) out.allowNonExistentRoot = true;
  if (options.id !== undefined) out.id = options.id;
  if (options.pkg !== undefined) out.pkgName = options.pkg;
  if (options.strict) out.strict = true;
  if (options.strictKeywords) out.strictKeywords = true;
  if (options.strictFeatures) out.strictFeatures = true;
  if (options.openOnlyWhenExplicit) out.openOnlyWhenExplicit = true;
  if (options.debug) out.debug = true;
  if (options.defaultVersion !== undefined) {
    const version = versionFromName(options.defaultVersion);
    if (version.isErr()) {
      throw new ConfigurationError({
        message: `--default-version: ${version.error}`,
        context: { value: options.defaultVersion },
      });
    }
    out.defaultVersion = version.value;
  }
  return out;
}

export function registerExtractCommand(program: Command): void {
  program
    .command('extract')
    .description('Translate a JSON Schema document into type-language source')
    .argument('<file>', 'JSON Schema file')
    .option('--root <fragment>', 'URI fragment of the schemas to extract, e.g. #/components/schemas')
    .option('--single-root', 'Treat the value at --root as one schema')
    .option('--allow-nonexistent-root', 'Produce an empty file when --root does not exist')
    .option('--id <uri>', 'Base URI when the document has no $id')
    .option('--pkg <name>', 'Package clause for the output')
    .option('--strict', 'Shorthand for --strict-keywords --strict-features')
    .option('--strict-keywords', 'Reject unknown keywords and keywords outside the schema version')
    .option('--strict-features', 'Reject known keywords that cannot be translated')
    .option('--default-version <version>', 'Schema version when the document has no $schema')
    .option('--open-only-when-explicit', 'Leave structs open only when the schema says so')
    .option('--debug', 'Trace decoder passes to stderr')
    .action((file: string, options: ExtractCommandOptions) => {
      const data = readJsonFile(file);
      const source = extractSource(data, toExtractOptions(options));
      if (source.isErr()) {
        throw source.error;
      }
      process.stdout.write(source.value);
    });
}
