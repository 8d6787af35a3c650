import type { Command } from 'commander';

import {
  ConfigurationError,
  ErrorCode,
  SchemaError,
  generateSchema,
  hv,
  toJsonValue,
  versionFromName,
  type GenerateOptions,
} from '@typebridge/core';
import { readJsonFile } from './input.js';

export interface GenerateCommandOptions {
  target?: string;
  explicitOpen?: boolean;
  debug?: boolean;
}

export function toGenerateOptions(options: GenerateCommandOptions): GenerateOptions {
  const out: GenerateOptions = {};
  if (options.explicitOpen) out.explicitOpen = true;
  if (options.debug) out.debug = true;
  if (options.target !== undefined) {
    const version = versionFromName(options.target);
    if (version.isErr()) {
      throw new ConfigurationError({
        message: `--target: ${version.error}`,
        context: { value: options.target },
      });
    }
    out.version = version.value;
  }
  return out;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Describe a JSON value as a JSON Schema 2020-12 document')
    .argument('<file>', 'JSON data file')
    .option('--target <version>', 'Schema version to produce')
    .option('--explicit-open', 'Never close structs implicitly')
    .option('--debug', 'Trace generation stages to stderr')
    .action((file: string, options: GenerateCommandOptions) => {
      const data = toJsonValue(readJsonFile(file));
      if (data === undefined) {
        throw new SchemaError({
          message: `${file}: not a JSON value`,
          errorCode: ErrorCode.INVALID_VALUE,
        });
      }
      const schema = generateSchema(hv.json(data), toGenerateOptions(options));
      if (schema.isErr()) {
        throw schema.error;
      }
      process.stdout.write(`${JSON.stringify(schema.value, null, 2)}\n`);
    });
}
