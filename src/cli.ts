#!/usr/bin/env node

import { Command } from 'commander';
import { TokenClient } from './index';
import { ConfigError, isTokenRequestError } from './errors';
import { FetchLike } from './exchange';
import { OUTPUT_FORMATS, isOutputFormat } from './output/formatter';
import { VERSION } from './version';

export interface TokenCommandOptions {
  config: string;
  output: string;
  verbose?: boolean;
  timeout?: string;
}

export function describeFailure(error: unknown): string {
  if (isTokenRequestError(error)) {
    return `❌ ${error.name}: ${error.message}\n💡 ${error.remediation}`;
  }
  return `❌ ${error instanceof Error ? error.message : String(error)}`;
}

export interface TokenCommandDependencies {
  write?: (text: string) => void;
  fetch?: FetchLike;
}

export async function runTokenCommand(options: TokenCommandOptions, dependencies: TokenCommandDependencies = {}): Promise<void> {
  const write = dependencies.write ?? ((text: string) => process.stdout.write(text));

  if (!isOutputFormat(options.output)) {
    throw new ConfigError('output', `Unsupported output format "${options.output}". Supported formats: ${OUTPUT_FORMATS.join(', ')}`);
  }

  let timeoutMs: number | undefined;
  if (options.timeout !== undefined) {
    timeoutMs = Number(options.timeout) * 1000;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigError('timeout', `Invalid timeout "${options.timeout}": expected a positive number of seconds`);
    }
  }

  const client = TokenClient.fromFile(options.config, {
    outputFormat: options.output,
    verbose: options.verbose,
    timeoutMs,
    fetch: dependencies.fetch
  });
  const result = await client.generate();
  write(client.formatOutput(result));
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('bearer-token')
    .description('🔐 Obtain platform access tokens for service accounts')
    .version(VERSION, '-v, --version', 'Show the CLI version');

  program
    .command('token')
    .description('Generate an access token using the JWT-Bearer grant')
    .requiredOption('-c, --config <file>', 'token configuration file')
    .option('-o, --output <format>', `output format (${OUTPUT_FORMATS.join(', ')})`, 'text')
    .option('--timeout <seconds>', 'token request timeout in seconds')
    .option('--verbose', 'print diagnostics while generating the token')
    .action(async (options: TokenCommandOptions) => {
      try {
        await runTokenCommand(options);
      } catch (error) {
        console.error(describeFailure(error));
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error(describeFailure(error));
    process.exitCode = 1;
  });
}
