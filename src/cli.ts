#!/usr/bin/env node
/**
 * CLI Module
 * Handles command-line argument parsing and orchestrates a strip run
 */

import { Command, InvalidArgumentError } from 'commander';
import { realpathSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { stripRequest } from './minimizer.js';
import { formatReport } from './report.js';
import { createSocketTransport, DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_READ_TIMEOUT_MS } from './transport.js';
import type { CLIOptions, ProbeLogger, ProbeTarget } from './types/index.js';

const VERSION = '1.0.0';

export const MISSING_REQUEST_ERROR = 'Need to specify a request to send.';

/**
 * Parses and range-checks a port argument
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port >= 0x10000) {
    throw new InvalidArgumentError('Port number must be between 0 and 65536');
  }
  return port;
}

/**
 * Parses a timeout argument in milliseconds
 */
export function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds');
  }
  return timeout;
}

/**
 * Each -v raises verbosity by one
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Creates the CLI program with commander
 */
export function createProgram(run: (options: CLIOptions) => Promise<number> = runStrip): Command {
  const program = new Command();

  program
    .name('req-strip')
    .description('Strips headers, cookies, query parameters and form fields a server does not need from a captured request')
    .version(VERSION)
    .requiredOption('-r, --req <file>', 'File containing an HTTP request')
    .option('-u, --http', 'Make the request over HTTP (defaults to TLS)', false)
    .option('-t, --host <host>', 'Host to make the request to', '127.0.0.1')
    .option('-p, --port <number>', 'Port number to connect to', parsePort, 443)
    .option('-v, --verbose', 'Verbose mode; repeat for more detail', increaseVerbosity, 0)
    .option('--connect-timeout <ms>', 'Connect timeout in milliseconds', parseTimeout, DEFAULT_CONNECT_TIMEOUT_MS)
    .option('--read-timeout <ms>', 'Response header read timeout in milliseconds', parseTimeout, DEFAULT_READ_TIMEOUT_MS)
    .action(async (options: CLIOptions) => {
      process.exitCode = await run(options);
    });

  return program;
}

/**
 * Creates a per-probe logger for CLI output. Silent at verbosity 0.
 */
export function createLogger(verbosity: number): ProbeLogger {
  return (result, matched) => {
    if (verbosity < 1) {
      return;
    }
    const timestamp = new Date().toISOString();
    const label = !result.ok ? 'failed' : matched ? 'removable' : 'needed';
    const color = !result.ok ? '\x1b[31m' : matched ? '\x1b[32m' : '\x1b[33m';
    const reset = '\x1b[0m';
    console.log(`[${timestamp}] ${result.removal.location} ${result.removal.key} ${color}${label}${reset}`);
    if (!result.ok && verbosity >= 2) {
      console.log(`  ${result.error}`);
    }
  };
}

/**
 * Main function: probes, strips and prints the report. Resolves to the exit code.
 */
export async function runStrip(options: CLIOptions): Promise<number> {
  const requestPath = resolve(options.req);

  let rawRequest: string;
  try {
    rawRequest = await readFile(requestPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      console.error(`Error: Request file not found: ${requestPath}`);
    } else {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`Error: Failed to read request file: ${message}`);
    }
    return 1;
  }

  if (rawRequest.trim() === '') {
    console.error(`Error: ${MISSING_REQUEST_ERROR}`);
    return 1;
  }

  const target: ProbeTarget = { host: options.host, port: options.port, tls: !options.http };
  if (options.verbose > 0) {
    console.log(`Probing ${target.host}:${target.port} over ${target.tls ? 'TLS' : 'plain HTTP'}`);
  }

  const outcome = await stripRequest(rawRequest, target, {
    transport: createSocketTransport({
      connectTimeoutMs: options.connectTimeout,
      readTimeoutMs: options.readTimeout,
    }),
    onProbe: createLogger(options.verbose),
  });

  if (!outcome.ok) {
    console.error(`Error: ${outcome.error}`);
    return 1;
  }

  console.log(formatReport(rawRequest, outcome));
  return 0;
}

/**
 * True when this file is the script node was started with (directly or via
 * the npm bin link)
 */
export function isMainModule(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return moduleUrl === pathToFileURL(realpathSync(scriptPath)).href;
  } catch {
    return false;
  }
}

// Run CLI when executed directly
if (isMainModule(import.meta.url, process.argv[1])) {
  createProgram()
    .parseAsync()
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`Error: ${message}`);
      process.exitCode = 1;
    });
}
