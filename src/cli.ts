#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { HttpClient } from './http';
import type { OutputStream } from './http';
import { LogLevel, initializeLogger, disposeLogger } from './logger';
import { BuiltRequest } from './models/Request';
import { RequestFileError, parseRequests } from './parser';
import { runRequests } from './runner';
import { Environment, ReqfileSettings, SettingsWarning, getSettings, parseNonNegativeInteger } from './settings';
import { ResponseWriter } from './storage';
import { errorMessage } from './utils/errors';

export interface CliOptions {
    verbose?: boolean;
    output?: string;
    timeout?: number;
    save?: boolean;
    strictTls?: boolean;
}

function parseTimeout(value: string): number {
    const timeout = parseNonNegativeInteger(value);
    if (timeout === undefined) {
        throw new InvalidArgumentError('Expected a number of milliseconds.');
    }
    return timeout;
}

export function createProgram(): Command {
    return new Command('reqfile')
        .description('Send the HTTP requests described in a request file, one after another')
        .argument('<file>', 'File containing the HTTP requests')
        .option('-v, --verbose', 'Print requests, response headers and bodies')
        .option('-o, --output <FILE>', 'Output file for the response body')
        .option('--timeout <ms>', 'Timeout for each request', parseTimeout)
        .option('--no-save', 'Do not save response bodies')
        .option('--strict-tls', 'Reject invalid TLS certificates');
}

/**
 * Settings from the environment with command line flags applied on top.
 */
export function resolveSettings(options: CliOptions, env: Environment, warnings: SettingsWarning[] = []): ReqfileSettings {
    const settings = getSettings(env, warnings);
    if (options.timeout !== undefined) {
        settings.timeout = options.timeout;
    }
    if (options.strictTls) {
        settings.rejectUnauthorized = true;
    }
    if (options.save === false) {
        settings.saveResponses = false;
    }
    return settings;
}

export function formatParseError(file: string, error: RequestFileError): string {
    return error.line !== undefined
        ? `${file}:${error.line}: ${error.message}`
        : `${file}: ${error.message}`;
}

/**
 * Parse every request in `file` up front, then send them in order.
 * The final diagnostic of a failed run goes to `errors` whatever the log level.
 * @returns The process exit code
 */
export async function runFile(
    file: string,
    options: CliOptions = {},
    env: Environment = process.env,
    errors: OutputStream = process.stderr
): Promise<number> {
    const warnings: SettingsWarning[] = [];
    const settings = resolveSettings(options, env, warnings);
    const level: LogLevel = options.verbose && env.REQFILE_LOG_LEVEL === undefined ? 'debug' : settings.logLevel;
    const logger = initializeLogger({ level });
    const fail = (message: string): number => {
        errors.write(message + '\n');
        return 1;
    };

    try {
        for (const warning of warnings) {
            logger.warn('Ignoring invalid setting', { variable: warning.variable, value: warning.value });
        }

        let content: string;
        try {
            content = fs.readFileSync(file, 'utf8');
        } catch (error) {
            logger.debug('Failed to read request file', { file, error: errorMessage(error) });
            return fail(`cannot open file at: ${file}`);
        }

        const directory = path.dirname(path.resolve(file));
        const client = new HttpClient({}, settings);

        let requests: BuiltRequest<HttpClient>[];
        try {
            requests = parseRequests(content, client, directory);
        } catch (error) {
            if (error instanceof RequestFileError) {
                return fail(formatParseError(file, error));
            }
            throw error;
        }
        logger.debug('Parsed request file', { file, requests: requests.length, directory });

        try {
            await runRequests(requests, {
                verbose: options.verbose,
                writer: settings.saveResponses ? new ResponseWriter({ output: options.output }) : undefined,
            });
        } catch (error) {
            return fail(errorMessage(error));
        }
        return 0;
    } finally {
        disposeLogger();
    }
}

export async function main(argv: string[] = process.argv): Promise<void> {
    const program = createProgram();
    program.parse(argv);
    const [file] = program.args;
    process.exitCode = await runFile(file, program.opts<CliOptions>());
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
}
