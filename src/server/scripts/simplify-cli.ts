#!/usr/bin/env node
/**
 * Number Simplifier CLI
 *
 * Prints German text with simplified numbers.
 *
 * Usage:
 *   tsx src/server/scripts/simplify-cli.ts [options] [text ...]
 *
 * Options:
 *   --stdin     Read the text from standard input
 *   --json      Print { input, output, replacements } objects instead of plain text
 *   --help      Show this help
 *
 * Without text and without --stdin the built-in example sentences are simplified.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { NumberSimplifier } from '../services/simplification/index.js';
import { logger } from '../utils/logger.js';

const EXAMPLES_URL = new URL('../../../data/example-sentences.json', import.meta.url);

const examplesSchema = z.array(z.string());

export interface CliOptions {
    json: boolean;
    stdin: boolean;
    help: boolean;
    texts: string[];
}

export interface CliIO {
    write: (line: string) => void;
    readStdin: () => Promise<string>;
}

const KNOWN_FLAGS = new Set(['--json', '--stdin', '--help', '-h']);

export function parseCliArgs(args: string[]): CliOptions {
    return {
        json: args.includes('--json'),
        stdin: args.includes('--stdin'),
        help: args.includes('--help') || args.includes('-h'),
        texts: args.filter(arg => !KNOWN_FLAGS.has(arg)),
    };
}

export function loadExampleSentences(url: URL = EXAMPLES_URL): string[] {
    return examplesSchema.parse(JSON.parse(readFileSync(url, 'utf-8')));
}

function printHelp(io: CliIO) {
    io.write('Usage: simplify-cli [--stdin] [--json] [text ...]');
    io.write('');
    io.write('  --stdin   read the text from standard input');
    io.write('  --json    print input, output and replacements as JSON');
    io.write('');
    io.write('Without text, the built-in example sentences are simplified.');
}

export async function runCli(args: string[], io: CliIO, simplifier = new NumberSimplifier()): Promise<number> {
    const options = parseCliArgs(args);

    if (options.help) {
        printHelp(io);
        return 0;
    }

    let inputs: string[];
    if (options.stdin) {
        inputs = [await io.readStdin()];
    } else if (options.texts.length > 0) {
        inputs = options.texts;
    } else {
        inputs = loadExampleSentences();
    }

    for (const input of inputs) {
        if (options.json) {
            const result = simplifier.simplifyWithDetails(input);
            io.write(JSON.stringify({ input, output: result.text, replacements: result.replacements }));
        } else {
            io.write(simplifier.simplify(input));
        }
    }

    return 0;
}

async function readStdin(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks).toString('utf-8');
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    runCli(process.argv.slice(2), { write: line => console.log(line), readStdin })
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            logger.fatal({ error }, 'simplify-cli failed');
            process.exitCode = 1;
        });
}
