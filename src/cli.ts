#!/usr/bin/env node
import { parseArgs as nodeParseArgs } from 'node:util';
import { readFileSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import {
    decodeArl,
    encodeArl,
    buildFcpCommand,
    ecSignature,
    inspect,
    type CommandContext,
} from './commands.js';
import type { CardGeneration } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface ParsedOptions {
    help: boolean;
    version: boolean;
    format: string | undefined;
    verbose: boolean;
    generation: string | undefined;
    name: string | undefined;
}

interface ParsedArgs {
    options: ParsedOptions;
    positionals: string[];
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
    const { values, positionals } = nodeParseArgs({
        args,
        options: {
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean', short: 'v' },
            format: { type: 'string', short: 'f' },
            verbose: { type: 'boolean' },
            generation: { type: 'string', short: 'g' },
            name: { type: 'string', short: 'n' },
        },
        allowPositionals: true,
    });

    return {
        options: {
            help: values.help ?? false,
            version: values.version ?? false,
            format: values.format,
            verbose: values.verbose ?? false,
            generation: values.generation,
            name: values.name,
        },
        positionals,
    };
}

/**
 * Show help text
 */
export function showHelp(): string {
    return `cardos5 - CardOS 5 access rule, FCP and signature codec

Usage: cardos5 [options] <command> [arguments]

Commands:
  decode-arl <df|ef> <hex>              Decode an access rule list
  encode-arl <df|ef> [op=cond ...]      Encode an access rule list
  build-fcp <df|ef> <id> <size> [op=cond ...]
                                        Build the FCP sent with CREATE FILE
  ec-sig <hex>                          Re-encode a raw EC signature as DER
  inspect <hex>                         Show a TLV blob as a tree

Conditions: always, never, pin:<ref>
Operations: delete, activate, deactivate, write, update, read, create

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  -f, --format <type>     Output format: text, json (default: text)
  --verbose               Show detailed output
  -g, --generation <gen>  Card generation: v5.0, v5.3 (default: v5.3)
  -n, --name <hex>        DF name for build-fcp

Examples:
  cardos5 decode-arl ef 80014090008001019000
  cardos5 encode-arl ef read=always update=pin:1
  cardos5 build-fcp df 5015 512 create=pin:0x01 --name a000000063
  cardos5 ec-sig --generation v5.0 <hex>
  cardos5 inspect 6203820101
`;
}

/**
 * Get package version
 */
export function showVersion(): string {
    try {
        const packagePath = join(__dirname, '..', 'package.json');
        const pkg: unknown = JSON.parse(readFileSync(packagePath, 'utf8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
        return '0.0.0';
    } catch {
        return '0.0.0';
    }
}

function isGeneration(value: string): value is CardGeneration {
    return value === 'v5.0' || value === 'v5.3';
}

/**
 * Create command context from parsed options
 */
function createContext(options: ParsedOptions): CommandContext {
    return {
        output: (msg: string) => {
            console.log(msg);
        },
        error: (msg: string) => {
            console.error(msg);
        },
        format: options.format,
        verbose: options.verbose,
        generation: options.generation !== undefined && isGeneration(options.generation) ? options.generation : undefined,
        name: options.name,
    };
}

/**
 * Run a command and handle errors
 */
export function runCommand(command: string, args: string[], ctx: CommandContext): number {
    switch (command) {
        case 'decode-arl': {
            const [kind, hex] = args;
            if (!kind || hex === undefined) {
                ctx.error('Usage: cardos5 decode-arl <df|ef> <hex>');
                return 1;
            }
            return decodeArl(ctx, kind, hex);
        }
        case 'encode-arl': {
            const [kind, ...acl] = args;
            if (!kind) {
                ctx.error('Usage: cardos5 encode-arl <df|ef> [op=cond ...]');
                return 1;
            }
            return encodeArl(ctx, kind, acl);
        }
        case 'build-fcp': {
            const [kind, id, size, ...acl] = args;
            if (!kind || !id || !size) {
                ctx.error('Usage: cardos5 build-fcp <df|ef> <id> <size> [op=cond ...]');
                return 1;
            }
            return buildFcpCommand(ctx, kind, id, size, acl);
        }
        case 'ec-sig': {
            const hex = args[0];
            if (!hex) {
                ctx.error('Usage: cardos5 ec-sig <hex>');
                return 1;
            }
            return ecSignature(ctx, hex);
        }
        case 'inspect': {
            const hex = args[0];
            if (!hex) {
                ctx.error('Usage: cardos5 inspect <hex>');
                return 1;
            }
            return inspect(ctx, hex);
        }
        default:
            ctx.error(`Unknown command '${command}'`);
            return 1;
    }
}

/**
 * Main CLI entry point
 */
function main(): void {
    const args = parseArgs(process.argv.slice(2));

    if (args.options.help) {
        console.log(showHelp());
        return;
    }

    if (args.options.version) {
        console.log(showVersion());
        return;
    }

    if (args.options.generation !== undefined && !isGeneration(args.options.generation)) {
        console.error(`Unknown generation '${args.options.generation}' (expected v5.0 or v5.3)`);
        process.exitCode = 1;
        return;
    }

    const command = args.positionals[0];
    if (!command) {
        console.log(showHelp());
        process.exitCode = 1;
        return;
    }

    const ctx = createContext(args.options);
    process.exitCode = runCommand(command, args.positionals.slice(1), ctx);
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] !== undefined && realpathSync(process.argv[1]) === __filename) {
    try {
        main();
    } catch (error: unknown) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
    }
}
