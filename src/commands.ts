/**
 * CLI command implementations
 */

import { EF_ACCESS_MODES, DF_ACCESS_MODES, buildArl, parseArl, type AccessModeTable } from './access-rules.js';
import { reencodeEcSignature } from './ec-signature.js';
import { CardOsError } from './errors.js';
import { buildFcp } from './fcp.js';
import { readTlvHeader } from './tlv.js';
import { formatTlv } from './tlv-format.js';
import type { AccessCondition, AccessOperation, AclEntry, CardGeneration, FileDescriptor } from './types.js';

/**
 * Context for command execution
 */
export interface CommandContext {
    output: (message: string) => void;
    error: (message: string) => void;
    format: string | undefined;
    verbose: boolean | undefined;
    generation: CardGeneration | undefined;
    name: string | undefined;
}

const OPERATIONS: readonly AccessOperation[] = ['delete', 'activate', 'deactivate', 'write', 'update', 'read', 'create'];

/**
 * Parse hex string to buffer
 */
export function parseHex(hex: string): Buffer | null {
    // Remove any spaces, dashes or colons
    const cleaned = hex.replace(/[\s:-]/g, '');

    if (!/^[0-9a-fA-F]*$/.test(cleaned) || cleaned.length % 2 !== 0) {
        return null;
    }

    return Buffer.from(cleaned, 'hex');
}

function tableForKind(kind: string): AccessModeTable | null {
    switch (kind) {
        case 'df':
            return DF_ACCESS_MODES;
        case 'ef':
            return EF_ACCESS_MODES;
        default:
            return null;
    }
}

function isOperation(value: string): value is AccessOperation {
    return OPERATIONS.some((op) => op === value);
}

/**
 * Parse `always`, `never` or `pin:<ref>` (decimal or 0x-prefixed hex)
 */
export function parseCondition(text: string): AccessCondition | null {
    if (text === 'always' || text === 'never') {
        return { type: text };
    }
    const match = /^pin:(0x[0-9a-fA-F]+|\d+)$/.exec(text);
    const ref = match?.[1];
    if (ref === undefined) {
        return null;
    }
    return { type: 'pin', keyReference: Number(ref) };
}

/**
 * Parse `operation=condition` arguments into ACL entries
 */
export function parseAclArgs(args: readonly string[]): AclEntry[] | string {
    const entries: AclEntry[] = [];
    for (const arg of args) {
        const [operation = '', conditionText = ''] = arg.split('=', 2);
        if (!isOperation(operation)) {
            return `Unknown operation '${operation}'`;
        }
        const condition = parseCondition(conditionText);
        if (!condition) {
            return `Invalid condition '${conditionText}' (expected always, never or pin:<ref>)`;
        }
        entries.push({ operation, condition });
    }
    return entries;
}

/**
 * Describe a condition for text output
 */
export function describeCondition(condition: AccessCondition): string {
    if (condition.type === 'pin') {
        return `pin 0x${condition.keyReference.toString(16).padStart(2, '0')}`;
    }
    return condition.type;
}

/**
 * Run a codec operation, reporting codec errors instead of throwing them
 */
function runCodec(ctx: CommandContext, action: () => number): number {
    try {
        return action();
    } catch (error: unknown) {
        if (error instanceof CardOsError) {
            ctx.error(`${error.name}: ${error.message}`);
            return 1;
        }
        throw error;
    }
}

/**
 * Decode an access rule list
 */
export function decodeArl(ctx: CommandContext, kind: string, hex: string): number {
    const table = tableForKind(kind);
    if (!table) {
        ctx.error(`Unknown file kind '${kind}' (expected df or ef)`);
        return 1;
    }
    const arl = parseHex(hex);
    if (!arl) {
        ctx.error('Invalid hex data');
        return 1;
    }

    return runCodec(ctx, () => {
        const entries = parseArl(arl, table);
        if (ctx.format === 'json') {
            ctx.output(JSON.stringify(entries, null, 2));
            return 0;
        }
        if (entries.length === 0) {
            ctx.output('No access rules');
            return 0;
        }
        for (const entry of entries) {
            ctx.output(`  ${entry.operation}: ${describeCondition(entry.condition)}`);
        }
        return 0;
    });
}

/**
 * Encode an access rule list from `operation=condition` arguments
 */
export function encodeArl(ctx: CommandContext, kind: string, aclArgs: readonly string[]): number {
    const table = tableForKind(kind);
    if (!table) {
        ctx.error(`Unknown file kind '${kind}' (expected df or ef)`);
        return 1;
    }
    const acl = parseAclArgs(aclArgs);
    if (typeof acl === 'string') {
        ctx.error(acl);
        return 1;
    }

    return runCodec(ctx, () => {
        const arl = buildArl(acl, table);
        if (ctx.format === 'json') {
            ctx.output(JSON.stringify({ arl: arl.toString('hex') }, null, 2));
        } else {
            ctx.output(arl.toString('hex'));
        }
        return 0;
    });
}

/**
 * Build the FCP for CREATE FILE
 */
export function buildFcpCommand(
    ctx: CommandContext,
    kind: string,
    idHex: string,
    sizeArg: string,
    aclArgs: readonly string[]
): number {
    if (kind !== 'df' && kind !== 'ef') {
        ctx.error(`Unknown file kind '${kind}' (expected df or ef)`);
        return 1;
    }
    const id = /^[0-9a-fA-F]{1,8}$/.test(idHex) ? parseInt(idHex, 16) : NaN;
    const size = /^\d+$/.test(sizeArg) ? parseInt(sizeArg, 10) : NaN;
    if (Number.isNaN(id) || Number.isNaN(size)) {
        ctx.error('File id must be hex and size a decimal number');
        return 1;
    }
    const acl = parseAclArgs(aclArgs);
    if (typeof acl === 'string') {
        ctx.error(acl);
        return 1;
    }
    const name = ctx.name !== undefined ? parseHex(ctx.name) : undefined;
    if (name === null) {
        ctx.error('Invalid hex DF name');
        return 1;
    }

    const file: FileDescriptor = {
        kind: kind === 'df' ? 'df' : 'working-ef',
        id,
        size,
        name,
        structure: kind === 'ef' ? 'transparent' : undefined,
        acl,
    };

    return runCodec(ctx, () => {
        const fcp = buildFcp(file);
        if (ctx.format === 'json') {
            ctx.output(JSON.stringify({ fcp: fcp.toString('hex') }, null, 2));
            return 0;
        }
        ctx.output(fcp.toString('hex'));
        if (ctx.verbose) {
            ctx.output(formatTlv(fcp));
        }
        return 0;
    });
}

/**
 * Re-encode a raw EC signature as DER
 */
export function ecSignature(ctx: CommandContext, hex: string): number {
    const raw = parseHex(hex);
    if (!raw) {
        ctx.error('Invalid hex data');
        return 1;
    }
    const generation = ctx.generation ?? 'v5.3';

    return runCodec(ctx, () => {
        const encoded = reencodeEcSignature(raw, generation);
        if (ctx.format === 'json') {
            ctx.output(JSON.stringify({ generation, signature: encoded.toString('hex') }, null, 2));
        } else {
            ctx.output(encoded.toString('hex'));
        }
        return 0;
    });
}

/**
 * Show a TLV blob as a tree
 */
export function inspect(ctx: CommandContext, hex: string): number {
    const data = parseHex(hex);
    if (!data || data.length === 0) {
        ctx.error('Invalid hex data');
        return 1;
    }

    return runCodec(ctx, () => {
        // Top-level records must span the input exactly
        let offset = 0;
        while (offset < data.length) {
            const header = readTlvHeader(data, offset);
            offset = header.valueOffset + header.length;
        }
        ctx.output(formatTlv(data).trimEnd());
        return 0;
    });
}
