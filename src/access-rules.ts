import { lookupAclEntry } from './acl.js';
import { ArgumentError, LengthError, UnsupportedByCardError } from './errors.js';
import { TlvWriter } from './tlv.js';
import type { AccessCondition, AccessOperation, AclEntry, FileKind } from './types.js';

// ARL record tags
export const ARL_ACCESS_MODE_BYTE_TAG = 0x80;
export const ARL_ACCESS_MODE_BYTE_LEN = 0x01;
export const ARL_DUMMY_TAG = 0x81;
export const ARL_DUMMY_LEN = 0x00;
export const ARL_COMMAND_TAG = 0x84;
export const ARL_COMMAND_LEN = 0x04;
export const ARL_ALWAYS_TAG = 0x90;
export const ARL_ALWAYS_LEN = 0x00;
export const ARL_NEVER_TAG = 0x97;
export const ARL_NEVER_LEN = 0x00;
export const ARL_USER_AUTH_TAG = 0xa4;
export const ARL_USER_AUTH_LEN = 0x06;

// Control reference template tags
export const CRT_TAG_PINREF = 0x83;
export const CRT_LEN_PINREF = 0x01;
export const CRT_TAG_KEYREF = 0x84;
export const CRT_TAG_KUQ = 0x95;
export const CRT_LEN_KUQ = 0x01;

// Key usage qualifiers
export const KUQ_USER_AUTH = 0x08;
export const KUQ_DECRYPT = 0x40;

/** PIN reference bit the card uses for retry tracking */
export const BACKTRACK_PIN = 0x80;
export const BACKTRACK_MASK = 0x7f;

/**
 * ARL the card reports for a freshly created MF ("allow everything").
 * Only the length and the trailing dummy + always records are significant.
 */
export const ROOT_SENTINEL: readonly number[] = [
    ARL_ACCESS_MODE_BYTE_TAG, ARL_ACCESS_MODE_BYTE_LEN, 0xff, ARL_ALWAYS_TAG, ARL_ALWAYS_LEN,
    ARL_DUMMY_TAG, ARL_DUMMY_LEN, ARL_ALWAYS_TAG, ARL_ALWAYS_LEN,
];

/**
 * CLA INS P1 P2 of the command a command rule governs
 */
export type CommandHeader = readonly [number, number, number, number];

export interface AccessModeRule {
    readonly code: number;
    readonly name: string;
    /** Operation governed, or undefined when the card enforces the rule on its own */
    readonly operation?: AccessOperation | undefined;
}

export interface AccessModeTable {
    readonly kind: 'df' | 'working-ef';
    /** Rows in the order they are written to the card */
    readonly rules: readonly AccessModeRule[];
    /** Size of the ARL buffer used when creating files of this kind */
    readonly arlCapacity: number;
    readonly acceptsCommandRules: boolean;
    readonly acceptsRootSentinel: boolean;
}

function defineTable(table: AccessModeTable): AccessModeTable {
    const codes = new Set(table.rules.map((rule) => rule.code));
    if (codes.size !== table.rules.length) {
        throw new Error(`Duplicate access mode code in ${table.kind} table`);
    }
    table.rules.forEach((rule) => Object.freeze(rule));
    Object.freeze(table.rules);
    return Object.freeze(table);
}

export const DF_ACCESS_MODES = defineTable({
    kind: 'df',
    rules: [
        { code: 0x40, name: 'DELETE_SELF', operation: 'delete' },
        { code: 0x20, name: 'TERMINATE' },
        { code: 0x10, name: 'ACTIVATE', operation: 'activate' },
        { code: 0x08, name: 'DEACTIVATE', operation: 'deactivate' },
        { code: 0x04, name: 'CREATE_DF_FILE', operation: 'create' },
        { code: 0x02, name: 'CREATE_EF_FILE', operation: 'create' },
        { code: 0x01, name: 'DELETE_CHILD' },
        { code: 0x81, name: 'PUT_DATA_OCI', operation: 'create' },
        { code: 0x82, name: 'PUT_DATA_OCI_UPDATE', operation: 'update' },
        { code: 0x83, name: 'LOAD_EXECUTABLE' },
        { code: 0x84, name: 'PUT_DATA_FCI', operation: 'create' },
    ],
    arlCapacity: 128,
    acceptsCommandRules: true,
    acceptsRootSentinel: true,
});

export const EF_ACCESS_MODES = defineTable({
    kind: 'working-ef',
    rules: [
        { code: 0x40, name: 'DELETE', operation: 'delete' },
        { code: 0x20, name: 'TERMINATE' },
        { code: 0x10, name: 'ACTIVATE', operation: 'activate' },
        { code: 0x08, name: 'DEACTIVATE', operation: 'deactivate' },
        { code: 0x04, name: 'WRITE', operation: 'write' },
        { code: 0x02, name: 'UPDATE', operation: 'update' },
        { code: 0x01, name: 'READ', operation: 'read' },
        { code: 0x85, name: 'INCREASE' },
        { code: 0x86, name: 'DECREASE' },
    ],
    arlCapacity: 96,
    acceptsCommandRules: false,
    acceptsRootSentinel: false,
});

/**
 * Access mode table for a file kind
 */
export function accessModeTableFor(kind: FileKind): AccessModeTable {
    switch (kind) {
        case 'df':
            return DF_ACCESS_MODES;
        case 'working-ef':
            return EF_ACCESS_MODES;
        default:
            throw new ArgumentError(`No access rules for file kind '${kind}'`);
    }
}

const ALWAYS: AccessCondition = { type: 'always' };
const NEVER: AccessCondition = { type: 'never' };

function validateCondition(condition: AccessCondition): void {
    if (condition.type !== 'pin') return;
    const ref = condition.keyReference;
    if (!Number.isInteger(ref) || ref < 0 || ref > 0xff) {
        throw new ArgumentError(`Key reference ${String(ref)} does not fit one byte`);
    }
    if ((ref & BACKTRACK_PIN) !== 0) {
        throw new ArgumentError(`Key reference 0x${ref.toString(16)} has the backtrack bit set`);
    }
}

/**
 * Append an always, never or user-authentication condition
 */
export function appendCondition(writer: TlvWriter, condition: AccessCondition): void {
    switch (condition.type) {
        case 'always':
            writer.putTag0(ARL_ALWAYS_TAG);
            return;
        case 'never':
            writer.putTag0(ARL_NEVER_TAG);
            return;
        case 'pin': {
            validateCondition(condition);
            const crt = new TlvWriter(16)
                .putTag1(CRT_TAG_PINREF, condition.keyReference)
                .putTag1(CRT_TAG_KUQ, KUQ_USER_AUTH);
            writer.putTag(ARL_USER_AUTH_TAG, crt.toBuffer());
            return;
        }
    }
}

/**
 * Append a rule for a raw card command, independent of any access mode byte
 */
export function appendCommandRule(writer: TlvWriter, command: CommandHeader, condition: AccessCondition): void {
    validateCondition(condition);
    writer.putTag(ARL_COMMAND_TAG, Buffer.from(command));
    appendCondition(writer, condition);
}

/**
 * Append one access-mode-byte rule per table row. Rows the ACL does not
 * mention, and rows without an operation, are written as never.
 */
export function appendAccessRules(writer: TlvWriter, acl: readonly AclEntry[], table: AccessModeTable): void {
    for (const entry of acl) {
        if (!table.rules.some((rule) => rule.operation === entry.operation)) {
            throw new ArgumentError(`Operation '${entry.operation}' has no access rule on a ${table.kind}`);
        }
        validateCondition(entry.condition);
    }

    for (const rule of table.rules) {
        const condition = rule.operation ? lookupAclEntry({ acl }, rule.operation) ?? NEVER : NEVER;
        writer.putTag1(ARL_ACCESS_MODE_BYTE_TAG, rule.code);
        appendCondition(writer, condition);
    }
}

/**
 * Encode an ACL as an access rule list
 */
export function buildArl(acl: readonly AclEntry[], table: AccessModeTable, capacity = table.arlCapacity): Buffer {
    const writer = new TlvWriter(capacity);
    appendAccessRules(writer, acl, table);
    return writer.toBuffer();
}

function byteAt(arl: Uint8Array, index: number): number {
    const value = arl[index];
    if (value === undefined) {
        throw new LengthError(`ARL truncated at offset ${String(index)}`);
    }
    return value;
}

interface DecodedCondition {
    condition: AccessCondition;
    next: number;
}

function readCondition(arl: Uint8Array, offset: number): DecodedCondition {
    const tag = byteAt(arl, offset);
    const length = byteAt(arl, offset + 1);

    switch (tag) {
        case ARL_ALWAYS_TAG:
            if (length !== ARL_ALWAYS_LEN) {
                throw new UnsupportedByCardError(`Always condition with length ${String(length)}`);
            }
            return { condition: ALWAYS, next: offset + 2 };
        case ARL_NEVER_TAG:
            if (length !== ARL_NEVER_LEN) {
                throw new UnsupportedByCardError(`Never condition with length ${String(length)}`);
            }
            return { condition: NEVER, next: offset + 2 };
        case ARL_USER_AUTH_TAG: {
            if (arl.length - offset < 2 + ARL_USER_AUTH_LEN) {
                throw new LengthError('Truncated user authentication condition');
            }
            if (
                length !== ARL_USER_AUTH_LEN ||
                arl[offset + 2] !== CRT_TAG_PINREF ||
                arl[offset + 3] !== CRT_LEN_PINREF ||
                arl[offset + 5] !== CRT_TAG_KUQ ||
                arl[offset + 6] !== CRT_LEN_KUQ ||
                arl[offset + 7] !== KUQ_USER_AUTH
            ) {
                throw new UnsupportedByCardError('Unsupported user authentication template');
            }
            const keyReference = byteAt(arl, offset + 4) & BACKTRACK_MASK;
            return { condition: { type: 'pin', keyReference }, next: offset + 2 + ARL_USER_AUTH_LEN };
        }
        default:
            throw new UnsupportedByCardError(`Unsupported condition tag 0x${tag.toString(16)}`);
    }
}

function isRootSentinel(arl: Uint8Array): boolean {
    return (
        arl.length === ROOT_SENTINEL.length &&
        arl[5] === ARL_DUMMY_TAG &&
        arl[6] === ARL_DUMMY_LEN &&
        arl[7] === ARL_ALWAYS_TAG &&
        arl[8] === ARL_ALWAYS_LEN
    );
}

/**
 * Decode an access rule list into at most one entry per operation.
 * A later rule for the same operation replaces an earlier one.
 */
export function parseArl(arl: Uint8Array, table: AccessModeTable): AclEntry[] {
    const conditions = new Map<AccessOperation, AccessCondition>();

    if (table.acceptsRootSentinel && isRootSentinel(arl)) {
        for (const rule of table.rules) {
            if (rule.operation) {
                conditions.set(rule.operation, ALWAYS);
            }
        }
        return toEntries(conditions);
    }

    let offset = 0;
    while (arl.length - offset >= 5) {
        if (table.acceptsCommandRules && arl[offset] === ARL_COMMAND_TAG) {
            // Rules for raw commands (e.g. ACCUMULATE OBJECT DATA) carry no operation
            if (arl.length - offset < 8) {
                throw new LengthError('Truncated command rule');
            }
            if (arl[offset + 1] !== ARL_COMMAND_LEN) {
                throw new UnsupportedByCardError(`Command rule with length ${String(arl[offset + 1])}`);
            }
            // The condition is skipped unread; only its extent is checked
            const conditionEnd = offset + 2 + ARL_COMMAND_LEN + 2 + byteAt(arl, offset + 7);
            if (conditionEnd > arl.length) {
                throw new LengthError('Truncated command rule condition');
            }
            offset = conditionEnd;
            continue;
        }

        if (arl[offset] !== ARL_ACCESS_MODE_BYTE_TAG || arl[offset + 1] !== ARL_ACCESS_MODE_BYTE_LEN) {
            throw new UnsupportedByCardError(`Unsupported ARL record tag 0x${byteAt(arl, offset).toString(16)}`);
        }

        const code = byteAt(arl, offset + 2);
        const rule = table.rules.find((r) => r.code === code);
        if (!rule) {
            throw new UnsupportedByCardError(`Unknown access mode byte 0x${code.toString(16)} for ${table.kind}`);
        }

        const { condition, next } = readCondition(arl, offset + 3);
        if (rule.operation) {
            conditions.set(rule.operation, condition);
        }
        offset = next;
    }

    if (offset !== arl.length) {
        throw new LengthError(`${String(arl.length - offset)} trailing bytes in ARL`);
    }

    return toEntries(conditions);
}

function toEntries(conditions: Map<AccessOperation, AccessCondition>): AclEntry[] {
    return [...conditions].map(([operation, condition]) => ({ operation, condition }));
}
