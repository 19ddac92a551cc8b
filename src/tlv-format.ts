import { parse, type Tlv } from '@tomkp/ber-tlv';

// ANSI color codes for terminal output
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

/**
 * Which tag table applies: FCP/FCI templates, the ARL inside tag AB, or the
 * control reference template inside a user-authentication condition
 */
export type TagContext = 'fcp' | 'arl' | 'crt';

/**
 * Convert tag bytes to a single number for comparison
 */
function tagBytesToNumber(bytes: Uint8Array): number {
    let result = 0;
    for (const byte of bytes) {
        result = (result << 8) | byte;
    }
    return result;
}

export const FCP_TAGS = {
    '02': 'INTEGER',
    '30': 'SEQUENCE',
    '62': 'FCP_TEMPLATE',
    '6F': 'FCI_TEMPLATE',
    '80': 'FILE_SIZE',
    '81': 'DF_SIZE',
    '82': 'FILE_DESCRIPTOR',
    '83': 'FILE_ID',
    '84': 'DF_NAME',
    '88': 'SHORT_FILE_ID',
    '8A': 'LIFECYCLE_STATUS',
    AB: 'SECURITY_ATTRIBUTES',
} as const;

export const ARL_TAGS = {
    '80': 'ACCESS_MODE_BYTE',
    '81': 'DUMMY',
    '84': 'COMMAND',
    '90': 'ALWAYS',
    '97': 'NEVER',
    A4: 'USER_AUTH',
} as const;

export const CRT_TAGS = {
    '83': 'PIN_REFERENCE',
    '84': 'KEY_REFERENCE',
    '95': 'KEY_USAGE_QUALIFIER',
} as const;

const TAG_TABLES: Record<TagContext, Readonly<Record<string, string>>> = {
    fcp: FCP_TAGS,
    arl: ARL_TAGS,
    crt: CRT_TAGS,
};

/**
 * Get the human-readable name for a tag
 */
export function getTagName(tag: number, context: TagContext = 'fcp'): string {
    const tagHex = tag.toString(16).toUpperCase().padStart(2, '0');
    return TAG_TABLES[context][tagHex] ?? `UNKNOWN_${tagHex}`;
}

function childContext(tag: number, context: TagContext): TagContext {
    if (context === 'fcp' && tag === 0xab) return 'arl';
    if (context === 'arl' && tag === 0xa4) return 'crt';
    return context;
}

/**
 * Format numeric values (sizes, file ids) with their decimal value
 */
function formatValue(tagNum: number, context: TagContext, buffer: Buffer): string {
    const hex = buffer.toString('hex').toUpperCase();
    if (context === 'fcp' && (tagNum === 0x80 || tagNum === 0x81) && buffer.length > 0 && buffer.length <= 4) {
        return `${hex} ${DIM}(${String(buffer.readUIntBE(0, buffer.length))} bytes)${RESET}`;
    }
    if (context === 'fcp' && tagNum === 0x84) {
        const ascii = buffer.toString('latin1').replace(/[^\x20-\x7E]/g, '.');
        return `${hex} [${ascii}]`;
    }
    return hex;
}

function formatTlvData(data: Tlv, indent = 0, context: TagContext = 'fcp'): string {
    const tagNum = data.tag.bytes ? tagBytesToNumber(data.tag.bytes) : data.tag.number;
    const tagHex = tagNum.toString(16).toUpperCase().padStart(2, '0');
    const tagName = getTagName(tagNum, context);
    const prefix = '  '.repeat(indent);

    let result = `${prefix}${tagHex} (${tagName})`;

    if (data.children && data.children.length > 0) {
        result += ':\n';
        const nested = childContext(tagNum, context);
        for (const child of data.children) {
            result += formatTlvData(child, indent + 1, nested);
        }
    } else {
        const buffer = Buffer.from(data.value);
        result += buffer.length > 0 ? `: ${formatValue(tagNum, context, buffer)}\n` : '\n';
    }

    return result;
}

/**
 * Format a TLV blob (FCP, FCI, ARL or encoded signature) as a human-readable tree
 */
export function formatTlv(buffer: Buffer, context: TagContext = 'fcp'): string {
    const parsed = parse(buffer);
    if (parsed.length === 0) {
        return '';
    }
    return parsed.map((tlv) => formatTlvData(tlv, 0, context)).join('');
}
