import { lookupAclEntry } from './acl.js';
import {
    DF_ACCESS_MODES,
    EF_ACCESS_MODES,
    appendAccessRules,
    appendCommandRule,
    type CommandHeader,
} from './access-rules.js';
import { ArgumentError } from './errors.js';
import { TlvWriter } from './tlv.js';
import type { AccessCondition, FileDescriptor } from './types.js';

// FCP tags
export const FCP_TAG_START = 0x62;
export const FCP_TAG_EF_SIZE = 0x80;
export const FCP_TAG_DF_SIZE = 0x81;
export const FCP_TAG_DESCRIPTOR = 0x82;
export const FCP_TAG_FILEID = 0x83;
export const FCP_TAG_DF_NAME = 0x84;
export const FCP_TAG_EF_SFID = 0x88;
export const FCP_TAG_ARL = 0xab;

// File descriptor bytes
export const FCP_TYPE_BINARY_EF = 0x01;
export const FCP_TYPE_DF = 0x38;

/** Largest command data field a short APDU carries, plus header */
export const MAX_APDU_BUFFER_SIZE = 261;

const FCP_CAPACITY = 128;

/** PUT DATA (ECD), governed by the DF's update condition */
export const PUT_DATA_ECD_COMMAND: CommandHeader = [0x00, 0xda, 0x01, 0x6f];
/** PHASE CONTROL, toggling the DF between operational and administrative states */
export const PHASE_CONTROL_COMMAND: CommandHeader = [0x80, 0x10, 0x00, 0x00];
/** ACCUMULATE OBJECT DATA for a new object */
export const ACCUMULATE_NEW_COMMAND: CommandHeader = [0x80, 0x16, 0x01, 0x00];
/** ACCUMULATE OBJECT DATA appending to an existing object */
export const ACCUMULATE_APPEND_COMMAND: CommandHeader = [0x80, 0x16, 0x00, 0x00];

const ALWAYS: AccessCondition = { type: 'always' };

function uint16(value: number, what: string): Buffer {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
        throw new ArgumentError(`${what} ${String(value)} does not fit 16 bits`);
    }
    return Buffer.from([(value >> 8) & 0xff, value & 0xff]);
}

/**
 * Write the FCP content of a DF: descriptor, size, optional name and ARL.
 * The ARL always grants PHASE CONTROL and both ACCUMULATE OBJECT DATA forms,
 * whatever the ACL says.
 */
export function buildDfFcp(df: FileDescriptor, fcp: TlvWriter): void {
    const size = uint16(df.size, 'DF size');

    fcp.putTag1(FCP_TAG_DESCRIPTOR, FCP_TYPE_DF).putTag(FCP_TAG_DF_SIZE, size);
    if (df.name && df.name.length > 0) {
        fcp.putTag(FCP_TAG_DF_NAME, df.name);
    }

    const arl = new TlvWriter(DF_ACCESS_MODES.arlCapacity);

    const update = lookupAclEntry(df, 'update');
    if (update) {
        appendCommandRule(arl, PUT_DATA_ECD_COMMAND, update);
    }

    appendAccessRules(arl, df.acl, DF_ACCESS_MODES);

    appendCommandRule(arl, PHASE_CONTROL_COMMAND, ALWAYS);
    appendCommandRule(arl, ACCUMULATE_NEW_COMMAND, ALWAYS);
    appendCommandRule(arl, ACCUMULATE_APPEND_COMMAND, ALWAYS);

    fcp.putTag(FCP_TAG_ARL, arl.toBuffer());
}

/**
 * Write the FCP content of a transparent working EF
 */
export function buildEfFcp(ef: FileDescriptor, fcp: TlvWriter): void {
    const structure = ef.structure ?? 'transparent';
    if (structure !== 'transparent') {
        throw new ArgumentError(`Unsupported EF structure '${structure}'`);
    }

    const size = uint16(ef.size, 'EF size');

    fcp.putTag1(FCP_TAG_DESCRIPTOR, FCP_TYPE_BINARY_EF)
        .putTag(FCP_TAG_EF_SIZE, size)
        .putTag0(FCP_TAG_EF_SFID);

    const arl = new TlvWriter(EF_ACCESS_MODES.arlCapacity);
    appendAccessRules(arl, ef.acl, EF_ACCESS_MODES);

    fcp.putTag(FCP_TAG_ARL, arl.toBuffer());
}

/**
 * Build the FCP template sent with CREATE FILE
 * @param capacity - Size of the output buffer
 * @returns `62 len <content> 83 02 <file id>`
 */
export function buildFcp(file: FileDescriptor, capacity = MAX_APDU_BUFFER_SIZE): Buffer {
    const fileId = uint16(file.id, 'File id');
    const fcp = new TlvWriter(FCP_CAPACITY);

    switch (file.kind) {
        case 'df':
            buildDfFcp(file, fcp);
            break;
        case 'working-ef':
            buildEfFcp(file, fcp);
            break;
        default:
            throw new ArgumentError(`Unsupported file kind '${file.kind}'`);
    }

    fcp.putTag(FCP_TAG_FILEID, fileId);

    return new TlvWriter(capacity).putTag(FCP_TAG_START, fcp.toBuffer()).toBuffer();
}
