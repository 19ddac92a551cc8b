/**
 * CardOS 5 codec demo
 *
 * Builds the FCP for an application DF and one of its EFs, prints both
 * as TLV trees, then decodes the EF's access rules back into an ACL.
 */

import {
    EF_ACCESS_MODES,
    buildFcp,
    findTag,
    formatTlv,
    parseArl,
    reencodeEcSignature,
    type FileDescriptor,
} from '../src/index.js';

const appDf: FileDescriptor = {
    kind: 'df',
    id: 0x5015,
    size: 0x1000,
    name: Buffer.from('a000000063', 'hex'),
    acl: [
        { operation: 'create', condition: { type: 'pin', keyReference: 0x01 } },
        { operation: 'delete', condition: { type: 'never' } },
    ],
};

const odf: FileDescriptor = {
    kind: 'working-ef',
    id: 0x5031,
    size: 0x0100,
    acl: [
        { operation: 'read', condition: { type: 'always' } },
        { operation: 'update', condition: { type: 'pin', keyReference: 0x01 } },
    ],
};

for (const file of [appDf, odf]) {
    const fcp = buildFcp(file);
    console.log(`FCP for ${file.id.toString(16)} (${String(fcp.length)} bytes):`);
    console.log(formatTlv(fcp));
}

const odfFcp = buildFcp(odf);
const template = findTag(odfFcp, 0x62);
const arl = template ? findTag(template, 0xab) : undefined;
if (arl) {
    console.log('ODF access rules:');
    for (const entry of parseArl(arl, EF_ACCESS_MODES)) {
        console.log(`  ${entry.operation}: ${JSON.stringify(entry.condition)}`);
    }
}

const raw = Buffer.concat([Buffer.alloc(32, 0x8c), Buffer.alloc(32, 0x3e)]);
console.log(`\nDER signature: ${reencodeEcSignature(raw, 'v5.3').toString('hex')}`);
