import { describe, it, expect } from 'vitest';
import {
    DF_ACCESS_MODES,
    EF_ACCESS_MODES,
    ROOT_SENTINEL,
    accessModeTableFor,
    appendCommandRule,
    appendCondition,
    buildArl,
    parseArl,
} from '../src/access-rules.js';
import { ArgumentError, CapacityError, LengthError, UnsupportedByCardError } from '../src/errors.js';
import { buildFcp } from '../src/fcp.js';
import { TlvWriter, findTag } from '../src/tlv.js';
import type { AccessCondition, AclEntry } from '../src/types.js';

function hex(value: string): Buffer {
    return Buffer.from(value.replace(/\s/g, ''), 'hex');
}

describe('access mode tables', () => {
    it('should be frozen', () => {
        expect(Object.isFrozen(DF_ACCESS_MODES)).toBe(true);
        expect(Object.isFrozen(DF_ACCESS_MODES.rules)).toBe(true);
        expect(Object.isFrozen(EF_ACCESS_MODES.rules[0])).toBe(true);
    });

    it('should list rows in card order', () => {
        expect(DF_ACCESS_MODES.rules.map((rule) => rule.code)).toEqual([
            0x40, 0x20, 0x10, 0x08, 0x04, 0x02, 0x01, 0x81, 0x82, 0x83, 0x84,
        ]);
        expect(EF_ACCESS_MODES.rules.map((rule) => rule.code)).toEqual([
            0x40, 0x20, 0x10, 0x08, 0x04, 0x02, 0x01, 0x85, 0x86,
        ]);
    });

    it('should pick the table by file kind', () => {
        expect(accessModeTableFor('df')).toBe(DF_ACCESS_MODES);
        expect(accessModeTableFor('working-ef')).toBe(EF_ACCESS_MODES);
    });

    it('should have no table for internal EFs', () => {
        expect(() => accessModeTableFor('internal-ef')).toThrow(ArgumentError);
    });
});

describe('appendCondition', () => {
    it('should write always and never', () => {
        const writer = new TlvWriter(8);
        appendCondition(writer, { type: 'always' });
        appendCondition(writer, { type: 'never' });
        expect(writer.toBuffer().toString('hex')).toBe('90009700');
    });

    it('should write a user authentication template', () => {
        const writer = new TlvWriter(8);
        appendCondition(writer, { type: 'pin', keyReference: 0x7f });
        expect(writer.toBuffer().toString('hex')).toBe('a40683017f950108');
    });

    it('should reject a reference with the backtrack bit', () => {
        const writer = new TlvWriter(8);
        expect(() => appendCondition(writer, { type: 'pin', keyReference: 0x81 })).toThrow(ArgumentError);
        expect(writer.bytesUsed).toBe(0);
    });
});

describe('appendCommandRule', () => {
    it('should write the command header and condition', () => {
        const writer = new TlvWriter(16);
        appendCommandRule(writer, [0x80, 0x10, 0x00, 0x00], { type: 'always' });
        expect(writer.toBuffer().toString('hex')).toBe('840480100000' + '9000');
    });
});

describe('buildArl', () => {
    it('should write every EF row, never where the ACL is silent', () => {
        const arl = buildArl([{ operation: 'read', condition: { type: 'always' } }], EF_ACCESS_MODES);
        expect(arl.toString('hex')).toBe(
            '8001409700' +
                '8001209700' +
                '8001109700' +
                '8001089700' +
                '8001049700' +
                '8001029700' +
                '8001019000' +
                '8001859700' +
                '8001869700'
        );
    });

    it('should write a PIN condition on its row', () => {
        const arl = buildArl([{ operation: 'update', condition: { type: 'pin', keyReference: 1 } }], EF_ACCESS_MODES);
        expect(arl.subarray(25, 36).toString('hex')).toBe('800102' + 'a406830101950108');
        expect(arl.length).toBe(9 * 5 + 6);
    });

    it('should use the first entry for an operation', () => {
        const arl = buildArl(
            [
                { operation: 'read', condition: { type: 'always' } },
                { operation: 'read', condition: { type: 'never' } },
            ],
            EF_ACCESS_MODES
        );
        expect(arl.subarray(30, 35).toString('hex')).toBe('8001019000');
    });

    it('should write the create condition on every create row of a DF', () => {
        const arl = buildArl([{ operation: 'create', condition: { type: 'always' } }], DF_ACCESS_MODES);
        expect(arl.toString('hex')).toBe(
            '8001409700' +
                '8001209700' +
                '8001109700' +
                '8001089700' +
                '8001049000' +
                '8001029000' +
                '8001019700' +
                '8001819000' +
                '8001829700' +
                '8001839700' +
                '8001849000'
        );
    });

    it('should reject operations the table does not govern', () => {
        expect(() => buildArl([{ operation: 'write', condition: { type: 'always' } }], DF_ACCESS_MODES)).toThrow(
            "Operation 'write' has no access rule on a df"
        );
    });

    it('should reject the backtrack bit', () => {
        expect(() =>
            buildArl([{ operation: 'read', condition: { type: 'pin', keyReference: 0x81 } }], EF_ACCESS_MODES)
        ).toThrow(ArgumentError);
    });

    it('should reject references wider than a byte', () => {
        expect(() =>
            buildArl([{ operation: 'read', condition: { type: 'pin', keyReference: 0x100 } }], EF_ACCESS_MODES)
        ).toThrow(ArgumentError);
    });

    it('should fail when the rows do not fit the capacity', () => {
        expect(() => buildArl([], EF_ACCESS_MODES, 10)).toThrow(CapacityError);
    });
});

describe('parseArl', () => {
    it('should round-trip an EF ACL with absent operations as never', () => {
        const acl: AclEntry[] = [
            { operation: 'read', condition: { type: 'always' } },
            { operation: 'update', condition: { type: 'pin', keyReference: 1 } },
            { operation: 'delete', condition: { type: 'never' } },
        ];
        expect(parseArl(buildArl(acl, EF_ACCESS_MODES), EF_ACCESS_MODES)).toEqual([
            { operation: 'delete', condition: { type: 'never' } },
            { operation: 'activate', condition: { type: 'never' } },
            { operation: 'deactivate', condition: { type: 'never' } },
            { operation: 'write', condition: { type: 'never' } },
            { operation: 'update', condition: { type: 'pin', keyReference: 1 } },
            { operation: 'read', condition: { type: 'always' } },
        ]);
    });

    it('should round-trip a DF ACL with absent operations as never', () => {
        const acl: AclEntry[] = [
            { operation: 'create', condition: { type: 'pin', keyReference: 2 } },
            { operation: 'delete', condition: { type: 'always' } },
        ];
        expect(parseArl(buildArl(acl, DF_ACCESS_MODES), DF_ACCESS_MODES)).toEqual([
            { operation: 'delete', condition: { type: 'always' } },
            { operation: 'activate', condition: { type: 'never' } },
            { operation: 'deactivate', condition: { type: 'never' } },
            { operation: 'create', condition: { type: 'pin', keyReference: 2 } },
            { operation: 'update', condition: { type: 'never' } },
        ]);
    });

    it.each([
        ['df', DF_ACCESS_MODES],
        ['working-ef', EF_ACCESS_MODES],
    ] as const)('should round-trip every %s operation and condition', (_kind, table) => {
        const operations = [...new Set(table.rules.flatMap((rule) => (rule.operation ? [rule.operation] : [])))];
        const conditions: AccessCondition[] = [
            { type: 'always' },
            { type: 'never' },
            { type: 'pin', keyReference: 0 },
            { type: 'pin', keyReference: 0x7f },
        ];

        for (const operation of operations) {
            for (const condition of conditions) {
                const expected = operations.map((op) => ({
                    operation: op,
                    condition: op === operation ? condition : { type: 'never' },
                }));
                expect(parseArl(buildArl([{ operation, condition }], table), table)).toEqual(expected);
            }
        }
    });

    it('should decode the ARL of a built DF back to its ACL', () => {
        const fcp = buildFcp({
            kind: 'df',
            id: 0x5015,
            size: 0x0200,
            acl: [
                { operation: 'update', condition: { type: 'pin', keyReference: 1 } },
                { operation: 'create', condition: { type: 'always' } },
            ],
        });
        const template = findTag(fcp, 0x62);
        const arl = template && findTag(template, 0xab);

        expect(arl && parseArl(arl, DF_ACCESS_MODES)).toEqual([
            { operation: 'delete', condition: { type: 'never' } },
            { operation: 'activate', condition: { type: 'never' } },
            { operation: 'deactivate', condition: { type: 'never' } },
            { operation: 'create', condition: { type: 'always' } },
            { operation: 'update', condition: { type: 'pin', keyReference: 1 } },
        ]);
    });

    it('should decode an empty ARL to no entries', () => {
        expect(parseArl(Buffer.alloc(0), EF_ACCESS_MODES)).toEqual([]);
    });

    it('should decode the root sentinel to always for every DF operation', () => {
        expect(parseArl(Buffer.from(ROOT_SENTINEL), DF_ACCESS_MODES)).toEqual([
            { operation: 'delete', condition: { type: 'always' } },
            { operation: 'activate', condition: { type: 'always' } },
            { operation: 'deactivate', condition: { type: 'always' } },
            { operation: 'create', condition: { type: 'always' } },
            { operation: 'update', condition: { type: 'always' } },
        ]);
    });

    it('should not treat the sentinel specially for an EF', () => {
        expect(() => parseArl(Buffer.from(ROOT_SENTINEL), EF_ACCESS_MODES)).toThrow(UnsupportedByCardError);
    });

    it('should reject an access mode byte absent from the table', () => {
        expect(() => parseArl(hex('80 01 33 90 00'), EF_ACCESS_MODES)).toThrow(
            'Unknown access mode byte 0x33 for working-ef'
        );
        expect(() => parseArl(hex('80 01 33 90 00'), DF_ACCESS_MODES)).toThrow(UnsupportedByCardError);
    });

    it('should yield no entry for rows without an operation', () => {
        expect(parseArl(hex('80 01 20 90 00'), EF_ACCESS_MODES)).toEqual([]);
    });

    it('should strip the backtrack bit from key references', () => {
        expect(parseArl(hex('80 01 01 a4 06 83 01 81 95 01 08'), EF_ACCESS_MODES)).toEqual([
            { operation: 'read', condition: { type: 'pin', keyReference: 1 } },
        ]);
    });

    it('should let a later record replace an earlier one', () => {
        expect(parseArl(hex('80 01 01 90 00 80 01 02 90 00 80 01 01 97 00'), EF_ACCESS_MODES)).toEqual([
            { operation: 'read', condition: { type: 'never' } },
            { operation: 'update', condition: { type: 'always' } },
        ]);
    });

    it('should skip DF command records', () => {
        expect(parseArl(hex('84 04 80 10 00 00 90 00 80 01 40 90 00'), DF_ACCESS_MODES)).toEqual([
            { operation: 'delete', condition: { type: 'always' } },
        ]);
    });

    it('should skip a command record condition without reading it', () => {
        expect(parseArl(hex('84 04 80 10 00 00 9e 00 80 01 40 90 00'), DF_ACCESS_MODES)).toEqual([
            { operation: 'delete', condition: { type: 'always' } },
        ]);
        expect(
            parseArl(hex('84 04 80 10 00 00 a4 06 83 01 01 95 01 40 80 01 40 90 00'), DF_ACCESS_MODES)
        ).toEqual([{ operation: 'delete', condition: { type: 'always' } }]);
    });

    it('should skip a command record guarded by a PIN', () => {
        expect(
            parseArl(hex('84 04 00 da 01 6f a4 06 83 01 01 95 01 08 80 01 40 90 00'), DF_ACCESS_MODES)
        ).toEqual([{ operation: 'delete', condition: { type: 'always' } }]);
    });

    it('should reject a command record condition running past the end', () => {
        expect(() => parseArl(hex('84 04 00 da 01 6f a4 06 83 01'), DF_ACCESS_MODES)).toThrow(
            'Truncated command rule condition'
        );
    });

    it('should reject a truncated command record', () => {
        expect(() => parseArl(hex('84 04 80 10 00'), DF_ACCESS_MODES)).toThrow(LengthError);
    });

    it('should reject a command record with the wrong length', () => {
        expect(() => parseArl(hex('84 03 80 10 00 90 00 90'), DF_ACCESS_MODES)).toThrow(
            'Command rule with length 3'
        );
    });

    it('should reject command records in an EF ARL', () => {
        expect(() => parseArl(hex('84 04 80 10 00 00 90 00'), EF_ACCESS_MODES)).toThrow(
            'Unsupported ARL record tag 0x84'
        );
    });

    it('should reject trailing bytes', () => {
        expect(() => parseArl(hex('80 01 01 90 00 00 00'), EF_ACCESS_MODES)).toThrow('2 trailing bytes in ARL');
    });

    it('should reject a truncated user authentication template', () => {
        expect(() => parseArl(hex('80 01 01 a4 06 83 01 01 95 01'), EF_ACCESS_MODES)).toThrow(LengthError);
    });

    it('should reject a user authentication template for another key usage', () => {
        expect(() => parseArl(hex('80 01 01 a4 06 83 01 01 95 01 40'), EF_ACCESS_MODES)).toThrow(
            'Unsupported user authentication template'
        );
    });

    it('should reject an always condition with content', () => {
        expect(() => parseArl(hex('80 01 01 90 01'), EF_ACCESS_MODES)).toThrow(UnsupportedByCardError);
    });

    it('should reject an unknown condition tag', () => {
        expect(() => parseArl(hex('80 01 01 9e 00'), EF_ACCESS_MODES)).toThrow(
            'Unsupported condition tag 0x9e'
        );
    });
});
