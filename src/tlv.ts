// BER-TLV helpers for the single-byte tags CardOS uses in FCP, FCI and ARL
// structures.

import { CapacityError, LengthError, UnsupportedByCardError } from './errors.js';

/** Largest content length a record may carry */
export const MAX_TLV_LENGTH = 0xffff;

const EMPTY = Buffer.alloc(0);

/**
 * Encode a BER length field.
 * Lengths 0x80-0xFE take the 0x81 form, 0xFF and above the 0x82 form.
 */
export function encodeBerLength(length: number): number[] {
    if (!Number.isInteger(length) || length < 0 || length > MAX_TLV_LENGTH) {
        throw new CapacityError(`BER length ${String(length)} out of range`);
    }
    if (length < 0x80) {
        return [length];
    }
    if (length < 0xff) {
        return [0x81, length];
    }
    return [0x82, (length >> 8) & 0xff, length & 0xff];
}

/**
 * Appends tag-length-value records into a fixed-capacity buffer
 */
export class TlvWriter {
    readonly #buffer: Buffer;
    #used = 0;

    /**
     * @param target - Capacity in bytes, or an existing buffer to write into from offset 0
     */
    constructor(target: number | Buffer) {
        this.#buffer = typeof target === 'number' ? Buffer.alloc(target) : target;
    }

    get capacity(): number {
        return this.#buffer.length;
    }

    get bytesUsed(): number {
        return this.#used;
    }

    get remaining(): number {
        return this.#buffer.length - this.#used;
    }

    /**
     * Append one record. Nothing is written when the record does not fit.
     */
    putTag(tag: number, content: Uint8Array = EMPTY): this {
        const lengthField = encodeBerLength(content.length);
        const recordLength = 1 + lengthField.length + content.length;
        if (recordLength > this.remaining) {
            throw new CapacityError(
                `Tag 0x${tag.toString(16)} needs ${String(recordLength)} bytes, ${String(this.remaining)} left`
            );
        }

        this.#buffer[this.#used] = tag & 0xff;
        this.#buffer.set(lengthField, this.#used + 1);
        this.#buffer.set(content, this.#used + 1 + lengthField.length);
        this.#used += recordLength;
        return this;
    }

    putTag0(tag: number): this {
        return this.putTag(tag);
    }

    putTag1(tag: number, value: number): this {
        return this.putTag(tag, Buffer.from([value & 0xff]));
    }

    /**
     * Copy of the bytes written so far
     */
    toBuffer(): Buffer {
        return Buffer.from(this.#buffer.subarray(0, this.#used));
    }
}

export interface TlvHeader {
    tag: number;
    length: number;
    valueOffset: number;
}

/**
 * Read a one-byte tag and its BER length at `offset`.
 * The value must lie entirely within `bytes`.
 */
export function readTlvHeader(bytes: Uint8Array, offset: number): TlvHeader {
    const tag = bytes[offset];
    const first = bytes[offset + 1];
    if (tag === undefined || first === undefined) {
        throw new LengthError(`Truncated TLV header at offset ${String(offset)}`);
    }

    let length: number;
    let valueOffset: number;
    if (first < 0x80) {
        length = first;
        valueOffset = offset + 2;
    } else if (first === 0x81 || first === 0x82) {
        const size = first & 0x7f;
        if (offset + 2 + size > bytes.length) {
            throw new LengthError(`Truncated TLV length at offset ${String(offset)}`);
        }
        length = 0;
        for (let i = 0; i < size; i++) {
            length = (length << 8) | (bytes[offset + 2 + i] ?? 0);
        }
        valueOffset = offset + 2 + size;
    } else {
        throw new UnsupportedByCardError(`Unsupported BER length byte 0x${first.toString(16)}`);
    }

    if (valueOffset + length > bytes.length) {
        throw new LengthError(
            `TLV value of ${String(length)} bytes at offset ${String(valueOffset)} exceeds buffer of ${String(bytes.length)}`
        );
    }

    return { tag, length, valueOffset };
}

/**
 * Find a top-level record by tag
 * @returns The record value, or undefined if no record has that tag
 */
export function findTag(bytes: Buffer, tag: number): Buffer | undefined {
    let offset = 0;
    while (offset < bytes.length) {
        const header = readTlvHeader(bytes, offset);
        if (header.tag === tag) {
            return bytes.subarray(header.valueOffset, header.valueOffset + header.length);
        }
        offset = header.valueOffset + header.length;
    }
    return undefined;
}
