import { ArgumentError, CapacityError, OutOfMemoryError } from './errors.js';
import { TlvWriter } from './tlv.js';
import type { CardGeneration } from './types.js';

export const ASN1_SEQUENCE_TAG = 0x30;
export const ASN1_INTEGER_TAG = 0x02;

/** Bytes CardOS 5.0 appends after each raw coordinate */
const V5_0_COORDINATE_TRAILER = 2;

/** Largest raw coordinate whose INTEGER header fits a short length */
const MAX_COORDINATE_LENGTH = 0x7e;

function allocate(size: number): Buffer {
    try {
        return Buffer.alloc(size);
    } catch (error: unknown) {
        if (error instanceof RangeError) {
            throw new OutOfMemoryError(`Could not allocate ${String(size)} bytes: ${error.message}`);
        }
        throw error;
    }
}

/**
 * Encode one big-endian unsigned coordinate as an INTEGER, with a leading zero
 * when its top bit is set
 */
function encodeCoordinate(raw: Buffer): Buffer {
    const pad = (raw[0] ?? 0) & 0x80 ? 1 : 0;
    const encoded = allocate(2 + pad + raw.length);
    encoded[0] = ASN1_INTEGER_TAG;
    encoded[1] = raw.length + pad;
    raw.copy(encoded, 2 + pad);
    return encoded;
}

/**
 * Coordinate length for a raw signature of `signatureLength` bytes
 */
export function coordinateLength(signatureLength: number, generation: CardGeneration): number {
    return generation === 'v5.0' ? (signatureLength - 2 * V5_0_COORDINATE_TRAILER) / 2 : signatureLength / 2;
}

/**
 * Re-encode a raw `X || Y` EC signature in place as `SEQUENCE { INTEGER, INTEGER }`.
 *
 * @param signature - Buffer holding the raw signature at offset 0; its length is the output capacity
 * @param signatureLength - Number of raw signature bytes
 * @param generation - Card generation, which decides whether coordinates carry trailing bytes
 * @returns Length of the encoded signature now at the start of `signature`
 */
export function encodeEcSignature(signature: Buffer, signatureLength: number, generation: CardGeneration): number {
    if (
        !Number.isInteger(signatureLength) ||
        signatureLength < 4 ||
        signatureLength > signature.length ||
        signatureLength % 2 !== 0
    ) {
        throw new ArgumentError(
            `Invalid signature length ${String(signatureLength)} for buffer of ${String(signature.length)} bytes`
        );
    }

    const rawLength = coordinateLength(signatureLength, generation);
    if (rawLength === 0) {
        throw new ArgumentError('Signature has no coordinate bytes');
    }
    if (rawLength > MAX_COORDINATE_LENGTH) {
        throw new CapacityError(`Coordinate of ${String(rawLength)} bytes is too long`);
    }
    const stride = generation === 'v5.0' ? rawLength + V5_0_COORDINATE_TRAILER : rawLength;

    const raw = allocate(signatureLength);
    signature.copy(raw, 0, 0, signatureLength);
    signature.fill(0);

    let x: Buffer | undefined;
    let y: Buffer | undefined;
    let point: Buffer | undefined;
    try {
        x = encodeCoordinate(raw.subarray(0, rawLength));
        y = encodeCoordinate(raw.subarray(stride, stride + rawLength));

        point = allocate(x.length + y.length);
        x.copy(point, 0);
        y.copy(point, x.length);

        const writer = new TlvWriter(signature);
        writer.putTag(ASN1_SEQUENCE_TAG, point);
        return writer.bytesUsed;
    } finally {
        raw.fill(0);
        x?.fill(0);
        y?.fill(0);
        point?.fill(0);
    }
}

/**
 * Re-encode a raw signature into a new buffer
 */
export function reencodeEcSignature(raw: Buffer, generation: CardGeneration): Buffer {
    // two INTEGER headers, two pad bytes and a four-byte SEQUENCE header at most
    const buffer = allocate(raw.length + 10);
    raw.copy(buffer);
    const length = encodeEcSignature(buffer, raw.length, generation);
    return Buffer.from(buffer.subarray(0, length));
}
