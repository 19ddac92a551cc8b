import { accessModeTableFor, BACKTRACK_PIN, CRT_TAG_KEYREF, CRT_TAG_KUQ, KUQ_DECRYPT, parseArl } from './access-rules.js';
import { encodeEcSignature } from './ec-signature.js';
import {
    ArgumentError,
    CapacityError,
    CardStatusError,
    LengthError,
    UnexpectedResponseError,
} from './errors.js';
import { buildFcp } from './fcp.js';
import { findTag, readTlvHeader, TlvWriter } from './tlv.js';
import type { CardGeneration, CardResponse, EfStructure, FileDescriptor, FileKind, SmartCard } from './types.js';

const ISO7816_TAG_FCI = 0x6f;
const FCI_TAG_SECURITY_ATTRIBUTES = 0xab;

/** Length of the hash ACCUMULATE OBJECT DATA returns after its two-byte prefix */
const ACCUMULATE_HASH_LENGTH = 32;

/**
 * Options for a CardOS 5 application
 */
export interface CardOsOptions {
    /** Card generation, which decides the raw EC signature layout */
    generation: CardGeneration;
    /** Receives a line for every failed command or rejected argument */
    log?: ((message: string) => void) | undefined;
}

/**
 * Security environment set with MANAGE SECURITY ENVIRONMENT.
 * Returned by setSecurityEnvironment and passed back into computeSignature.
 */
export interface SecurityEnvironment {
    readonly operation: 'sign' | 'decipher';
    readonly algorithm: 'rsa' | 'ec';
    readonly keyReference: number;
}

/**
 * Command APDU fields
 */
export interface Apdu {
    cla?: number;
    ins: number;
    p1: number;
    p2: number;
    data?: Buffer | undefined;
    /** Expected response length; 256 (short) or 65536 (extended) means "maximum" */
    le?: number | undefined;
    extended?: boolean;
}

/**
 * Serialize a command APDU in short or extended form
 */
export function buildApdu(apdu: Apdu): Buffer {
    const { cla = 0x00, ins, p1, p2, data, le, extended = false } = apdu;
    const bytes = [cla, ins, p1, p2];

    if (extended) {
        if (data && data.length > 0) {
            if (data.length > 0xffff) {
                throw new ArgumentError(`APDU data of ${String(data.length)} bytes is too long`);
            }
            bytes.push(0x00, (data.length >> 8) & 0xff, data.length & 0xff, ...data);
        }
        if (le !== undefined) {
            const value = le >= 0x10000 ? 0 : le;
            if (!data || data.length === 0) {
                bytes.push(0x00);
            }
            bytes.push((value >> 8) & 0xff, value & 0xff);
        }
    } else {
        if (data && data.length > 0) {
            if (data.length > 0xff) {
                throw new ArgumentError(`APDU data of ${String(data.length)} bytes needs an extended APDU`);
            }
            bytes.push(data.length, ...data);
        }
        if (le !== undefined) {
            bytes.push(le >= 0x100 ? 0x00 : le);
        }
    }

    return Buffer.from(bytes);
}

/**
 * Parse APDU response into CardResponse
 */
function parseResponse(response: Buffer): CardResponse {
    const sw1 = response[response.length - 2] ?? 0;
    const sw2 = response[response.length - 1] ?? 0;
    const data = response.subarray(0, response.length - 2);

    return {
        buffer: data,
        sw1,
        sw2,
        isOk: () => sw1 === 0x90 && sw2 === 0x00,
    };
}

/**
 * Format status word for display
 */
export function formatSw(sw1: number, sw2: number): string {
    return `SW: ${sw1.toString(16).padStart(2, '0').toUpperCase()}${sw2.toString(16).padStart(2, '0').toUpperCase()}`;
}

function readUnsigned(value: Buffer | undefined): number | undefined {
    if (!value || value.length === 0) return undefined;
    return value.readUIntBE(0, Math.min(value.length, 6));
}

function structureFromDescriptor(descriptor: number): EfStructure | undefined {
    switch (descriptor & 0x07) {
        case 0x01:
            return 'transparent';
        case 0x02:
        case 0x03:
            return 'linear-fixed';
        case 0x04:
        case 0x05:
            return 'linear-variable';
        case 0x06:
        case 0x07:
            return 'cyclic';
        default:
            return undefined;
    }
}

/**
 * Build a file descriptor from the content of an FCI template.
 * The ACL is left empty; the ARL is kept in `securityAttributes`.
 */
export function processFci(fci: Buffer): FileDescriptor {
    const descriptor = findTag(fci, 0x82)?.[0];
    let kind: FileKind = 'working-ef';
    let structure: EfStructure | undefined;
    if (descriptor !== undefined) {
        if ((descriptor & 0x38) === 0x38) {
            kind = 'df';
        } else {
            kind = ((descriptor >> 3) & 0x07) === 0x01 ? 'internal-ef' : 'working-ef';
            structure = structureFromDescriptor(descriptor);
        }
    }

    const name = findTag(fci, 0x84);
    const securityAttributes = findTag(fci, FCI_TAG_SECURITY_ATTRIBUTES);

    return {
        kind,
        id: readUnsigned(findTag(fci, 0x83)) ?? 0,
        size: readUnsigned(findTag(fci, 0x80)) ?? readUnsigned(findTag(fci, 0x81)) ?? 0,
        name: name && name.length > 0 ? Buffer.from(name) : undefined,
        structure,
        acl: [],
        securityAttributes:
            securityAttributes && securityAttributes.length > 0 ? Buffer.from(securityAttributes) : undefined,
    };
}

/**
 * CardOS 5 file system and security operations over a PC/SC card.
 *
 * @example
 * ```typescript
 * const cardos = new CardOsApplication(card, { generation: 'v5.3' });
 * const file = await cardos.selectFile([0x3f, 0x00, 0x50, 0x15], { withMetadata: true });
 * console.log(file?.acl);
 * ```
 */
export class CardOsApplication {
    readonly #card: SmartCard;
    readonly #generation: CardGeneration;
    readonly #log: (message: string) => void;

    constructor(card: SmartCard, options: CardOsOptions) {
        this.#card = card;
        this.#generation = options.generation;
        this.#log = options.log ?? (() => undefined);
    }

    get generation(): CardGeneration {
        return this.#generation;
    }

    /**
     * Transmit an APDU with automatic T=0 protocol handling
     */
    async #transmit(apdu: Buffer): Promise<CardResponse> {
        const response = await this.#card.transmit(apdu, { autoGetResponse: true });
        return parseResponse(response);
    }

    /**
     * Transmit and require SW 9000
     */
    async #command(name: string, apdu: Apdu): Promise<Buffer> {
        const response = await this.#transmit(buildApdu(apdu));
        if (!response.isOk()) {
            this.#reject(
                new CardStatusError(response.sw1, response.sw2, `${name} failed - ${formatSw(response.sw1, response.sw2)}`)
            );
        }
        return response.buffer;
    }

    #reject(error: Error): never {
        this.#log(error.message);
        throw error;
    }

    /**
     * Select a file by absolute path.
     * @param path - Path starting with the MF (3F00)
     * @param options.withMetadata - Request the FCI and decode it
     * @returns The selected file with its ACL decoded, or undefined without metadata
     */
    async selectFile(
        path: Buffer | readonly number[],
        options: { withMetadata?: boolean } = {}
    ): Promise<FileDescriptor | undefined> {
        const pathBuffer = Buffer.isBuffer(path) ? path : Buffer.from(path);
        if (pathBuffer.length < 2 || pathBuffer[0] !== 0x3f || pathBuffer[1] !== 0x00) {
            this.#reject(new ArgumentError('Path must start with 3F00'));
        }

        const mfOnly = pathBuffer.length === 2;
        const withMetadata = options.withMetadata ?? false;
        const response = await this.#command('SELECT FILE', {
            ins: 0xa4,
            p1: mfOnly ? 0x00 : 0x08,
            p2: withMetadata ? 0x00 : 0x0c,
            data: mfOnly ? pathBuffer : pathBuffer.subarray(2),
            le: withMetadata ? 256 : undefined,
        });

        if (!withMetadata) {
            return undefined;
        }

        // CardOS 5 always uses a long-form length for the FCI template
        if (response.length < 2 || response[0] !== ISO7816_TAG_FCI || (response[1] !== 0x81 && response[1] !== 0x82)) {
            this.#reject(new UnexpectedResponseError('Invalid SELECT FILE response'));
        }

        const header = readTlvHeader(response, 0);
        const file = processFci(response.subarray(header.valueOffset, header.valueOffset + header.length));

        try {
            file.acl = parseArl(file.securityAttributes ?? Buffer.alloc(0), accessModeTableFor(file.kind));
        } catch (error: unknown) {
            this.#log(`Could not parse ARL: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }

        return file;
    }

    /**
     * Create a DF or transparent working EF in the current DF
     */
    async createFile(file: FileDescriptor): Promise<void> {
        let fcp: Buffer;
        try {
            fcp = buildFcp(file);
        } catch (error: unknown) {
            this.#log(`Could not construct FCP: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }

        await this.#command('CREATE FILE', { ins: 0xe0, p1: 0x00, p2: 0x00, data: fcp });
    }

    /**
     * Select the key and algorithm for the following signature or decipher operation
     */
    async setSecurityEnvironment(env: SecurityEnvironment): Promise<SecurityEnvironment> {
        if (!Number.isInteger(env.keyReference) || env.keyReference < 0 || env.keyReference > 0xff) {
            this.#reject(new ArgumentError(`Key reference ${String(env.keyReference)} does not fit one byte`));
        }

        const crt = new TlvWriter(16).putTag1(CRT_TAG_KEYREF, env.keyReference).putTag1(CRT_TAG_KUQ, KUQ_DECRYPT);

        await this.#command('MANAGE SECURITY ENVIRONMENT', {
            ins: 0x22,
            p1: 0x41,
            p2: env.operation === 'sign' ? 0xb6 : 0xb8,
            data: crt.toBuffer(),
        });

        return Object.freeze({ operation: env.operation, algorithm: env.algorithm, keyReference: env.keyReference });
    }

    /**
     * Sign `data` with the key of a signing security environment.
     * EC signatures are returned as DER `SEQUENCE { INTEGER r, INTEGER s }`.
     * @param outLength - Largest signature the caller accepts
     */
    async computeSignature(
        env: SecurityEnvironment,
        data: Buffer | readonly number[],
        outLength: number
    ): Promise<Buffer> {
        if (env.operation !== 'sign') {
            this.#reject(new ArgumentError('Security environment is not set up for signing'));
        }

        const dataBuffer = Buffer.isBuffer(data) ? data : Buffer.from(data);
        if (outLength < dataBuffer.length) {
            this.#reject(new CapacityError(`Output length ${String(outLength)} is smaller than the input`));
        }

        const response = await this.#command('PERFORM SECURITY OPERATION', {
            ins: 0x2a,
            p1: 0x9e,
            p2: 0x9a,
            data: dataBuffer,
            le: outLength,
            extended: true,
        });

        if (response.length > outLength) {
            this.#reject(new LengthError(`Reply of ${String(response.length)} bytes exceeds ${String(outLength)}`));
        }

        if (env.algorithm === 'rsa') {
            return Buffer.from(response);
        }

        const signature = Buffer.alloc(outLength);
        response.copy(signature);
        try {
            const length = encodeEcSignature(signature, response.length, this.#generation);
            return Buffer.from(signature.subarray(0, length));
        } catch (error: unknown) {
            this.#log(`Could not decode signature: ${error instanceof Error ? error.message : String(error)}`);
            throw error;
        }
    }

    /**
     * Verify a PIN. The card expects the backtrack bit on the reference, so
     * callers pass the plain reference.
     * @returns CardResponse with status words indicating success or failure:
     *   - SW 9000: PIN verified successfully
     *   - SW 63CX: Wrong PIN, X attempts remaining
     *   - SW 6983: PIN blocked
     */
    async verifyPin(reference: number, pin: string): Promise<CardResponse> {
        if (!Number.isInteger(reference) || reference < 0 || reference > 0xff) {
            this.#reject(new ArgumentError(`PIN reference ${String(reference)} does not fit one byte`));
        }
        if ((reference & BACKTRACK_PIN) !== 0) {
            this.#reject(new ArgumentError('PIN reference with backtrack bit set'));
        }
        if (pin.length === 0 || pin.length > 16) {
            this.#reject(new ArgumentError('PIN must be 1-16 characters'));
        }

        const apdu = buildApdu({
            ins: 0x20,
            p1: 0x00,
            p2: reference | BACKTRACK_PIN,
            data: Buffer.from(pin, 'latin1'),
        });
        return this.#transmit(apdu);
    }

    /**
     * Load object data in pieces; the card returns a running hash
     * @param append - Append to the object started by the previous call
     * @returns The 32-byte hash reported by the card
     */
    async accumulateObjectData(data: Buffer, append: boolean): Promise<Buffer> {
        const response = await this.#command('ACCUMULATE OBJECT DATA', {
            cla: 0x80,
            ins: 0x16,
            p1: append ? 0x00 : 0x01,
            p2: 0x00,
            data,
            le: 64,
        });

        if (response.length !== ACCUMULATE_HASH_LENGTH + 2) {
            this.#reject(new UnexpectedResponseError(`Wrong reply length ${String(response.length)}`));
        }

        return Buffer.from(response.subarray(2));
    }

    /**
     * Generate a key pair on the card
     */
    async generateKey(data: Buffer): Promise<void> {
        await this.#command('GENERATE KEY', { ins: 0x46, p1: 0x00, p2: 0x00, data });
    }

    /**
     * Read back the public part of a generated key pair
     */
    async extractKey(data: Buffer): Promise<Buffer> {
        const response = await this.#command('EXTRACT KEY', {
            ins: 0x46,
            p1: 0x01,
            p2: 0x00,
            data,
            le: 768,
            extended: true,
        });
        return Buffer.from(response);
    }

    /**
     * Write extended card data (PUT DATA ECD)
     */
    async putDataEcd(data: Buffer): Promise<void> {
        await this.#command('PUT DATA ECD', { ins: 0xda, p1: 0x01, p2: 0x6f, data });
    }

    /**
     * Set the maximum data field length to 0x300 bytes. Takes effect after the next reset.
     */
    async initCard(): Promise<void> {
        await this.#command('SET DATA FIELD LENGTH', { cla: 0x80, ins: 0x14, p1: 0x03, p2: 0x00 });
    }
}

/**
 * Factory function to create a CardOsApplication instance
 */
export function createCardOsApplication(card: SmartCard, options: CardOsOptions): CardOsApplication {
    return new CardOsApplication(card, options);
}

export default createCardOsApplication;
