/**
 * Response from a card command
 */
export interface CardResponse {
    /** Raw response buffer */
    buffer: Buffer;
    /** Check if the response indicates success (SW1=0x90, SW2=0x00) */
    isOk(): boolean;
    /** Status word 1 */
    sw1: number;
    /** Status word 2 */
    sw2: number;
}

/**
 * Transmit options for smartcard package
 */
export interface TransmitOptions {
    /** Automatically handle T=0 status words (SW1=61, SW1=6C) */
    autoGetResponse?: boolean;
}

/**
 * Card interface from smartcard package
 */
export interface SmartCard {
    /** Answer to Reset */
    atr: Buffer;
    /** Transmit APDU command to card */
    transmit(apdu: Buffer | number[], options?: TransmitOptions): Promise<Buffer>;
}

/**
 * CardOS 5 card generation. 5.0 pads each raw EC signature coordinate with two
 * trailing bytes, 5.3 does not.
 */
export type CardGeneration = 'v5.0' | 'v5.3';

/**
 * File operations an access rule can govern
 */
export type AccessOperation = 'delete' | 'activate' | 'deactivate' | 'write' | 'update' | 'read' | 'create';

/**
 * Condition attached to an operation
 */
export type AccessCondition =
    | { type: 'always' }
    | { type: 'never' }
    | {
          type: 'pin';
          /** PIN reference, 0x00-0x7F */
          keyReference: number;
      };

export interface AclEntry {
    operation: AccessOperation;
    condition: AccessCondition;
}

/**
 * DF = dedicated (container) file, EF = elementary (data) file
 */
export type FileKind = 'df' | 'working-ef' | 'internal-ef';

export type EfStructure = 'transparent' | 'linear-fixed' | 'linear-variable' | 'cyclic';

/**
 * File as seen by the codec: created from FCP, or populated from FCI on select
 */
export interface FileDescriptor {
    kind: FileKind;
    /** File identifier, 0x0000-0xFFFF */
    id: number;
    /** Size in bytes, 0x0000-0xFFFF */
    size: number;
    /** DF name (AID) */
    name?: Buffer | undefined;
    /** Storage structure, only meaningful for EFs */
    structure?: EfStructure | undefined;
    acl: AclEntry[];
    /** Raw security attribute blob (ARL) as read from the card */
    securityAttributes?: Buffer | undefined;
}
