export {
    CardOsApplication,
    createCardOsApplication,
    default,
    buildApdu,
    processFci,
    formatSw,
} from './cardos-application.js';
export type { Apdu, CardOsOptions, SecurityEnvironment } from './cardos-application.js';
export {
    DF_ACCESS_MODES,
    EF_ACCESS_MODES,
    ROOT_SENTINEL,
    BACKTRACK_PIN,
    BACKTRACK_MASK,
    accessModeTableFor,
    appendAccessRules,
    appendCommandRule,
    appendCondition,
    buildArl,
    parseArl,
} from './access-rules.js';
export type { AccessModeRule, AccessModeTable, CommandHeader } from './access-rules.js';
export { lookupAclEntry, setAclEntry, clearAclEntries } from './acl.js';
export {
    buildFcp,
    buildDfFcp,
    buildEfFcp,
    MAX_APDU_BUFFER_SIZE,
    PUT_DATA_ECD_COMMAND,
    PHASE_CONTROL_COMMAND,
    ACCUMULATE_NEW_COMMAND,
    ACCUMULATE_APPEND_COMMAND,
} from './fcp.js';
export { encodeEcSignature, reencodeEcSignature, coordinateLength } from './ec-signature.js';
export { TlvWriter, encodeBerLength, readTlvHeader, findTag, MAX_TLV_LENGTH } from './tlv.js';
export type { TlvHeader } from './tlv.js';
export { formatTlv, getTagName, FCP_TAGS, ARL_TAGS, CRT_TAGS } from './tlv-format.js';
export type { TagContext } from './tlv-format.js';
export {
    CardOsError,
    CapacityError,
    ArgumentError,
    UnsupportedByCardError,
    LengthError,
    OutOfMemoryError,
    UnexpectedResponseError,
    CardStatusError,
    createCardOsError,
} from './errors.js';
export type {
    AccessCondition,
    AccessOperation,
    AclEntry,
    CardGeneration,
    CardResponse,
    EfStructure,
    FileDescriptor,
    FileKind,
    SmartCard,
    TransmitOptions,
} from './types.js';
export type { Tlv } from '@tomkp/ber-tlv';
