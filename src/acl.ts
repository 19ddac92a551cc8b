import type { AccessCondition, AccessOperation, AclEntry, FileDescriptor } from './types.js';

/**
 * Find the condition a file's ACL attaches to an operation
 */
export function lookupAclEntry(
    file: { readonly acl: readonly AclEntry[] },
    operation: AccessOperation
): AccessCondition | undefined {
    return file.acl.find((entry) => entry.operation === operation)?.condition;
}

/**
 * Remove every entry for an operation
 */
export function clearAclEntries(file: Pick<FileDescriptor, 'acl'>, operation: AccessOperation): void {
    file.acl = file.acl.filter((entry) => entry.operation !== operation);
}

/**
 * Set the condition for an operation, replacing any existing entry.
 * The entry keeps its position when it already exists.
 */
export function setAclEntry(
    file: Pick<FileDescriptor, 'acl'>,
    operation: AccessOperation,
    condition: AccessCondition
): void {
    const entry: AclEntry = { operation, condition };
    const index = file.acl.findIndex((e) => e.operation === operation);
    if (index === -1) {
        file.acl.push(entry);
        return;
    }
    file.acl = [...file.acl.slice(0, index), entry, ...file.acl.slice(index + 1).filter((e) => e.operation !== operation)];
}
