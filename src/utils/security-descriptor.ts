/**
 * Binary security descriptor helpers (self-relative SECURITY_DESCRIPTOR as stored
 * in nTSecurityDescriptor).
 *
 * "Protect object from accidental deletion" is an access-denied ACE granted to
 * Everyone for DELETE and DELETE_TREE. Removing those rights is what clears the flag.
 */

const HEADER_SIZE = 20;
const ACL_HEADER_SIZE = 8;
const ACE_HEADER_SIZE = 4;

export const ACE_TYPES = {
  ACCESS_ALLOWED: 0x00,
  ACCESS_DENIED: 0x01
} as const;

export const ACCESS_MASK = {
  DELETE_TREE: 0x00000040,
  DELETE: 0x00010000
} as const;

const DELETION_RIGHTS = ACCESS_MASK.DELETE | ACCESS_MASK.DELETE_TREE;

// S-1-1-0
export const EVERYONE_SID = Buffer.from([0x01, 0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00]);

interface Ace {
  type: number;
  flags: number;
  raw: Buffer;
}

interface ParsedDescriptor {
  revision: number;
  control: number;
  owner: Buffer | null;
  group: Buffer | null;
  sacl: Buffer | null;
  dacl: Buffer | null;
}

export interface DeletionProtectionResult {
  descriptor: Buffer;
  changed: boolean;
}

function sidLength(buffer: Buffer, offset: number): number {
  return 8 + 4 * buffer.readUInt8(offset + 1);
}

function slice(buffer: Buffer, offset: number, length: number): Buffer {
  if (offset + length > buffer.length) {
    throw new RangeError('Security descriptor is truncated');
  }
  return Buffer.from(buffer.subarray(offset, offset + length));
}

function parseDescriptor(buffer: Buffer): ParsedDescriptor {
  if (buffer.length < HEADER_SIZE) {
    throw new RangeError('Security descriptor is truncated');
  }

  const ownerOffset = buffer.readUInt32LE(4);
  const groupOffset = buffer.readUInt32LE(8);
  const saclOffset = buffer.readUInt32LE(12);
  const daclOffset = buffer.readUInt32LE(16);

  return {
    revision: buffer.readUInt8(0),
    control: buffer.readUInt16LE(2),
    owner: ownerOffset ? slice(buffer, ownerOffset, sidLength(buffer, ownerOffset)) : null,
    group: groupOffset ? slice(buffer, groupOffset, sidLength(buffer, groupOffset)) : null,
    sacl: saclOffset ? slice(buffer, saclOffset, buffer.readUInt16LE(saclOffset + 2)) : null,
    dacl: daclOffset ? slice(buffer, daclOffset, buffer.readUInt16LE(daclOffset + 2)) : null
  };
}

function parseAces(acl: Buffer): Ace[] {
  const count = acl.readUInt16LE(4);
  const aces: Ace[] = [];
  let offset = ACL_HEADER_SIZE;

  for (let i = 0; i < count; i++) {
    const size = acl.readUInt16LE(offset + 2);
    if (size < ACE_HEADER_SIZE) {
      throw new RangeError(`Invalid ACE size ${size} at offset ${offset}`);
    }
    aces.push({
      type: acl.readUInt8(offset),
      flags: acl.readUInt8(offset + 1),
      raw: slice(acl, offset, size)
    });
    offset += size;
  }

  return aces;
}

function buildAcl(revision: number, aces: Ace[]): Buffer {
  const body = Buffer.concat(aces.map(ace => ace.raw));
  const header = Buffer.alloc(ACL_HEADER_SIZE);
  header.writeUInt8(revision, 0);
  header.writeUInt16LE(ACL_HEADER_SIZE + body.length, 2);
  header.writeUInt16LE(aces.length, 4);
  return Buffer.concat([header, body]);
}

function buildDescriptor(parsed: ParsedDescriptor): Buffer {
  const header = Buffer.alloc(HEADER_SIZE);
  header.writeUInt8(parsed.revision, 0);
  header.writeUInt16LE(parsed.control, 2);

  const sections: Buffer[] = [header];
  let offset = HEADER_SIZE;
  const place = (part: Buffer | null, headerOffset: number) => {
    if (!part) return;
    header.writeUInt32LE(offset, headerOffset);
    sections.push(part);
    offset += part.length;
  };

  place(parsed.owner, 4);
  place(parsed.group, 8);
  place(parsed.sacl, 12);
  place(parsed.dacl, 16);

  return Buffer.concat(sections);
}

function isEveryoneDeletionDeny(ace: Ace): boolean {
  if (ace.type !== ACE_TYPES.ACCESS_DENIED) {
    return false;
  }
  const mask = ace.raw.readUInt32LE(ACE_HEADER_SIZE);
  const sidOffset = ACE_HEADER_SIZE + 4;
  const sid = ace.raw.subarray(sidOffset, sidOffset + sidLength(ace.raw, sidOffset));
  return (mask & DELETION_RIGHTS) !== 0 && sid.equals(EVERYONE_SID);
}

/**
 * Whether the descriptor's DACL carries the accidental-deletion deny ACE
 */
export function hasDeletionProtection(descriptor: Buffer): boolean {
  const { dacl } = parseDescriptor(descriptor);
  return !!dacl && parseAces(dacl).some(isEveryoneDeletionDeny);
}

/**
 * Strip DELETE and DELETE_TREE from Everyone deny ACEs. An ACE left with no
 * rights is dropped. Other parts of the descriptor are carried over untouched.
 */
export function removeDeletionProtection(descriptor: Buffer): DeletionProtectionResult {
  const parsed = parseDescriptor(descriptor);
  if (!parsed.dacl) {
    return { descriptor, changed: false };
  }

  const aces = parseAces(parsed.dacl);
  if (!aces.some(isEveryoneDeletionDeny)) {
    return { descriptor, changed: false };
  }

  const kept: Ace[] = [];
  for (const ace of aces) {
    if (!isEveryoneDeletionDeny(ace)) {
      kept.push(ace);
      continue;
    }
    const remaining = ace.raw.readUInt32LE(ACE_HEADER_SIZE) & ~DELETION_RIGHTS;
    if (remaining !== 0) {
      const raw = Buffer.from(ace.raw);
      raw.writeUInt32LE(remaining >>> 0, ACE_HEADER_SIZE);
      kept.push({ ...ace, raw });
    }
  }

  const dacl = buildAcl(parsed.dacl.readUInt8(0), kept);
  return { descriptor: buildDescriptor({ ...parsed, dacl }), changed: true };
}
