import { randomBytes } from "crypto";

/**
 * Resource identifiers ("RIDs") have the form `<tag>..<suffix>`: a lowercase tag naming
 * the resource type and a 16 character alphanumeric random suffix. They are generated
 * without any shared state, so concurrent requests never coordinate.
 */

export const RID_SEPARATOR = "..";
export const RID_SUFFIX_LENGTH = 16;

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
// Largest multiple of 62 below 256; bytes at or above it are discarded.
const UNBIASED_LIMIT = 256 - (256 % ALPHABET.length);

const TAG_PATTERN = /^[a-z][a-z0-9]{0,31}$/;
const SUFFIX_PATTERN = new RegExp(`^[A-Za-z0-9]{${RID_SUFFIX_LENGTH}}$`);

export interface ParsedRid {
  tag: string;
  suffix: string;
}

function randomSuffix(length: number): string {
  let suffix = "";
  while (suffix.length < length) {
    const bytes = randomBytes(length * 2);
    for (const byte of bytes) {
      if (byte >= UNBIASED_LIMIT) continue;
      suffix += ALPHABET[byte % ALPHABET.length];
      if (suffix.length === length) break;
    }
  }
  return suffix;
}

export function generateRid(tag: string): string {
  if (!TAG_PATTERN.test(tag)) {
    throw new Error(`Invalid RID tag: "${tag}"`);
  }
  return `${tag}${RID_SEPARATOR}${randomSuffix(RID_SUFFIX_LENGTH)}`;
}

export function parseRid(rid: string): ParsedRid | null {
  const separatorAt = rid.indexOf(RID_SEPARATOR);
  if (separatorAt === -1) return null;

  const tag = rid.slice(0, separatorAt);
  const suffix = rid.slice(separatorAt + RID_SEPARATOR.length);
  if (!TAG_PATTERN.test(tag) || !SUFFIX_PATTERN.test(suffix)) {
    return null;
  }
  return { tag, suffix };
}

/** True when `rid` is well formed and, if given, carries `tag`. */
export function isRid(rid: string, tag?: string): boolean {
  const parsed = parseRid(rid);
  if (!parsed) return false;
  return tag === undefined || parsed.tag === tag;
}
