import net, { BlockList } from "node:net";

import { z } from "zod";

import type { Logger } from "./domain.js";
import { loadJsonFile } from "./json-file.js";

export const BANNED_FILENAME = "banned.json";
export const WHITELIST_FILENAME = "whitelist.json";

export const AccessListEntrySchema = z
  .object({
    address: z.string().min(1),
    note: z.string().optional(),
  })
  .strict();

export const AccessListFileSchema = z
  .object({
    version: z.literal(1),
    entries: z.array(AccessListEntrySchema),
  })
  .strict();

export type AccessListEntry = z.infer<typeof AccessListEntrySchema>;
export type AccessListFile = z.infer<typeof AccessListFileSchema>;

type AddressFamily = "ipv4" | "ipv6";

export type AccessRule =
  | { kind: "address"; address: string; family: AddressFamily }
  | { kind: "subnet"; network: string; prefix: number; family: AddressFamily };

type CompiledRules = {
  readonly blockList: BlockList;
  readonly entries: readonly AccessListEntry[];
};

const IPV4_MAPPED_PREFIX = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/;

function familyOf(address: string): AddressFamily | null {
  const version = net.isIP(address);
  if (version === 4) return "ipv4";
  if (version === 6) return "ipv6";
  return null;
}

/** Canonical form used for matching; IPv4-mapped IPv6 collapses to plain IPv4. */
export function normalizeAddress(address: string): string {
  let value = address.trim().toLowerCase();
  if (value.startsWith("[") && value.endsWith("]")) {
    value = value.slice(1, -1);
  }
  const zoneIndex = value.indexOf("%");
  if (zoneIndex !== -1) {
    value = value.slice(0, zoneIndex);
  }
  const mapped = IPV4_MAPPED_PREFIX.exec(value);
  if (mapped?.[1] && net.isIPv4(mapped[1])) {
    return mapped[1];
  }
  return value;
}

export function parseAccessRule(raw: string): AccessRule | null {
  const slash = raw.indexOf("/");
  if (slash === -1) {
    const address = normalizeAddress(raw);
    const family = familyOf(address);
    return family ? { kind: "address", address, family } : null;
  }
  const network = normalizeAddress(raw.slice(0, slash));
  const prefixText = raw.slice(slash + 1).trim();
  const family = familyOf(network);
  if (!family || !/^\d{1,3}$/.test(prefixText)) {
    return null;
  }
  const prefix = Number(prefixText);
  if (prefix > (family === "ipv4" ? 32 : 128)) {
    return null;
  }
  return { kind: "subnet", network, prefix, family };
}

function compile(entries: readonly AccessListEntry[]): {
  rules: CompiledRules;
  rejected: AccessListEntry[];
} {
  const blockList = new BlockList();
  const accepted: AccessListEntry[] = [];
  const rejected: AccessListEntry[] = [];
  for (const entry of entries) {
    const rule = parseAccessRule(entry.address);
    if (!rule) {
      rejected.push(entry);
      continue;
    }
    if (rule.kind === "address") {
      blockList.addAddress(rule.address, rule.family);
    } else {
      blockList.addSubnet(rule.network, rule.prefix, rule.family);
    }
    accepted.push(Object.freeze({ ...entry }));
  }
  return { rules: Object.freeze({ blockList, entries: Object.freeze(accepted) }), rejected };
}

/**
 * One address rule set (ban list or whitelist). The compiled rules are
 * immutable; `replace` builds a new set and swaps the reference, so a
 * lookup sees either the old set or the new one.
 */
export class AccessList {
  private rules: CompiledRules = compile([]).rules;

  constructor(readonly name: string) {}

  replace(entries: readonly AccessListEntry[]): { accepted: number; rejected: AccessListEntry[] } {
    const next = compile(entries);
    this.rules = next.rules;
    return { accepted: next.rules.entries.length, rejected: next.rejected };
  }

  matches(address: string): boolean {
    const normalized = normalizeAddress(address);
    const family = familyOf(normalized);
    if (!family) {
      return false;
    }
    return this.rules.blockList.check(normalized, family);
  }

  entries(): readonly AccessListEntry[] {
    return this.rules.entries;
  }

  size(): number {
    return this.rules.entries.length;
  }
}

export type AccessControlStoreOptions = {
  bannedPath: string;
  whitelistPath: string;
  /** When this returns false every address counts as whitelisted. */
  isWhitelistEnabled?: () => boolean;
  logger: Logger;
};

const EMPTY_ACCESS_LIST: AccessListFile = { version: 1, entries: [] };

export class AccessControlStore {
  readonly banned = new AccessList("banned");
  readonly whitelist = new AccessList("whitelist");

  constructor(private readonly options: AccessControlStoreOptions) {}

  async load(): Promise<void> {
    await Promise.all([this.reloadBanned(), this.reloadWhitelist()]);
  }

  /** Rejects and keeps the previous rules when the file is unreadable or invalid. */
  async reloadBanned(): Promise<void> {
    await this.reload(this.banned, this.options.bannedPath);
  }

  async reloadWhitelist(): Promise<void> {
    await this.reload(this.whitelist, this.options.whitelistPath);
  }

  isBanned(address: string): boolean {
    return this.banned.matches(address);
  }

  isWhitelisted(address: string): boolean {
    if (!this.isWhitelistEnabled()) {
      return true;
    }
    return this.whitelist.matches(address);
  }

  isWhitelistEnabled(): boolean {
    return this.options.isWhitelistEnabled?.() ?? true;
  }

  private async reload(list: AccessList, filePath: string) {
    const file = await loadJsonFile(filePath, AccessListFileSchema, EMPTY_ACCESS_LIST);
    const { accepted, rejected } = list.replace(file.entries);
    for (const entry of rejected) {
      this.options.logger.warn(`Ignoring invalid ${list.name} entry "${entry.address}" in ${filePath}`);
    }
    this.options.logger.info(`Loaded ${accepted} ${list.name} rule(s) from ${filePath}`);
  }
}
