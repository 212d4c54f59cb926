/**
 * On-disk credential cache.
 *
 * The file holds refresh tokens and is as sensitive as a password: it is
 * written owner-only (0600) and always through write-temp-then-rename, so a
 * crash mid-write leaves the previous cache intact.
 */

import { readFileIfExists, writeFileAtomic } from "../core/files.js";
import type { Logger } from "../core/types.js";
import type { Credential } from "./types.js";

const CACHE_VERSION = 1;

interface TokenCacheFile {
  version: number;
  accounts: Record<string, Credential>;
}

export interface TokenCacheStore {
  load(account: string): Promise<Credential | null>;
  save(credential: Credential): Promise<void>;
  clear(account: string): Promise<boolean>;
}

function isCredential(value: unknown): value is Credential {
  if (value == null || typeof value !== "object") return false;
  if (
    !("accessToken" in value) ||
    !("refreshToken" in value) ||
    !("expiresAt" in value) ||
    !("account" in value)
  ) {
    return false;
  }
  return (
    typeof value.accessToken === "string" &&
    typeof value.refreshToken === "string" &&
    typeof value.expiresAt === "number" &&
    typeof value.account === "string"
  );
}

export class FileTokenCache implements TokenCacheStore {
  private readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, logger: Logger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  private read(): TokenCacheFile {
    const empty: TokenCacheFile = { version: CACHE_VERSION, accounts: {} };
    const raw = readFileIfExists(this.filePath);
    if (raw === null) return empty;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn("Token cache is not valid JSON, ignoring it", {
        path: this.filePath,
      });
      return empty;
    }
    if (parsed == null || typeof parsed !== "object" || !("accounts" in parsed)) {
      return empty;
    }
    const accounts = parsed.accounts;
    if (accounts == null || typeof accounts !== "object") return empty;

    for (const [account, entry] of Object.entries(accounts)) {
      if (isCredential(entry)) {
        empty.accounts[account] = entry;
      }
    }
    return empty;
  }

  private write(file: TokenCacheFile): void {
    writeFileAtomic(this.filePath, JSON.stringify(file, null, 2), 0o600);
  }

  async load(account: string): Promise<Credential | null> {
    return this.read().accounts[account] ?? null;
  }

  async save(credential: Credential): Promise<void> {
    const file = this.read();
    file.accounts[credential.account] = credential;
    this.write(file);
  }

  async clear(account: string): Promise<boolean> {
    const file = this.read();
    if (!(account in file.accounts)) return false;
    delete file.accounts[account];
    this.write(file);
    return true;
  }
}
