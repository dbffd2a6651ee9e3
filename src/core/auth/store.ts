import { readFile, writeFile, mkdir, rm } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { StoredSession } from '../../types/index.js';

export interface CredentialStore {
  load(): Promise<StoredSession>;
  save(session: StoredSession): Promise<void>;
  clear(): Promise<void>;
}

const credentialSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  tokenUri: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().optional(),
  scopes: z.array(z.string()),
  expiresAt: z.number().optional(),
});

const sessionSchema = z.object({
  credential: credentialSchema.optional(),
  pendingState: z.string().min(1).optional(),
});

function copySession(session: StoredSession): StoredSession {
  const copy: StoredSession = {};
  if (session.credential) copy.credential = { ...session.credential, scopes: [...session.credential.scopes] };
  if (session.pendingState) copy.pendingState = session.pendingState;
  return copy;
}

/**
 * Keeps the session in process memory only; nothing survives a restart.
 */
export class MemoryCredentialStore implements CredentialStore {
  private session: StoredSession = {};

  constructor(initial?: StoredSession) {
    if (initial) this.session = copySession(initial);
  }

  async load(): Promise<StoredSession> {
    return copySession(this.session);
  }

  async save(session: StoredSession): Promise<void> {
    this.session = copySession(session);
  }

  async clear(): Promise<void> {
    this.session = {};
  }
}

/**
 * Serializes the session as plain JSON. The file is neither encrypted nor
 * locked; concurrent writers race and the last one wins.
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<StoredSession> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return {};
    }

    const parsed = sessionSchema.safeParse(raw);
    if (!parsed.success) return {};

    const session: StoredSession = {};
    if (parsed.data.credential) session.credential = parsed.data.credential;
    if (parsed.data.pendingState) session.pendingState = parsed.data.pendingState;
    return session;
  }

  async save(session: StoredSession): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(session, null, 2), { mode: 0o600 });
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

