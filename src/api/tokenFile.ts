import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { z } from 'zod';

import type { Credential } from './types.js';
import { ValidationError } from './types.js';

/**
 * Load/save interface for the session credential
 */
export interface TokenPersistence {
  load(): Promise<Credential | undefined>;
  save(credential: Credential): Promise<void>;
}

const TokenFileSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().min(1),
  expires_at: z.number(),   // Epoch seconds
});

export type TokenFileData = z.infer<typeof TokenFileSchema>;

export function credentialToFileData(credential: Credential): TokenFileData {
  return {
    access_token: credential.accessToken,
    refresh_token: credential.refreshToken,
    expires_at: credential.expiresAt.getTime() / 1000,
  };
}

/**
 * JSON token file, e.g. `dimplex_tokens.json`:
 *
 *   { "access_token": "...", "refresh_token": "...", "expires_at": 1767225600 }
 */
export class TokenFile implements TokenPersistence {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Credential | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new ValidationError(`Token file ${this.filePath} is not valid JSON`);
    }

    const result = TokenFileSchema.safeParse(json);
    if (!result.success) {
      throw new ValidationError(
        `Token file ${this.filePath} is malformed`,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }

    // An expired access token is still loaded; its refresh token renews the session
    return {
      accessToken: result.data.access_token,
      refreshToken: result.data.refresh_token,
      expiresAt: new Date(result.data.expires_at * 1000),
    };
  }

  async save(credential: Credential): Promise<void> {
    const json = JSON.stringify(credentialToFileData(credential), null, 2);

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, json, 'utf8');
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
