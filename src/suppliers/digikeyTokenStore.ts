import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger } from '../logger';

const cachedTokenSchema = z.object({
  accessToken: z.string().min(1),
  expiresAt: z.number(),
});

export type CachedToken = z.infer<typeof cachedTokenSchema>;

/**
 * Persists the DigiKey OAuth token between runs so each command does not
 * request a fresh one.
 */
export class DigikeyTokenStore {
  private readonly filePath: string;

  constructor(storagePath: string) {
    this.filePath = path.join(storagePath, 'token.json');
  }

  getFilePath(): string {
    return this.filePath;
  }

  async load(): Promise<CachedToken | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      logger.debug({ file: this.filePath, error }, 'No cached DigiKey token');
      return null;
    }

    try {
      const parsed = cachedTokenSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.warn({ file: this.filePath, error }, 'Ignoring unreadable DigiKey token cache');
      return null;
    }
  }

  async save(token: CachedToken): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(token, null, 2), 'utf-8');
  }
}
