import { readFile, rename, writeFile } from 'node:fs/promises';

import { PersistenceUnavailableError, parseSessionSnapshot, silentLogger } from '@labyrinth/core';
import type { Logger, SessionSnapshot, SessionStore } from '@labyrinth/core';

type SaveCollection = Record<string, unknown>;

export interface FileSessionStoreOptions {
  logger?: Logger;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * Every player's snapshot in one JSON document keyed by login. Writes replace
 * the whole file; the last writer wins.
 */
export class FileSessionStore implements SessionStore {
  readonly #path: string;
  readonly #logger: Logger;

  constructor(path: string, options: FileSessionStoreOptions = {}) {
    this.#path = path;
    this.#logger = (options.logger ?? silentLogger).child({ store: path });
  }

  async loadSessionFor(loginId: string): Promise<SessionSnapshot | undefined> {
    const collection = await this.#readOrEmpty();
    if (!(loginId in collection)) {
      this.#logger.info({ login: loginId }, 'no saved session for login');
      return undefined;
    }
    const snapshot = parseSessionSnapshot(collection[loginId]);
    if (!snapshot) {
      this.#logger.warn({ login: loginId }, 'saved session is malformed; ignoring it');
    }
    return snapshot;
  }

  async saveSessionFor(loginId: string, snapshot: SessionSnapshot): Promise<void> {
    const collection = await this.#readOrEmpty();
    collection[loginId] = snapshot;
    await this.#write(collection);
  }

  async deleteSessionFor(loginId: string): Promise<void> {
    const collection = await this.#readOrEmpty();
    if (!(loginId in collection)) return;
    delete collection[loginId];
    await this.#write(collection);
  }

  async #read(): Promise<SaveCollection> {
    let raw: string;
    try {
      raw = await readFile(this.#path, 'utf8');
    } catch (error) {
      const reason = isErrnoException(error) && error.code === 'ENOENT' ? 'not found' : 'unreadable';
      throw new PersistenceUnavailableError(`Save file ${this.#path} ${reason}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceUnavailableError(`Save file ${this.#path} is empty or not valid JSON`, { cause: error });
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new PersistenceUnavailableError(`Save file ${this.#path} does not hold a keyed collection`);
    }
    return { ...parsed };
  }

  async #readOrEmpty(): Promise<SaveCollection> {
    try {
      return await this.#read();
    } catch (error) {
      if (error instanceof PersistenceUnavailableError) {
        this.#logger.warn({ err: error }, error.message);
        return {};
      }
      throw error;
    }
  }

  async #write(collection: SaveCollection): Promise<void> {
    const sorted = Object.fromEntries(Object.keys(collection).sort().map((login) => [login, collection[login]]));
    const staging = `${this.#path}.tmp`;
    await writeFile(staging, `${JSON.stringify(sorted, null, 4)}\n`, 'utf8');
    await rename(staging, this.#path);
  }
}
