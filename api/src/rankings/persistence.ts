import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage, RankingFileError } from '../errors';
import { logger } from '../logger';

/**
 * Developer name -> latest score. Insertion order is kept in memory, but the
 * file is a plain JSON object, so after a reload integer-like names ("42")
 * come first in ascending numeric order, ahead of the others.
 */
export type Rankings = Map<string, number>;

export interface RankingPersistence {
  load(): Promise<Rankings>;
  save(rankings: Rankings): Promise<void>;
}

const scoreSchema = z.number().finite();

const INDENT = 4;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Keeps the whole table in one JSON object on disk. Writes replace the file
 * in place, so a crash mid-write can leave it truncated.
 */
export class JsonFileRankingPersistence implements RankingPersistence {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Rankings> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return new Map();
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new RankingFileError(this.filePath, errorMessage(err));
    }

    if (!isPlainObject(parsed)) {
      throw new RankingFileError(this.filePath, 'expected an object of developer names to numeric scores');
    }

    // Entries are read off the parsed object itself so that names such as
    // "__proto__" survive as ordinary keys.
    const rankings: Rankings = new Map();
    for (const [name, value] of Object.entries(parsed)) {
      const score = scoreSchema.safeParse(value);
      if (!score.success) {
        throw new RankingFileError(this.filePath, `score for ${JSON.stringify(name)} is not a finite number`);
      }
      rankings.set(name, score.data);
    }
    return rankings;
  }

  async save(rankings: Rankings): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(Object.fromEntries(rankings), null, INDENT), 'utf8');

    logger.info({ module: 'rankings.persistence', file_path: this.filePath, entry_count: rankings.size }, 'Rankings saved');
  }
}

export class InMemoryRankingPersistence implements RankingPersistence {
  private stored: Rankings;
  saveCount = 0;

  constructor(initial: Iterable<[string, number]> = []) {
    this.stored = new Map(initial);
  }

  async load(): Promise<Rankings> {
    return new Map(this.stored);
  }

  async save(rankings: Rankings): Promise<void> {
    this.stored = new Map(rankings);
    this.saveCount += 1;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.stored);
  }
}
