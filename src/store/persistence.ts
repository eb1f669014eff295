/**
 * Relationship Store File
 *
 * The registry's on-disk form: one snapshot per relationship, keyed by the
 * pair key. The previous file is kept as `<path>.backup` and writes go
 * through `<path>.tmp` so a crash never leaves a half-written store.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Relationship } from '../relationship/relationship';
import type { RelationshipData } from '../relationship/types';
import { isRecord, isRelationshipData } from './snapshot';
import { RelationshipStoreData } from './types';

export const SCHEMA_VERSION = 1;

export function getDefaultStorePath(): string {
  return path.join(os.homedir(), '.dyad-trust', 'relationships.json');
}

/**
 * Snapshots read from one store file, plus the keys that failed validation
 */
export interface DecodedStore {
  snapshots: RelationshipData[];
  rejected: string[];
}

/**
 * Parse a store file. Throws when the file is not a store at all;
 * individual bad snapshots are reported in `rejected`.
 */
export function decodeStore(content: string): DecodedStore {
  const document: unknown = JSON.parse(content);
  if (!isRecord(document) || typeof document.version !== 'number' || !isRecord(document.relationships)) {
    throw new Error('Relationship store has an invalid shape');
  }
  if (document.version !== SCHEMA_VERSION) {
    console.warn(`Relationship store schema version ${document.version} differs from current ${SCHEMA_VERSION}`);
  }

  const decoded: DecodedStore = { snapshots: [], rejected: [] };
  for (const [key, snapshot] of Object.entries(document.relationships)) {
    if (isRelationshipData(snapshot) && Relationship.pairKey(snapshot.entityA, snapshot.entityB) === key) {
      decoded.snapshots.push(snapshot);
    } else {
      decoded.rejected.push(key);
    }
  }
  return decoded;
}

/**
 * Serialize snapshots into a store document
 */
export function encodeStore(snapshots: Iterable<RelationshipData>): RelationshipStoreData {
  const relationships: Record<string, RelationshipData> = {};
  for (const snapshot of snapshots) {
    relationships[Relationship.pairKey(snapshot.entityA, snapshot.entityB)] = snapshot;
  }
  return {
    version: SCHEMA_VERSION,
    lastUpdated: new Date().toISOString(),
    relationships,
  };
}

async function tryDecode(filePath: string): Promise<DecodedStore | Error> {
  try {
    return decodeStore(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Read every valid snapshot from a store file.
 *
 * A missing file is an empty store. When the file is unreadable or holds
 * invalid snapshots, a clean backup wins; otherwise the valid snapshots of
 * the main file are kept and the rest skipped.
 */
export async function loadRelationshipStore(storePath: string): Promise<RelationshipData[]> {
  if (!fs.existsSync(storePath)) {
    return [];
  }

  const main = await tryDecode(storePath);
  if (!(main instanceof Error) && main.rejected.length === 0) {
    return main.snapshots;
  }

  const backupPath = storePath + '.backup';
  if (fs.existsSync(backupPath)) {
    const backup = await tryDecode(backupPath);
    if (!(backup instanceof Error) && backup.rejected.length === 0) {
      console.warn('Main relationship store corrupted, loading from backup');
      return backup.snapshots;
    }
  }

  if (main instanceof Error) {
    console.error('Failed to load relationship store:', main);
    return [];
  }

  for (const key of main.rejected) {
    console.warn(`Skipping invalid relationship snapshot ${key}`);
  }
  return main.snapshots;
}

/**
 * Write snapshots to a store file, keeping the previous file as backup
 */
export async function saveRelationshipStore(
  storePath: string,
  snapshots: Iterable<RelationshipData>
): Promise<void> {
  await fs.promises.mkdir(path.dirname(storePath), { recursive: true });

  if (fs.existsSync(storePath)) {
    await fs.promises.copyFile(storePath, storePath + '.backup');
  }

  const tempPath = storePath + '.tmp';
  await fs.promises.writeFile(tempPath, JSON.stringify(encodeStore(snapshots), null, 2), 'utf-8');
  await fs.promises.rename(tempPath, storePath);
}
