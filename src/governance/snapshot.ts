/**
 * Session snapshots: the relation graph, favor ledger and drawn corruption
 * values as plain JSON maps, so a session can be resumed later.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { type Result, type SessionSnapshot, SessionSnapshotSchema, ok, err } from '../types/index.js';
import { expandPath } from '../config/config.js';
import { createLogger } from '../kernel/logger.js';
import { NegotiationSession, type SessionOptions } from './negotiation-session.js';

const log = createLogger('snapshot');

export function parseSnapshot(data: unknown): Result<SessionSnapshot, Error> {
  const result = SessionSnapshotSchema.safeParse(data);
  if (!result.success) {
    return err(new Error(`Invalid session snapshot: ${result.error.message}`));
  }
  return ok(result.data);
}

export function saveSnapshot(filePath: string, session: NegotiationSession): Result<SessionSnapshot, Error> {
  try {
    const target = expandPath(filePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });

    const snapshot = session.snapshot();
    fs.writeFileSync(target, JSON.stringify(snapshot, null, 2), 'utf-8');

    log.info({ path: target, favors: session.ledger.size }, 'Session snapshot saved');
    return ok(snapshot);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function loadSnapshot(filePath: string): Result<SessionSnapshot, Error> {
  try {
    const source = expandPath(filePath);
    const parsed: unknown = JSON.parse(fs.readFileSync(source, 'utf-8'));
    return parseSnapshot(parsed);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

/** Load a snapshot and resume a session from it. */
export function resumeSession(filePath: string, options: SessionOptions = {}): Result<NegotiationSession, Error> {
  const loaded = loadSnapshot(filePath);
  if (!loaded.success) return loaded;
  return ok(NegotiationSession.fromSnapshot(loaded.data, options));
}
