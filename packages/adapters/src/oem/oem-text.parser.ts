/**
 * OEM KVN (keyword = value notation) parser.
 *
 * CCSDS_OEM_VERS = 2.0
 * CREATION_DATE  = 2024-067T20:45:44.555
 * ORIGINATOR     = JSC
 * META_START
 * OBJECT_NAME    = ISS
 * ...
 * META_STOP
 * COMMENT free text
 * 2024-067T12:00:00.000 -4296.4 3571.2 3780.9 -5.1 -4.5 2.3
 *
 * Data lines carry an epoch and six values, optionally followed by three
 * accelerations which are ignored. Covariance blocks are skipped. Only
 * keywords before the first META_START belong to the header.
 */

import type { StateVector, TrajectoryDataset } from '@iss-tracker/domain';
import { OemParseError } from '../errors.js';
import { STATE_VECTOR_FIELDS, buildStateVector, parseNumber } from './build-state-vector.js';

type Section = 'header' | 'metadata' | 'data' | 'covariance';

const KEY_VALUE_RE = /^([A-Z][A-Z0-9_]*)\s*=\s*(.*)$/;

/**
 * Parse an OEM KVN text document.
 *
 * @throws OemParseError on a malformed data line or when no data lines are present
 */
export function parseOemText(text: string): TrajectoryDataset {
  const header: Record<string, string> = {};
  const metadata: Record<string, string> = {};
  const comments: string[] = [];
  const stateVectors: StateVector[] = [];

  let section: Section = 'header';
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, i) => {
    const line = raw.trim();
    const where = `line ${i + 1}`;
    if (line.length === 0) return;

    if (section === 'covariance') {
      if (line === 'COVARIANCE_STOP') section = 'data';
      return;
    }
    if (line === 'META_START') {
      section = 'metadata';
      return;
    }
    if (line === 'META_STOP') {
      section = 'data';
      return;
    }
    if (line === 'COVARIANCE_START') {
      section = 'covariance';
      return;
    }
    if (line === 'COMMENT' || line.startsWith('COMMENT ')) {
      const comment = line.slice('COMMENT'.length).trim();
      if (comment) comments.push(comment);
      return;
    }

    const kv = KEY_VALUE_RE.exec(line);
    if (kv) {
      const [, key, value] = kv;
      // keywords between segments' data lines carry nothing we keep
      if (section === 'header') header[key] = value.trim();
      else if (section === 'metadata') metadata[key] = value.trim();
      return;
    }

    if (section !== 'data') {
      throw new OemParseError(`${where}: expected KEY = VALUE in ${section} section`);
    }

    const tokens = line.split(/\s+/);
    if (tokens.length !== 7 && tokens.length !== 10) {
      throw new OemParseError(`${where}: expected epoch and 6 values, got ${tokens.length} fields`);
    }
    const [epoch, ...rest] = tokens;
    const values = STATE_VECTOR_FIELDS.map((field, k) => parseNumber(where, field, rest[k]));
    stateVectors.push(buildStateVector(where, epoch, values));
  });

  if (stateVectors.length === 0) throw new OemParseError('no ephemeris data lines found');

  return { info: { header, metadata, comments }, stateVectors };
}
