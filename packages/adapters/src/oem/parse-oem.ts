import type { TrajectoryDataset } from '@iss-tracker/domain';
import { OemParseError } from '../errors.js';
import { parseOemText } from './oem-text.parser.js';
import { parseOemXml } from './oem-xml.parser.js';

export type OemEncoding = 'xml' | 'kvn';

export function detectOemEncoding(body: string): OemEncoding {
  return body.trimStart().startsWith('<') ? 'xml' : 'kvn';
}

/** Parse an OEM document in either encoding. */
export function parseOem(body: string): TrajectoryDataset {
  if (body.trim().length === 0) throw new OemParseError('empty document');
  return detectOemEncoding(body) === 'xml' ? parseOemXml(body) : parseOemText(body);
}
