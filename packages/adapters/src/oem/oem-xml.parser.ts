/**
 * OEM XML parser.
 *
 * Parses the CCSDS Orbit Ephemeris Message in its XML (NDM) encoding, as
 * published for the ISS:
 * <ndm>
 *   <oem>
 *     <header>
 *       <CREATION_DATE>2024-067T20:45:44.555Z</CREATION_DATE>
 *       <ORIGINATOR>JSC</ORIGINATOR>
 *     </header>
 *     <body><segment>
 *       <metadata><OBJECT_NAME>ISS</OBJECT_NAME>...</metadata>
 *       <data>
 *         <COMMENT>...</COMMENT>
 *         <stateVector>
 *           <EPOCH>2024-067T12:00:00.000Z</EPOCH>
 *           <X units="km">-4296.4</X> ... <Z_DOT units="km/s">2.3</Z_DOT>
 *         </stateVector>
 *       </data>
 *     </segment></body>
 *   </oem>
 * </ndm>
 */

import { DOMParser, ParseError } from '@xmldom/xmldom';
import type { Document, Element, Node } from '@xmldom/xmldom';
import type { DatasetInfo, StateVector, TrajectoryDataset } from '@iss-tracker/domain';
import { OemParseError } from '../errors.js';
import { STATE_VECTOR_FIELDS, buildStateVector, parseNumber } from './build-state-vector.js';

const ELEMENT_NODE = 1;

function isElement(node: Node | null): node is Element {
  return node !== null && node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Element): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);
    if (isElement(node)) out.push(node);
  }
  return out;
}

function firstChild(parent: Element, tagName: string): Element | undefined {
  return childElements(parent).find((el) => el.tagName === tagName);
}

function elementsByTag(doc: Document, tagName: string): Element[] {
  const list = doc.getElementsByTagName(tagName);
  const out: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const el = list.item(i);
    if (el) out.push(el);
  }
  return out;
}

/** Collects the leaf children of every `<tagName>` section into one map; later sections win. */
function readSection(doc: Document, tagName: string): Record<string, string> {
  const section: Record<string, string> = {};
  for (const el of elementsByTag(doc, tagName)) {
    for (const child of childElements(el)) {
      if (child.tagName === 'COMMENT') continue;
      section[child.tagName] = child.textContent?.trim() ?? '';
    }
  }
  return section;
}

function readComments(doc: Document): string[] {
  return elementsByTag(doc, 'COMMENT')
    .flatMap((el) => (el.textContent ?? '').split(/\r?\n/))
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function readStateVector(el: Element, index: number): StateVector {
  const where = `stateVector[${index}]`;
  const epoch = firstChild(el, 'EPOCH')?.textContent?.trim();
  if (!epoch) throw new OemParseError(`${where}: missing EPOCH`);
  const values = STATE_VECTOR_FIELDS.map((field) =>
    parseNumber(where, field, firstChild(el, field)?.textContent),
  );
  return buildStateVector(where, epoch, values);
}

/**
 * Any parser error, not only a fatal one, rejects the document: xmldom
 * recovers from a mismatched end tag, and a recovered tree can still yield
 * state vectors.
 */
function parseDocument(xml: string): Document {
  const parser = new DOMParser({
    onError: (level, message) => {
      if (level === 'error' || level === 'fatalError') throw new ParseError(message);
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, 'text/xml');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new OemParseError(message.trim(), { cause: err });
  }

  if (!doc.documentElement) throw new OemParseError('document has no root element');
  return doc;
}

/**
 * Parse an OEM XML document into state vectors plus header, metadata and comments.
 *
 * @throws OemParseError if the XML is malformed, a state vector is incomplete,
 *   or the document contains no state vectors
 */
export function parseOemXml(xml: string): TrajectoryDataset {
  const doc = parseDocument(xml);

  const stateVectors = elementsByTag(doc, 'stateVector').map(readStateVector);
  if (stateVectors.length === 0) throw new OemParseError('no stateVector elements found');

  const info: DatasetInfo = {
    header: readSection(doc, 'header'),
    metadata: readSection(doc, 'metadata'),
    comments: readComments(doc),
  };

  return { info, stateVectors };
}
