// ─── Errors ───────────────────────────────────────────────────────────────────
export { OemParseError, FeedFetchError } from './errors.js';
export type { AdapterErrorCode } from './errors.js';

// ─── OEM Parsers ──────────────────────────────────────────────────────────────
export { parseOemXml } from './oem/oem-xml.parser.js';
export { parseOemText } from './oem/oem-text.parser.js';
export { parseOem, detectOemEncoding } from './oem/parse-oem.js';
export type { OemEncoding } from './oem/parse-oem.js';

// ─── NASA Feed Adapter ────────────────────────────────────────────────────────
export { NasaOemFeedAdapter, NASA_ISS_OEM_XML_URL } from './nasa/nasa-oem-feed.adapter.js';
export type { NasaOemFeedOptions } from './nasa/nasa-oem-feed.adapter.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { WallClock, FixedClock } from './clock/clock.js';
