// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/state-vector.js';
export * from './entities/dataset.js';

// ─── Errors / Epochs / Geodesy ────────────────────────────────────────────────
export * from './errors.js';
export * from './epoch.js';
export * from './geodesy.js';

// ─── Services ─────────────────────────────────────────────────────────────────
export { TelemetryStore } from './services/telemetry-store.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/trajectory-source.port.js';
export * from './ports/outbound/clock.port.js';
