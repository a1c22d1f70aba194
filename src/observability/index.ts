// ═══════════════════════════════════════════════════════════════════════════════
// OBSERVABILITY — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export * from './logging/index.js';
