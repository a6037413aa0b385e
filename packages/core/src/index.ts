// ============================================
// tierlink Core Engine
// ============================================

/**
 * @module @tierlink/core
 *
 * Bandwidth-allocation compiler, classification rule engine and statistics
 * collector for HFSC link shaping, plus the configuration, logging and
 * error handling they run on.
 */

// ============================================
// Config Module
// ============================================
export * from "./config/index.js";

// ============================================
// Errors Module
// ============================================
export * from "./errors/index.js";

// ============================================
// Logger Module
// ============================================
export * from "./logger/index.js";

// ============================================
// Shaping Module
// ============================================
export * from "./shaping/index.js";

// ============================================
// Stats Module
// ============================================
export * from "./stats/index.js";

// ============================================
// Utilities
// ============================================
export { deepFreeze } from "./utils/freeze.js";
