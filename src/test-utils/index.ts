/**
 * Test utilities for primitives-compat
 *
 * This module exports all test utilities including:
 * - Property-based testing configuration and arbitraries
 * - Byte comparison helpers
 */

// Property-based testing utilities
export * from './property-test-config.js';

// Byte comparison utilities
export * from './byte-comparison.js';
