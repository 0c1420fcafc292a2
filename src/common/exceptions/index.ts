/**
 * Common Exceptions Module
 *
 * Re-exports all typed exception classes for easy imports.
 */

export * from './domain.exceptions';
