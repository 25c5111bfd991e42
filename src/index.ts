/**
 * xkb-registry
 *
 * Deterministic core for installing custom keyboard layouts into an XKB tree.
 * Portable, testable, dependency-injected.
 */

// Core interfaces
export * from '#/core';

// Constants (shards, marker tags)
export * from '#/constants';

// Logging
export * from '#/logging';

// Errors (kinds and friendly messages)
export * from '#/errors';
export * from '#/friendly-errors';

// Configuration (paths from the environment)
export * from '#/config';

// Schemas (Zod validation)
export * from '#/schemas';

// Layout definitions (YAML descriptors)
export * from '#/layout';

// Pending changes of a registration session
export * from '#/layoutIndex';

// Block markers in symbols files
export * from '#/markers';

// symbols/<locale> files
export * from '#/symbols';

// rules/{base,evdev}.xml files
export * from '#/rules';

// Commit of a session
export * from '#/registration';

// Listing and masks
export * from '#/listing';

// Legacy cleanup, custom layout detection
export * from '#/maintenance';

// User-scope bootstrap
export * from '#/bootstrap';

// Formatters (pure utilities)
export * from '#/formatters';
