/**
 * Domain Module
 *
 * Pure auction computation and types: no logger, container or I/O imports.
 */

export * from './auction';
