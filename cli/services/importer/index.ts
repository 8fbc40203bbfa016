/**
 * Importer services exports
 */

export * from './importer';
