/**
 * Media services exports
 */

export * from './media-resolver';
export * from './media-selector';
