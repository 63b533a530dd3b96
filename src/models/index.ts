/**
 * Model exports for Harbor Club Manager
 */

export * from './Role.js';
export * from './ClubUser.js';
export * from './Event.js';
export * from './DocumentFolder.js';
export * from './DocumentFile.js';
