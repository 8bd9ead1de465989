/**
 * bokeh-resources — BokehJS asset resolution for standalone documents.
 *
 * Decides which BokehJS components a document needs, finds them under a
 * deployment mode (CDN, inline, relative or absolute files) and returns the
 * ordered script and style references for the page template.
 */

export * from './version.js';
export * from './errors/index.js';
export * from './models/index.js';
export * from './components/index.js';
export * from './modes/index.js';
export * from './events/index.js';
export * from './resources/index.js';
export * from './config/index.js';
