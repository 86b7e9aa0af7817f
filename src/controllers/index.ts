/**
 * Controllers Layer - Central Export
 * All controller modules should be exported from here for consistent imports
 */

// Pipeline Controllers
export * from './pipelineController';

// Content Controllers
export * from './wikiController';
