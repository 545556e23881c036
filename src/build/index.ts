/**
 * Build Module
 *
 * Bundle the program into one file, then package it into a scratch image.
 */

export * from './types.js';
export * from './options.js';
export * from './bundle.js';
export * from './image.js';
export * from './pipeline.js';
