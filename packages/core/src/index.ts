/**
 * @file packages/core/src/index.ts
 * @description Main entry point for @docstring-lint/core package
 */

export * from './errors';
export * from './types/docstring';

// Parsing pipeline
export * from './lib/args';
export * from './lib/docstring';
export * from './lib/lint';
export * from './lib/python-source';
export * from './lib/references';
export * from './lib/returns';
export * from './lib/sections';
export * from './lib/type-tokenizer';
export * from './lib/type-validator';

// Shared modules
export * from './shared/config';
export * from './shared/parser-config';

// Workflows
export * from './workflows/check-workflow';
export * from './workflows/parse-workflow';
