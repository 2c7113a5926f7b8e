/**
 * matrix-ci — matrix test runner for pull-request workflows.
 *
 * Library entry point. The `matrix-ci` binary (src/cli/bin.ts) runs
 * workflows locally or starts the HTTP service.
 */

export { createApp, createAppContext, startServer, VERSION } from './server';
export type { AppContext, AppContextOptions } from './server';
export { loadConfig, ConfigError } from './config';
export type { AppConfig } from './config';
export * from './logger';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './actions';
export * from './storage';
export * from './data-plane';
