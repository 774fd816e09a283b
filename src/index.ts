/**
 * Lab asset intake: capture, analysis, record registration and labeling
 * of laboratory items.
 *
 * Public exports for programmatic use. The server entry point is main.ts.
 */

export { createApp, createAppContext, bootstrap, AppContext, AppContextOptions } from './server';
export * from './domain';
export * from './config';
export * from './engine';
export * from './storage';
export * from './notifications';
export * from './capture';
export * from './analysis';
export * from './records';
export * from './labels';
export { createHttpFetch, HttpFetch, HttpRequest, HttpResponse } from './http';
export * from './logger';
