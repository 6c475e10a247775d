/**
 * @fileoverview Circles client core: shared plumbing
 * @description Configuration, logging, errors, HTTP, decoding and observable state
 */

export * from './config';
export * from './logger';
export * from './errors';
export * from './messages';
export * from './decode';
export * from './state-store';
export * from './serial-queue';
export * from './adapters/auth';
export { AxiosHttpClient, HttpClient, RequestOptions, QueryValue } from './http-client';
