/**
 * HTTP Module
 *
 * Cached, retrying HTTP client shared by every network-facing stage.
 */

export * from './cache';
export * from './fetcher';
