export { loadConfig, sessionEnvVar, type AppConfig, type SiteProfile, type FetchSettings, type BatchSettings } from './config.js';
export { fetchPage, createFetcher, type FetchResult, type Fetcher } from './fetch.js';
export { runBatch, resolveInput, resolveOutputPath, uniqueOutputPath, type UrlOutcome, type BatchOptions, type BatchDeps } from './batch.js';
export { captureLogin } from './login.js';
export { autoScroll, dismissConsent, withBrowserPage, type ScrollDriver } from './browser.js';
export { findProfileForUrl, loadSessionSnapshot } from './profiles.js';
