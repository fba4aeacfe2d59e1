export const API_DOCS_PATH = 'docs';
export const HTTP_SLOW_REQUEST_THRESHOLD_MS = 3_000;
export const DEFAULT_APP_VERSION = '1.0.0';
