/**
 * Server Module - Public API
 */

export { ScanServer, DEFAULT_SERVER_CONFIG, scanRequestSchema, default } from './scan-server.js';
export type { ScanServerConfig, ScanRequest } from './scan-server.js';
