/**
 * @fileoverview Core module exports.
 * @module core
 * @version 1.0.0
 */

export { ServerConnection } from './ServerConnection';
export type { ServerConnectionConfig } from './ServerConnection';
