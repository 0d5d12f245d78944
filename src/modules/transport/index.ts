/**
 * @fileoverview Public exports for the HTTP transport module.
 * @module modules/transport
 * @version 1.0.0
 */

export { HttpTransport } from './HttpTransport';
export { ServerClient } from './ServerClient';
export { ClientCache, clientCacheKey } from './ClientCache';
export { composePipeline, createDefaultHeadersStage, createLoggingStage } from './pipeline';
export { buildAuthorizationHeader, AUTHORIZATION_HEADER } from './headers';
export { readJson, isSuccessStatus, joinUrl } from './response';
export { TRANSPORT_CONSTANTS } from './constants';
export type {
    IHttpTransport,
    HttpTransportConfig,
    IServerClient,
    IClientCache,
    ClientCacheConfig,
    ClientCacheStats,
} from './interfaces';
export type {
    HttpMethod,
    QueryValue,
    ServerRequest,
    ServerResponse,
    TransportRequest,
    PipelineStage,
    FetchLike,
    FetchInitLike,
    FetchResponseLike,
    ClientIdentity,
} from './types';
