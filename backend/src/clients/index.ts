/**
 * External Service Clients
 *
 * The DataLoader backend is reached over gRPC only.
 */

export {
  GrpcConnector,
  GrpcDataLoaderClient,
  loadDataLoaderService,
  resolveProtoPath,
  toUpstreamError,
} from './dataloader.client.js';

export type {
  BackendConnector,
  BackendStream,
  CallOptions,
  DataLoaderClient,
  GrpcConnectorConfig,
} from './dataloader.client.js';
