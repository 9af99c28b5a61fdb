/**
 * @leader-geo/geo-mapper
 *
 * Generation side of the leader geo map: row sources, the map builder,
 * the binary codec and the metadata sidecar.
 *
 * @module geo-mapper
 */

export {
  InputError,
  BackendError,
  CodecError,
  ConfigError,
  errorMessage,
} from './core/errors.js';
export type { BackendKind } from './core/errors.js';

export {
  GeoMapBuilder,
  buildGeoMap,
  computeGenerationStats,
  resolveBucket,
} from './core/map-builder.js';
export type {
  BuildResult,
  GenerationStats,
  GeoRow,
  GeoSource,
  MapEntry,
} from './core/map-builder.js';

export {
  encodeGeoMap,
  writeBinaryMap,
  readBinaryMap,
  readRecords,
  verifyBinaryMap,
  isValidMap,
  isWellFormed,
} from './core/binary-map.js';
export type { MapRecord, MapVerification } from './core/binary-map.js';

export { atomicWriteFile, atomicWriteJSON } from './core/utils/atomic-write.js';

export { MaxMindGeoIpResolver, openMaxMindResolver } from './geoip/geoip-resolver.js';
export type { GeoIpResolver } from './geoip/geoip-resolver.js';

export { SolanaRpcClient, RpcError, DEFAULT_RPC_URL } from './rpc/rpc-client.js';
export type { RpcClientConfig } from './rpc/rpc-client.js';
export { rowsFromClusterNodes, filterNodesByIdentity } from './rpc/cluster-rows.js';
export type { RowCollection, SkippedRow } from './rpc/cluster-rows.js';

export { parseOverrideFile, parseOverrideLine } from './sources/override-file.js';

export {
  METADATA_SCHEMA_VERSION,
  metadataPathForMap,
  sha256File,
  writeMapMetadata,
} from './metadata.js';
export type { MapMetadata, MetadataInput, MetadataOutput } from './metadata.js';

export { runGeneration } from './generate.js';
export type {
  GenerationDeps,
  GenerationOptions,
  GenerationResult,
  GenerationRpc,
} from './generate.js';
