/**
 * CARP Protocol Package
 *
 * Names, fingerprints, wire messages, errors and codec contracts shared by
 * the schema resolver and the client runtime.
 */

export { ExternalName } from './names.js';

export {
  Fingerprint,
  FingerprintTable,
  peerOf,
  peerKey,
  type PeerAddress,
} from './fingerprint.js';

export * from './errors.js';

export * from './wire/types.js';
export {
  isWireObject,
  statusOutcomeOf,
  isJsonContentType,
  parseWireNumber,
  parseWireJson,
  stringifyWire,
  createRequest,
  encodePrints,
  decodePrints,
  parseResponse,
  parseStatusModification,
  parseInternalErrorId,
} from './wire/utils.js';

export * from './schema/types.js';
export {
  requiresNativeForm,
  gatherReferences,
  describeType,
} from './schema/utils.js';

export type {
  Encoder,
  Decoder,
  EncodingContext,
  DecodingContext,
} from './codec.js';
