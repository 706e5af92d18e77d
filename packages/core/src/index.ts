// Identifier codec
export {
  CanIdCodec,
  J1939_ADDRESS,
  PDU2_THRESHOLD,
  MAX_CAN_ID,
  type CanIdentifier,
  type CanIdFields,
  type PgnAddressing,
  type PduType,
} from "./canId.js";

// Definition database
export {
  SpnDatabase,
  toSpnDefinition,
  type SpnDefinition,
  type DatabaseStats,
} from "./database.js";
export { DEFAULT_DATABASE } from "./builtin.js";
export * from "./schema.js";

// Decoding
export { BitExtractor, MAX_FIELD_BITS, type Payload } from "./bits.js";
export { SpnDecoder, type DecodedSpn, type SpnReading } from "./decoder.js";
export {
  RequestBuilder,
  REQUEST_PGN,
  DEFAULT_REQUEST_PRIORITY,
  type RequestFrame,
  type RequestOptions,
} from "./request.js";

// Trace parsing
export {
  TraceParser,
  type TraceEntry,
  type TraceParserOptions,
} from "./traceParser.js";

export * from "./errors.js";
export * from "./utils.js";
