// Text types
export { Scalar } from "./text/scalar.ts";
export { TextView } from "./text/text_view.ts";
export { TextBuffer, type TextBufferOptions } from "./text/text_buffer.ts";
export {
  CapacityManager,
  type GrowthStats,
} from "./text/capacity_manager.ts";

// Codec
export {
  decodeLossy,
  decodeOne,
  type Decoded,
  encode,
  encodeInto,
  isBoundary,
  isContinuationByte,
  validate,
} from "./text/codec.ts";

// Numeric conversion
export { parseInteger, parseNumber, toText } from "./text/conversion.ts";

// Errors
export {
  BoundaryError,
  InvalidCodepointError,
  type MalformedReason,
  MalformedSequenceError,
  ParseError,
  type ParseErrorKind,
  StaleViewError,
} from "./text/text_errors.ts";

// Results
export {
  andThen,
  type Err,
  err,
  isErr,
  isOk,
  map,
  mapErr,
  type Ok,
  ok,
  type Result,
  unwrap,
} from "./internal/result.ts";
