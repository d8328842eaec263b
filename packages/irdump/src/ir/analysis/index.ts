/**
 * IR analysis exports
 */

export { Formatter, isInlined } from "./formatter/index.js";
export { Validator } from "./validator.js";
export { type Sink, BufferSink, StreamSink } from "./sink.js";
export { Error, ErrorCode, ErrorMessages } from "./errors.js";
