/**
 * Span-tracking parsers for HTTP/1.x messages and JSON documents
 *
 * Every parsed element is paired with the exact byte range it occupied in the input,
 * so callers can recover the original bytes of any header, chunk or JSON value.
 *
 * @packageDocumentation
 */

// Body framing
export { bodyBytes, ChunkedState, readBody, readChunkedBody } from "./body";
export type { MessageContext } from "./body";
// Combinators
export * from "./combinators";
// Cursor
export * from "./cursor";
// Errors and validation
export * from "./errors";
// Headers
export * from "./headers";
// JSON
export * from "./json";
// HTTP parser
export * from "./parser";
// Request line parser
export * from "./request";
// Response line parser
export * from "./response";
// Spans
export * from "./span";
// Types
export * from "./types";
// Visitor
export * from "./visit";

// Version
export const VERSION = "1.0.0";
