/**
 * Diagnostic module - error types for schemas and wire data.
 */

export { SomeIpError, SchemaError, WireError, ErrorCode, type ErrorDetails } from "./error.js";
