/**
 * Output exports
 */

export { serialize, toJsonValue, SerializationError, type JsonValue, type SerializeOptions } from "./json.js";
