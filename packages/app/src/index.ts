export { type Cursor, isWhitespace, makeCursor } from "./core/cursor.js"
export { type DecodeError, decodeWith } from "./core/decode.js"
export { type ParseError, parseError, type SchemaError } from "./core/errors.js"
export { isJsonObject, type Json, type JsonObject } from "./core/json.js"
export { locate, type Location } from "./core/location.js"
export { parse, parseEffect } from "./core/parser.js"
export { renderParseError, renderParseErrorAt, renderValue } from "./core/render.js"
export { type KindCounts, measure, renderStats, type ValueStats } from "./core/stats.js"
export {
  foldValue,
  isArray,
  isBool,
  isNull,
  isNumber,
  isObject,
  isString,
  jsonArray,
  jsonBool,
  jsonNull,
  jsonNumber,
  jsonObject,
  type JsonArray,
  type JsonBool,
  type JsonNull,
  type JsonNumber,
  type JsonObjectValue,
  type JsonString,
  jsonString,
  type JsonValue,
  toNative,
  type ValueAlgebra
} from "./core/value.js"
