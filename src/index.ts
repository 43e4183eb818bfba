// Public API
export * from "./filter/ast.js";
export * from "./filter/value.js";
export * from "./filter/errors.js";
export { evaluateQuery, evaluateExpression } from "./filter/evaluate.js";
export type { EvaluateOptions } from "./filter/evaluate.js";
export { createContext, evaluateTerm, isTruthy } from "./filter/terms.js";
export type { Context, ContextInit } from "./filter/terms.js";
export { isFieldGetter, lookupField, resolveRecord } from "./filter/record.js";
export type { FieldGetter, Lookup, RecordView } from "./filter/record.js";
export { decodeQuery, deserializeQuery, encodeQuery, serializeQuery, valueFromJson, valueToJson } from "./filter/codec.js";
export type { JsonValue, WireExpression, WireQuery } from "./filter/validate.js";
export { parseQuery, Parser } from "./parser/parser.js";
export { tokenize } from "./parser/lexer.js";
export type { Token, TokenType } from "./parser/lexer.js";
export { stringifyExpression, stringifyQuery } from "./parser/stringify.js";
export { filterJsonLines, filterRecords, parseJsonLines, testDocument } from "./records/jsonl.js";
export { csvRecord, filterCsv, formatCsv, parseCsv } from "./records/csv.js";
export type { CsvTable } from "./records/csv.js";
export { parseYamlDocuments, testYamlDocument } from "./records/yaml.js";
export { parseJson, stringifyJson } from "./filter/json.js";
export * from "./aliases.js";
export { configureLogging, getLog, Log, LogLevel } from "./utils/logger.js";
export type { LoggerConfig } from "./utils/logger.js";
