export type {
  Adapter,
  AdapterTraits,
  ArrayView,
  DeclaredKind,
  ObjectMember,
  ObjectView,
  ValueContract,
  ValueKind,
  ViewIterator,
} from "./adapter"
export {
  isLosslessJsonNode,
  LOSSLESS_JSON_ADAPTER_NAME,
  LosslessJsonAdapter,
  LosslessJsonArray,
  type LosslessJsonNode,
  type LosslessJsonNodeArray,
  type LosslessJsonNodeRecord,
  LosslessJsonObject,
  losslessJsonTraits,
  LosslessJsonValue,
} from "./adapters/losslessJson"
export {
  PLAIN_JSON_ADAPTER_NAME,
  PlainJsonAdapter,
  PlainJsonArray,
  PlainJsonObject,
  plainJsonTraits,
  PlainJsonValue,
} from "./adapters/plainJson"
export {
  YJS_ADAPTER_NAME,
  YjsAdapter,
  YjsArray,
  type YjsArrayNode,
  type YjsMapNode,
  YjsObject,
  type YjsRoot,
  yjsTraits,
  YjsValue,
} from "./adapters/yjs"
export { adaptersEqual, BasicAdapter, describeValue, kindOf, readNumber } from "./BasicAdapter"
export {
  type Conversion,
  type ConversionFailure,
  type ConversionSuccess,
  type ConversionTarget,
  conversionFailure,
  converted,
  valueOr,
} from "./conversion"
export {
  AdapterError,
  type AdapterErrorCode,
  InvalidIteratorError,
  TypeMismatchError,
  UnsupportedValueError,
} from "./error"
export * from "./frozen"
export { difference, IndexedIterator } from "./iterators"
export type { JSONArray, JSONPrimitive, JSONRecord, JSONValue, Path } from "./json"
export {
  documentLoaders,
  parseLosslessJson,
  parsePlainJson,
  parseYjsDocument,
  type YjsLoadOptions,
} from "./loaders"
export {
  configureLogging,
  defaultLogLevel,
  getLogger,
  LOG_LEVEL_ENV,
  type LoggingOptions,
  type LogLevel,
} from "./logger"
export { type IntegerWidth, integerWidth, type NumericValue } from "./numbers"
export { descend, formatPath } from "./path"
export {
  type AdapterTypeOf,
  adapterRegistry,
  type BackendName,
  type DocumentTypeOf,
} from "./traits"
