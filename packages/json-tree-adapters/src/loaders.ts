import { parse } from "lossless-json"
import * as Y from "yjs"
import type { Adapter } from "./adapter"
import {
  isLosslessJsonNode,
  LOSSLESS_JSON_ADAPTER_NAME,
  type LosslessJsonNode,
  losslessJsonTraits,
} from "./adapters/losslessJson"
import { plainJsonTraits } from "./adapters/plainJson"
import { type YjsRoot, yjsTraits } from "./adapters/yjs"
import { describeValue } from "./BasicAdapter"
import { typeMismatch, unsupportedValue } from "./error"
import { isJSONArray, isJSONRecord, type JSONValue } from "./json"
import { getLogger } from "./logger"
import type { BackendName } from "./traits"

export interface YjsLoadOptions {
  /**
   * Document to load into.
   * Default: a new `Y.Doc`.
   */
  doc?: Y.Doc

  /**
   * Name of the root shared type.
   * Default: "root".
   */
  rootName?: string
}

function logLoaded(root: Adapter): void {
  const logger = getLogger()
  if (logger.isDebugEnabled()) {
    logger.debug("Loaded document", { adapter: root.adapterName, kind: root.kind() })
  }
}

/**
 * Parses text with the built-in JSON parser.
 */
export function parsePlainJson(text: string): JSONValue {
  const document: JSONValue = JSON.parse(text)
  logLoaded(plainJsonTraits.wrap(document))
  return document
}

/**
 * Parses text with lossless-json, keeping every number literal as written.
 */
export function parseLosslessJson(text: string): LosslessJsonNode {
  const document = parse(text)
  if (!isLosslessJsonNode(document)) {
    unsupportedValue(`${LOSSLESS_JSON_ADAPTER_NAME} parser produced a value outside the JSON model`)
  }
  logLoaded(losslessJsonTraits.wrap(document))
  return document
}

/**
 * Builds an unintegrated shared type for a JSON subtree. Scalars are stored as is.
 */
function toShared(value: JSONValue): unknown {
  if (isJSONArray(value)) {
    const array = new Y.Array<unknown>()
    array.push(value.map(toShared))
    return array
  }
  if (isJSONRecord(value)) {
    const map = new Y.Map<unknown>()
    for (const [name, child] of Object.entries(value)) {
      map.set(name, toShared(child))
    }
    return map
  }
  return value
}

/**
 * Parses JSON text and loads it into a Yjs document, nested containers becoming
 * `Y.Map` / `Y.Array`. The root must be an object or an array.
 */
export function parseYjsDocument(text: string, options: YjsLoadOptions = {}): YjsRoot {
  const { doc = new Y.Doc(), rootName = "root" } = options
  const document: JSONValue = JSON.parse(text)

  let root: YjsRoot
  if (isJSONArray(document)) {
    const array = doc.getArray<unknown>(rootName)
    doc.transact(() => {
      array.push(document.map(toShared))
    })
    root = array
  } else if (isJSONRecord(document)) {
    const map = doc.getMap<unknown>(rootName)
    doc.transact(() => {
      for (const [name, child] of Object.entries(document)) {
        map.set(name, toShared(child))
      }
    })
    root = map
  } else {
    return typeMismatch(
      `A Yjs document root must be an object or an array, got ${describeValue(plainJsonTraits.wrap(document))}`
    )
  }

  logLoaded(yjsTraits.wrap(root))
  return root
}

/**
 * Parser for each backend that reads text. Frozen values are only made by freezing.
 */
export const documentLoaders = {
  plainJson: parsePlainJson,
  losslessJson: parseLosslessJson,
  yjs: parseYjsDocument,
} as const satisfies Partial<Record<BackendName, (text: string) => unknown>>
