import { describe, expect, it } from "vitest"
import * as Y from "yjs"
import {
  adapterRegistry,
  type AdapterTypeOf,
  type DocumentTypeOf,
  documentLoaders,
  FrozenAdapter,
  parseLosslessJson,
  parsePlainJson,
  parseYjsDocument,
  PlainJsonAdapter,
  TypeMismatchError,
  YjsAdapter,
} from "../src/index"

describe("adapterRegistry", () => {
  it("names each backend and its typing discipline", () => {
    expect(adapterRegistry.plainJson.adapterName).toBe("PlainJsonAdapter")
    expect(adapterRegistry.losslessJson.adapterName).toBe("LosslessJsonAdapter")
    expect(adapterRegistry.yjs.adapterName).toBe("YjsAdapter")
    expect(adapterRegistry.frozen.adapterName).toBe("FrozenAdapter")

    expect(adapterRegistry.plainJson.hasStrictTypes).toBe(false)
    expect(adapterRegistry.losslessJson.hasStrictTypes).toBe(true)
    expect(adapterRegistry.yjs.hasStrictTypes).toBe(false)
    expect(adapterRegistry.frozen.hasStrictTypes).toBe(true)
  })

  it("wraps native roots into adapters that agree with their traits", () => {
    const plainDocument: DocumentTypeOf<"plainJson"> = { a: 1 }
    const plain: AdapterTypeOf<"plainJson"> = adapterRegistry.plainJson.wrap(plainDocument)
    const lossless = adapterRegistry.losslessJson.wrap(parseLosslessJson('{"a":1}'))
    const yjs = adapterRegistry.yjs.wrap(parseYjsDocument('{"a":1}'))
    const frozen: AdapterTypeOf<"frozen"> = adapterRegistry.frozen.wrap(plain.freeze())

    expect(plain).toBeInstanceOf(PlainJsonAdapter)
    expect(yjs).toBeInstanceOf(YjsAdapter)
    expect(frozen).toBeInstanceOf(FrozenAdapter)

    for (const [name, adapter] of [
      ["plainJson", plain],
      ["losslessJson", lossless],
      ["yjs", yjs],
      ["frozen", frozen],
    ] as const) {
      expect(adapter.adapterName).toBe(adapterRegistry[name].adapterName)
      expect(adapter.hasStrictTypes).toBe(adapterRegistry[name].hasStrictTypes)
      expect(adapter.equalTo(plain, true)).toBe(true)
    }
  })
})

describe("documentLoaders", () => {
  it("maps each text backend to its parser", () => {
    expect(documentLoaders.plainJson).toBe(parsePlainJson)
    expect(documentLoaders.losslessJson).toBe(parseLosslessJson)
    expect(documentLoaders.yjs).toBe(parseYjsDocument)
  })

  it("loads nested containers as shared types", () => {
    const root = parseYjsDocument('{"o":{"k":"v"},"l":[{"n":1}]}')
    if (!(root instanceof Y.Map)) throw new Error("expected a Y.Map root")

    expect(root.get("o")).toBeInstanceOf(Y.Map)
    const list = root.get("l")
    expect(list).toBeInstanceOf(Y.Array)
    expect(new YjsAdapter(list).getArray().begin().deref().isObject()).toBe(true)
  })

  it("loads array roots into the named shared array of the given document", () => {
    const doc = new Y.Doc()
    const root = parseYjsDocument("[1,2]", { doc, rootName: "data" })

    expect(root).toBe(doc.getArray("data"))
    expect(new YjsAdapter(root).getArraySize()).toBe(2)
  })

  it("rejects scalar roots for Yjs documents", () => {
    expect(() => parseYjsDocument("3")).toThrow(TypeMismatchError)
    expect(() => parseYjsDocument('"x"')).toThrow(
      "A Yjs document root must be an object or an array, got PlainJsonAdapter string"
    )
  })
})
