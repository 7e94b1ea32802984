import { losslessJsonTraits } from "./adapters/losslessJson"
import { plainJsonTraits } from "./adapters/plainJson"
import { yjsTraits } from "./adapters/yjs"
import { frozenTraits } from "./frozen/FrozenAdapter"

/**
 * Every shipped backend, keyed by name. Entries are resolved statically at the call
 * site; there is no runtime registration.
 */
export const adapterRegistry = {
  plainJson: plainJsonTraits,
  losslessJson: losslessJsonTraits,
  yjs: yjsTraits,
  frozen: frozenTraits,
} as const

export type BackendName = keyof typeof adapterRegistry

/**
 * Native document type a backend wraps.
 */
export type DocumentTypeOf<B extends BackendName> = Parameters<(typeof adapterRegistry)[B]["wrap"]>[0]

/**
 * Adapter type a backend produces for its document root.
 */
export type AdapterTypeOf<B extends BackendName> = ReturnType<(typeof adapterRegistry)[B]["wrap"]>
