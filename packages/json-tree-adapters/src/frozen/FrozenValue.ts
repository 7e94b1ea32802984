import { freeze } from "immer"
import type { Adapter } from "../adapter"
import { getLogger } from "../logger"
import { FrozenAdapter } from "./FrozenAdapter"
import { cloneNode, type FrozenNode } from "./FrozenNode"

/**
 * Owned, deeply immutable copy of a document subtree. It holds no reference to the
 * source document, so it stays usable after that document is gone.
 */
export class FrozenValue {
  readonly root: FrozenNode

  constructor(
    root: FrozenNode,
    /** Backend the subtree was copied from. */
    readonly sourceAdapterName: string
  ) {
    this.root = freeze(root, true)
  }

  /**
   * Independent duplicate with its own nodes.
   */
  clone(): FrozenValue {
    return new FrozenValue(cloneNode(this.root), this.sourceAdapterName)
  }

  equalTo(other: Adapter, strict: boolean): boolean {
    return frozenEqualTo(this.root, other, strict)
  }

  /**
   * Adapter over the frozen tree, so it can stand in for a live value.
   */
  adapter(): FrozenAdapter {
    return new FrozenAdapter(this.root)
  }
}

export function frozenEqualTo(node: FrozenNode, other: Adapter, strict: boolean): boolean {
  return new FrozenAdapter(node).equalTo(other, strict)
}

/**
 * Wraps a freshly copied tree. Backends call this from their freeze().
 */
export function createFrozenValue(root: FrozenNode, sourceAdapterName: string): FrozenValue {
  const logger = getLogger()
  if (logger.isDebugEnabled()) {
    logger.debug("Froze value", { adapter: sourceAdapterName, kind: root.kind })
  }
  return new FrozenValue(root, sourceAdapterName)
}
