import { allElements, getAttr } from './xml-utils.js'

// Ids the tool allocates itself: trsvg1, trsvg2, ...
const RESERVED_ID_REGEX = /^trsvg(\d+)$/

/**
 * `<base>-<lang>`, then `<base>-<lang>-2`, `-3`, ... until unused
 */
export function generateUniqueId(
  baseId: string,
  lang: string,
  existing: ReadonlySet<string>,
): string {
  const candidate = `${baseId}-${lang}`
  if (!existing.has(candidate)) {
    return candidate
  }
  let suffix = 2
  while (existing.has(`${candidate}-${suffix}`)) {
    suffix++
  }
  return `${candidate}-${suffix}`
}

/**
 * Id bookkeeping for a single document pass. Tracks every id in use and the
 * highest reserved number, so new reserved ids never collide.
 */
export class IdAllocator {
  private readonly inUse = new Set<string>()
  private maxReserved = 0

  /**
   * Seed from every id attribute under `root`
   */
  static fromTree(root: Node): IdAllocator {
    const allocator = new IdAllocator()
    for (const element of allElements(root)) {
      const id = getAttr(element, 'id')?.trim()
      if (id) {
        allocator.register(id)
      }
    }
    return allocator
  }

  get ids(): ReadonlySet<string> {
    return this.inUse
  }

  has(id: string): boolean {
    return this.inUse.has(id)
  }

  register(id: string): void {
    this.inUse.add(id)
    const match = id.match(RESERVED_ID_REGEX)
    if (match) {
      this.maxReserved = Math.max(this.maxReserved, Number(match[1]))
    }
  }

  /**
   * Allocate the next unused `trsvg<N>`
   */
  next(): string {
    let id: string
    do {
      this.maxReserved++
      id = `trsvg${this.maxReserved}`
    } while (this.inUse.has(id))
    this.inUse.add(id)
    return id
  }

  /**
   * Allocate a language-suffixed id derived from `baseId`
   */
  derive(baseId: string, lang: string): string {
    const id = generateUniqueId(baseId, lang, this.inUse)
    this.register(id)
    return id
  }
}
