/**
 * The live backing arrays of a non-frozen template. Mutating them changes the
 * template; obtaining them permanently disables its render cache.
 */
export type BorrowedView = Readonly<{
  kind: "borrowed"
  values: unknown[]
  strings: string[]
}>

/**
 * Independent copies of a frozen template's arrays. The template is unaffected by
 * anything done to them.
 */
export type OwnedSnapshot = Readonly<{
  kind: "snapshot"
  values: unknown[]
  strings: string[]
}>

export type StorageAccess = BorrowedView | OwnedSnapshot
