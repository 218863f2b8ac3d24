/**
 * Outcome of an add-if-absent write.
 *
 * - `written`: the key was absent and now holds the value
 * - `skipped` / `exists`: the key was already present, nothing changed
 * - `skipped` / `rejected`: the backend declined the write (e.g. the value
 *   exceeds a size budget), nothing changed
 */
export type AddResult =
  | { kind: "written" }
  | { kind: "skipped"; reason: "exists" | "rejected" }
