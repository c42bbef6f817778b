// CHANGE: map format names and file extensions onto the supported formats
// WHY: the CLI infers formats from paths unless a flag overrides a side
// REF: req-format-1
// FORMAT THEOREM: ∀p: formatFromPath(p) = f → namesToFormat(extension(p).toLowerCase()) = f
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: lookups are case-insensitive
// COMPLEXITY: O(n) in path length

export type Format = "json" | "yaml" | "toml"

const namesToFormat: ReadonlyMap<string, Format> = new Map<string, Format>([
  ["json", "json"],
  ["yaml", "yaml"],
  ["yml", "yaml"],
  ["toml", "toml"]
])

const normalizeSlashes = (value: string): string => value.replaceAll("\\", "/")

const baseName = (path: string): string => {
  const normalized = normalizeSlashes(path)
  const slash = normalized.lastIndexOf("/")
  return slash === -1 ? normalized : normalized.slice(slash + 1)
}

const extensionIndex = (path: string): number => {
  const name = baseName(path)
  const dot = name.lastIndexOf(".")
  // dotfiles such as ".json" have no extension
  if (dot <= 0) {
    return -1
  }
  return path.length - (name.length - dot)
}

/**
 * Extension of the last path segment, without the dot.
 *
 * @pure true
 * @complexity O(n)
 */
export const extensionOf = (path: string): string | undefined => {
  const index = extensionIndex(path)
  return index === -1 ? undefined : path.slice(index + 1)
}

/**
 * Resolve a format name such as `yml` or `TOML`.
 *
 * @pure true
 * @complexity O(1)
 */
export const parseFormatName = (name: string): Format | undefined => namesToFormat.get(name.trim().toLowerCase())

/**
 * Infer the format from a path's extension.
 *
 * @param path - File path, relative or absolute.
 * @returns Format or undefined for unknown or missing extensions.
 *
 * @pure true
 * @invariant only json, yaml, yml and toml extensions are recognized
 * @complexity O(n)
 */
export const formatFromPath = (path: string): Format | undefined => {
  const extension = extensionOf(path)
  return extension === undefined ? undefined : parseFormatName(extension)
}

export const defaultExtension = (format: Format): string => format === "yaml" ? "yml" : format

/**
 * Swap (or append) the extension of the last path segment.
 *
 * @pure true
 * @complexity O(n)
 */
export const replaceExtension = (path: string, extension: string): string => {
  const index = extensionIndex(path)
  const stem = index === -1 ? path : path.slice(0, index)
  return `${stem}.${extension}`
}
