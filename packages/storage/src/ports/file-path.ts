/**
 * An absolute, platform-native filesystem path.
 *
 * @remarks
 * Adapters normalize what they receive but never resolve relative paths
 * against their own notion of a working directory; callers pass absolute
 * paths (e.g. built with `path.join(root, ...)`).
 */
export type FilePath = string
