import type { FilePath } from "./file-path"

/**
 * FileSystemPort is the narrow set of filesystem primitives a file-backed
 * cache needs.
 *
 * @remarks
 * - Existence checks never throw for a missing path; they resolve `false`.
 * - Creation is idempotent so concurrent writers into the same directory do
 *   not fail on "already exists".
 * - Mutating methods resolve `true` on success. Adapters reject (rather than
 *   resolve `false`) when the underlying I/O fails.
 */
export interface FileSystemPort {
  /** `true` if a directory exists at `path`. */
  dirExists(path: FilePath): Promise<boolean>

  /** `true` if a directory exists at `path` and the process may write to it. */
  isWritableDir(path: FilePath): Promise<boolean>

  /** Create a directory and any missing parents. No-op if it exists. */
  createDir(path: FilePath): Promise<boolean>

  /** `true` if a regular file exists at `path`. */
  fileExists(path: FilePath): Promise<boolean>

  /** `true` if a regular file exists at `path` and the process may read it. */
  isReadableFile(path: FilePath): Promise<boolean>

  /** Create an empty file if none exists. The parent directory must exist. */
  createFile(path: FilePath): Promise<boolean>

  /** Replace the content of the file at `path`, creating it if missing. */
  writeFile(path: FilePath, data: Uint8Array): Promise<boolean>

  /** Read the full content of the file at `path`. Rejects if missing. */
  readFile(path: FilePath): Promise<Uint8Array>

  /** Remove the file at `path`. Rejects if missing. */
  deleteFile(path: FilePath): Promise<boolean>

  /** Remove the directory at `path` with everything below it. Missing is success. */
  removeDirRecursive(path: FilePath): Promise<boolean>

  /** Every regular file below `dir`, recursively, as full paths. `[]` when missing. */
  listFiles(dir: FilePath): Promise<FilePath[]>
}
