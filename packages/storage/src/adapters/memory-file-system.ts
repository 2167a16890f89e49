import * as path from "node:path"
import type { FilePath } from "../ports/file-path"
import type { FileSystemPort } from "../ports/file-system"

export type MemoryFileSystemOptions = {
  /**
   * Directories that exist from the start (parents are created too).
   */
  dirs?: readonly FilePath[]

  /**
   * Directories (and everything below them) the process may not write to.
   */
  readOnlyDirs?: readonly FilePath[]
}

export class MemoryFileSystemError extends Error {
  constructor(
    readonly code: "ENOENT" | "EEXIST" | "EISDIR" | "ENOTDIR" | "EACCES",
    readonly syscall: string,
    readonly path: FilePath,
  ) {
    super(`${code}: ${syscall} '${path}'`)
    this.name = "MemoryFileSystemError"
  }
}

/**
 * In-process filesystem with the same observable behavior as NodeFileSystem.
 * Paths are normalized with `path.resolve`.
 */
export class MemoryFileSystem implements FileSystemPort {
  private readonly dirs = new Set<FilePath>([path.resolve("/")])
  private readonly files = new Map<FilePath, Uint8Array>()
  private readonly readOnlyDirs: FilePath[]

  constructor(options: MemoryFileSystemOptions = {}) {
    this.readOnlyDirs = (options.readOnlyDirs ?? []).map((dir) => path.resolve(dir))

    for (const dir of options.dirs ?? []) {
      this.addDirWithParents(path.resolve(dir))
    }
  }

  async dirExists(dirPath: FilePath): Promise<boolean> {
    return this.dirs.has(path.resolve(dirPath))
  }

  async isWritableDir(dirPath: FilePath): Promise<boolean> {
    const resolved = path.resolve(dirPath)
    return this.dirs.has(resolved) && !this.isReadOnly(resolved)
  }

  async createDir(dirPath: FilePath): Promise<boolean> {
    const resolved = path.resolve(dirPath)
    if (this.dirs.has(resolved)) return true

    for (const ancestor of this.lineage(resolved)) {
      if (this.files.has(ancestor)) {
        throw new MemoryFileSystemError(
          ancestor === resolved ? "EEXIST" : "ENOTDIR",
          "mkdir",
          dirPath,
        )
      }
    }

    const firstMissing = this.lineage(resolved).find((dir) => !this.dirs.has(dir))
    if (firstMissing !== undefined && this.isReadOnly(path.dirname(firstMissing))) {
      throw new MemoryFileSystemError("EACCES", "mkdir", dirPath)
    }

    this.addDirWithParents(resolved)
    return true
  }

  async fileExists(filePath: FilePath): Promise<boolean> {
    return this.files.has(path.resolve(filePath))
  }

  async isReadableFile(filePath: FilePath): Promise<boolean> {
    return this.files.has(path.resolve(filePath))
  }

  async createFile(filePath: FilePath): Promise<boolean> {
    const resolved = this.assertWritableTarget(filePath, "open")

    if (!this.files.has(resolved)) {
      this.files.set(resolved, new Uint8Array())
    }

    return true
  }

  async writeFile(filePath: FilePath, data: Uint8Array): Promise<boolean> {
    const resolved = this.assertWritableTarget(filePath, "open")

    this.files.set(resolved, data.slice())
    return true
  }

  async readFile(filePath: FilePath): Promise<Uint8Array> {
    const resolved = path.resolve(filePath)
    if (this.dirs.has(resolved)) {
      throw new MemoryFileSystemError("EISDIR", "read", filePath)
    }

    const data = this.files.get(resolved)
    if (data === undefined) {
      throw new MemoryFileSystemError("ENOENT", "open", filePath)
    }

    return data.slice()
  }

  async deleteFile(filePath: FilePath): Promise<boolean> {
    const resolved = path.resolve(filePath)
    if (!this.files.has(resolved)) {
      throw new MemoryFileSystemError("ENOENT", "unlink", filePath)
    }
    if (this.isReadOnly(path.dirname(resolved))) {
      throw new MemoryFileSystemError("EACCES", "unlink", filePath)
    }

    this.files.delete(resolved)
    return true
  }

  async removeDirRecursive(dirPath: FilePath): Promise<boolean> {
    const resolved = path.resolve(dirPath)
    if (!this.dirs.has(resolved)) return true
    if (this.isReadOnly(resolved)) {
      throw new MemoryFileSystemError("EACCES", "rm", dirPath)
    }

    for (const dir of [...this.dirs]) {
      if (this.isWithin(dir, resolved)) this.dirs.delete(dir)
    }
    for (const file of [...this.files.keys()]) {
      if (this.isWithin(file, resolved)) this.files.delete(file)
    }

    return true
  }

  async listFiles(dir: FilePath): Promise<FilePath[]> {
    const resolved = path.resolve(dir)
    if (!this.dirs.has(resolved)) return []

    return [...this.files.keys()].filter((file) => this.isWithin(file, resolved)).sort()
  }

  private assertWritableTarget(filePath: FilePath, syscall: string): FilePath {
    const resolved = path.resolve(filePath)
    const parent = path.dirname(resolved)

    if (this.dirs.has(resolved)) {
      throw new MemoryFileSystemError("EISDIR", syscall, filePath)
    }
    if (!this.dirs.has(parent)) {
      throw new MemoryFileSystemError("ENOENT", syscall, filePath)
    }
    if (this.isReadOnly(parent)) {
      throw new MemoryFileSystemError("EACCES", syscall, filePath)
    }

    return resolved
  }

  private addDirWithParents(resolved: FilePath): void {
    for (const dir of this.lineage(resolved)) {
      this.dirs.add(dir)
    }
  }

  /** `resolved` and all of its ancestors, root first. */
  private lineage(resolved: FilePath): FilePath[] {
    const chain: FilePath[] = []
    let current = resolved

    while (true) {
      chain.unshift(current)
      const parent = path.dirname(current)
      if (parent === current) break
      current = parent
    }

    return chain
  }

  private isReadOnly(resolved: FilePath): boolean {
    return this.readOnlyDirs.some((dir) => resolved === dir || this.isWithin(resolved, dir))
  }

  private isWithin(candidate: FilePath, dir: FilePath): boolean {
    const prefix = dir.endsWith(path.sep) ? dir : dir + path.sep
    return candidate === dir || candidate.startsWith(prefix)
  }
}
