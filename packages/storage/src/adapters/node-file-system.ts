import { constants } from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { FilePath } from "../ports/file-path"
import type { FileSystemPort } from "../ports/file-system"

export class NodeFileSystem implements FileSystemPort {
  async dirExists(dirPath: FilePath): Promise<boolean> {
    const stat = await this.statOrNull(dirPath)
    return stat?.isDirectory() ?? false
  }

  async isWritableDir(dirPath: FilePath): Promise<boolean> {
    if (!(await this.dirExists(dirPath))) return false
    return this.canAccess(dirPath, constants.W_OK)
  }

  async createDir(dirPath: FilePath): Promise<boolean> {
    await fs.mkdir(dirPath, { recursive: true })
    return true
  }

  async fileExists(filePath: FilePath): Promise<boolean> {
    const stat = await this.statOrNull(filePath)
    return stat?.isFile() ?? false
  }

  async isReadableFile(filePath: FilePath): Promise<boolean> {
    if (!(await this.fileExists(filePath))) return false
    return this.canAccess(filePath, constants.R_OK)
  }

  async createFile(filePath: FilePath): Promise<boolean> {
    // "a" creates the file when missing and leaves existing content alone.
    const handle = await fs.open(filePath, "a")
    await handle.close()
    return true
  }

  async writeFile(filePath: FilePath, data: Uint8Array): Promise<boolean> {
    await fs.writeFile(filePath, data)
    return true
  }

  async readFile(filePath: FilePath): Promise<Uint8Array> {
    const buffer = await fs.readFile(filePath)
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength)
  }

  async deleteFile(filePath: FilePath): Promise<boolean> {
    await fs.unlink(filePath)
    return true
  }

  async removeDirRecursive(dirPath: FilePath): Promise<boolean> {
    await fs.rm(dirPath, { recursive: true, force: true })
    return true
  }

  async listFiles(dir: FilePath): Promise<FilePath[]> {
    try {
      return await this.walkDirectory(dir)
    } catch (err) {
      if (this.isNotFoundError(err)) return []
      throw err
    }
  }

  private async walkDirectory(dir: FilePath): Promise<FilePath[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    const files: FilePath[] = []

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name)

      if (entry.isDirectory()) {
        files.push(...(await this.walkDirectory(entryPath)))
      } else if (entry.isFile()) {
        files.push(entryPath)
      }
    }

    return files
  }

  private async statOrNull(target: FilePath) {
    try {
      return await fs.stat(target)
    } catch (err) {
      if (this.isNotFoundError(err)) return null
      throw err
    }
  }

  private async canAccess(target: FilePath, mode: number): Promise<boolean> {
    try {
      await fs.access(target, mode)
      return true
    } catch (err) {
      if (this.isAccessError(err)) return false
      throw err
    }
  }

  private errorCode(err: unknown): string | undefined {
    if (typeof err !== "object" || err === null || !("code" in err)) return undefined
    return typeof err.code === "string" ? err.code : undefined
  }

  private isNotFoundError(err: unknown): boolean {
    const code = this.errorCode(err)
    return code === "ENOENT" || code === "ENOTDIR"
  }

  private isAccessError(err: unknown): boolean {
    const code = this.errorCode(err)
    return code === "EACCES" || code === "EPERM" || code === "EROFS"
  }
}
