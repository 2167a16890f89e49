import type { FileSystemPort } from "../ports/file-system"
import { MemoryFileSystem, type MemoryFileSystemOptions } from "./memory-file-system"
import { NodeFileSystem } from "./node-file-system"

export function createNodeFileSystem(): FileSystemPort {
  return new NodeFileSystem()
}

export type CreateMemoryFileSystemOptions = MemoryFileSystemOptions

export function createMemoryFileSystem(
  options: CreateMemoryFileSystemOptions = {},
): FileSystemPort {
  return new MemoryFileSystem(options)
}
