export {
  type CreateMemoryFileSystemOptions,
  createMemoryFileSystem,
  createNodeFileSystem,
} from "./adapters/create"
export {
  MemoryFileSystem,
  MemoryFileSystemError,
  type MemoryFileSystemOptions,
} from "./adapters/memory-file-system"
export { NodeFileSystem } from "./adapters/node-file-system"
export type { FilePath } from "./ports/file-path"
export type { FileSystemPort } from "./ports/file-system"
