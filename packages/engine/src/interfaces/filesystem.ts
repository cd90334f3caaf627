/**
 * Abstract File System Interface
 *
 * The read-only subset of file operations the resolver needs. Failures
 * are reported as errors carrying a Node-style `code` (ENOENT, EACCES, ...)
 * whatever the backing store.
 */

export interface IFileStat {
  size: number
  isDirectory: boolean
  isFile: boolean
}

export interface IFileSystem {
  /** Get file statistics, following symlinks. */
  stat(path: string): Promise<IFileStat>

  /** Canonical absolute path with every symlink resolved. */
  realpath(path: string): Promise<string>

  /** Read the whole file. */
  readFile(path: string): Promise<Uint8Array>
}

export type FileSystemErrorCode =
  | 'ENOENT'
  | 'ENOTDIR'
  | 'EISDIR'
  | 'EACCES'
  | 'EPERM'
  | 'ELOOP'
  | 'EIO'

export class FileSystemError extends Error {
  constructor(
    readonly code: FileSystemErrorCode,
    message: string,
  ) {
    super(`${code}: ${message}`)
    this.name = 'FileSystemError'
  }
}

/** The `code` of a filesystem error, if it has one. */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err) {
    const { code } = err
    return typeof code === 'string' ? code : undefined
  }
  return undefined
}
