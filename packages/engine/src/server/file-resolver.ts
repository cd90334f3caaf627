import * as path from 'node:path'
import { ConfigError } from '../config/server-config.js'
import type { IFileStat, IFileSystem } from '../interfaces/filesystem.js'
import { errorCode } from '../interfaces/filesystem.js'
import { getMimeType } from './mime-types.js'

export type FileResolveErrorCode = 'NOT_FOUND' | 'FORBIDDEN'

/** Messages are safe to log but never name a filesystem path. */
export class FileResolveError extends Error {
  constructor(
    readonly code: FileResolveErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'FileResolveError'
  }
}

export interface ResolvedFile {
  absolutePath: string
  content: Uint8Array
  mime: string
}

export interface FileResolverOptions {
  root: string
  fs: IFileSystem
  /** Served in place of a directory. Directories are 404 when null. */
  indexFile?: string | null
}

interface LocatedPath {
  /** Root-joined path as requested, used for the extension. */
  requested: string
  /** Canonical path with symlinks resolved. */
  canonical: string
  stat: IFileStat
}

/**
 * Maps normalized request paths to files under the document root.
 *
 * Containment is checked twice: once on the joined path, and again on
 * the canonical path so a symlink cannot lead out of the root.
 */
export class FileResolver {
  private root: string
  private fs: IFileSystem
  private indexFile: string | null
  private canonicalRoot: string | null = null

  constructor(options: FileResolverOptions) {
    this.root = path.resolve(options.root)
    this.fs = options.fs
    this.indexFile = options.indexFile ?? null
  }

  /** Fails with a ConfigError unless the root is an existing directory. */
  async verifyRoot(): Promise<void> {
    let stat: IFileStat
    try {
      stat = await this.fs.stat(this.root)
    } catch (err) {
      throw new ConfigError(`Document root ${this.root} is not accessible (${errorCode(err) ?? 'unknown error'})`)
    }
    if (!stat.isDirectory) {
      throw new ConfigError(`Document root ${this.root} is not a directory`)
    }
  }

  async resolve(requestPath: string): Promise<ResolvedFile> {
    const root = await this.canonicalRootPath()
    let located = await this.locate(root, path.join(root, requestPath))

    if (located.stat.isDirectory) {
      if (this.indexFile === null) {
        throw new FileResolveError('NOT_FOUND', 'Directory requested and no index file is configured')
      }
      located = await this.locate(root, path.join(located.requested, this.indexFile))
    }

    if (!located.stat.isFile) {
      throw new FileResolveError('NOT_FOUND', 'Not a regular file')
    }

    let content: Uint8Array
    try {
      content = await this.fs.readFile(located.canonical)
    } catch (err) {
      throw translateError(err)
    }

    return {
      absolutePath: located.canonical,
      content,
      mime: getMimeType(located.requested),
    }
  }

  private async locate(root: string, requested: string): Promise<LocatedPath> {
    if (!isWithin(root, requested)) {
      throw new FileResolveError('FORBIDDEN', 'Path is outside the document root')
    }

    try {
      const canonical = await this.fs.realpath(requested)
      if (!isWithin(root, canonical)) {
        throw new FileResolveError('FORBIDDEN', 'Path resolves outside the document root')
      }
      const stat = await this.fs.stat(canonical)
      return { requested, canonical, stat }
    } catch (err) {
      throw translateError(err)
    }
  }

  private async canonicalRootPath(): Promise<string> {
    if (this.canonicalRoot === null) {
      this.canonicalRoot = await this.fs.realpath(this.root)
    }
    return this.canonicalRoot
  }
}

function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate)
  if (relative === '') return true
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative)
}

function translateError(err: unknown): unknown {
  if (err instanceof FileResolveError) return err

  switch (errorCode(err)) {
    case 'ENOENT':
    case 'ENOTDIR':
    case 'EISDIR':
    case 'ELOOP':
      return new FileResolveError('NOT_FOUND', 'File not found')
    case 'EACCES':
    case 'EPERM':
      return new FileResolveError('FORBIDDEN', 'Permission denied')
    default:
      return err
  }
}
