export const FALLBACK_MIME_TYPE = 'application/octet-stream'

const MIME_TYPES: Record<string, string> = {
  // Text
  html: 'text/html',
  htm: 'text/html',
  css: 'text/css',
  js: 'application/javascript',
  mjs: 'application/javascript',
  json: 'application/json',
  xml: 'application/xml',
  txt: 'text/plain',
  csv: 'text/csv',
  md: 'text/markdown',

  // Images
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  ico: 'image/x-icon',
  webp: 'image/webp',

  // Fonts
  woff: 'font/woff',
  woff2: 'font/woff2',
  ttf: 'font/ttf',

  // Media
  mp3: 'audio/mpeg',
  mp4: 'video/mp4',
  webm: 'video/webm',

  // Documents and binaries
  pdf: 'application/pdf',
  wasm: 'application/wasm',
  zip: 'application/zip',
}

/** MIME type for an extension given without its leading dot. */
export function resolveMimeType(extension: string): string {
  const key = extension.toLowerCase()
  return Object.hasOwn(MIME_TYPES, key) ? MIME_TYPES[key] : FALLBACK_MIME_TYPE
}

export function extensionOf(filePath: string): string {
  const name = filePath.substring(filePath.lastIndexOf('/') + 1)
  const dot = name.lastIndexOf('.')
  // `.profile` is a name, not an extension
  return dot <= 0 ? '' : name.substring(dot + 1)
}

export function getMimeType(filePath: string): string {
  return resolveMimeType(extensionOf(filePath))
}
