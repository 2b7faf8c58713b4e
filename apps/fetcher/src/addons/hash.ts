import { MalformedHashError } from '../errors.js'

/** Raw digest length in bytes for each algorithm the search API is known to report. */
const DIGEST_LENGTHS = {
  sha256: 32,
} as const

export type DigestAlgorithm = keyof typeof DIGEST_LENGTHS

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return Object.prototype.hasOwnProperty.call(DIGEST_LENGTHS, value)
}

function checkLength(input: string, algorithm: DigestAlgorithm, bytes: Buffer): void {
  const expected = DIGEST_LENGTHS[algorithm]
  if (bytes.length !== expected) {
    throw new MalformedHashError(input, `expected ${expected} bytes for ${algorithm}, got ${bytes.length}`)
  }
}

/**
 * Re-encode an API digest (`sha256:<hex>`) as an SRI integrity string (`sha256-<base64>`).
 */
export function toIntegrity(digest: string): string {
  const separator = digest.indexOf(':')
  if (separator === -1) {
    throw new MalformedHashError(digest, "missing ':' separator")
  }

  const algorithm = digest.slice(0, separator)
  const hex = digest.slice(separator + 1)

  if (!isDigestAlgorithm(algorithm)) {
    throw new MalformedHashError(digest, `unsupported algorithm '${algorithm}'`)
  }
  if (!HEX_PATTERN.test(hex)) {
    throw new MalformedHashError(digest, 'digest is not an even-length hex string')
  }

  const bytes = Buffer.from(hex, 'hex')
  checkLength(digest, algorithm, bytes)

  return `${algorithm}-${bytes.toString('base64')}`
}

/** Decode an SRI integrity string back to its algorithm and raw digest bytes. */
export function fromIntegrity(integrity: string): { algorithm: DigestAlgorithm; bytes: Buffer } {
  const separator = integrity.indexOf('-')
  if (separator === -1) {
    throw new MalformedHashError(integrity, "missing '-' separator")
  }

  const algorithm = integrity.slice(0, separator)
  const encoded = integrity.slice(separator + 1)

  if (!isDigestAlgorithm(algorithm)) {
    throw new MalformedHashError(integrity, `unsupported algorithm '${algorithm}'`)
  }
  if (!BASE64_PATTERN.test(encoded)) {
    throw new MalformedHashError(integrity, 'digest is not base64')
  }

  const bytes = Buffer.from(encoded, 'base64')
  checkLength(integrity, algorithm, bytes)

  return { algorithm, bytes }
}
