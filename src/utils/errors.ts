import type { FlashCategory } from '@/types'

export type StorageErrorKind = 'not-found' | 'permission' | 'io'

export class AppError extends Error {
  readonly statusCode: number
  readonly category: FlashCategory
  readonly recoverable: boolean

  constructor(message: string, statusCode: number, category: FlashCategory = 'danger', recoverable = true) {
    super(message)
    this.name = new.target.name
    this.statusCode = statusCode
    this.category = category
    this.recoverable = recoverable
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Please fill all fields') {
    super(message, 400)
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Email already registered') {
    super(message, 409, 'warning')
  }
}

export class AuthError extends AppError {
  constructor(message = 'Invalid credentials') {
    super(message, 401)
  }
}

export class AuthorizationError extends AppError {
  constructor(message = 'Not authorized') {
    super(message, 403)
  }
}

export class NotFoundError extends AppError {
  readonly resource: 'album' | 'qr'

  constructor(resource: 'album' | 'qr', message = resource === 'album' ? 'Album not found' : 'QR not found') {
    super(message, 404, 'warning')
    this.resource = resource
  }
}

export class StorageError extends AppError {
  readonly kind: StorageErrorKind
  readonly path: string

  constructor(kind: StorageErrorKind, path: string, cause?: unknown) {
    super(`Unable to remove ${path} (${kind})`, 500, 'warning', false)
    this.kind = kind
    this.path = path
    this.cause = cause
  }

  /**
   * Maps a Node.js file-system error onto one of the storage error kinds.
   */
  static from(error: unknown, path: string): StorageError {
    const code = error instanceof Error && 'code' in error ? error.code : null

    switch (code) {
      case 'ENOENT':
        return new StorageError('not-found', path, error)
      case 'EACCES':
      case 'EPERM':
        return new StorageError('permission', path, error)
      default:
        return new StorageError('io', path, error)
    }
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`)
    this.name = 'ConfigError'
  }
}

export const isRecoverable = (error: unknown): error is AppError => error instanceof AppError && error.recoverable
