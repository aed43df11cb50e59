import type { ObjectId } from 'mongodb'
import type { Config } from '@/config'
import type { Accounts, Gallery, Storage } from '@/services'
import type { Logger } from '@/utils'

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
    database: Repository
    storage: Storage
    accounts: Accounts
    gallery: Gallery
    logger: Logger
  }

  interface FastifyContextConfig {
    auth?: boolean
  }

  interface FastifyRequest {
    user?: PublicUser
  }

  interface Session {
    userId?: string
    flashes?: Flash[]
  }
}

export type FlashCategory = 'success' | 'warning' | 'danger' | 'info'

export interface Flash {
  category: FlashCategory
  message: string
}

export interface User {
  readonly _id: ObjectId
  name: string
  email: string
  password: string
  readonly createdAt: number
}

export type PublicUser = Omit<User, 'password'>

export interface Album {
  readonly _id: ObjectId
  name: string
  userId: ObjectId
  qrPath: string | null
  readonly createdAt: number
}

export interface Photo {
  readonly _id: ObjectId
  albumId: ObjectId
  filename: string
  size: number
  readonly uploadedAt: number
}

export interface PhotoView {
  name: string
  url: string
  size: string
}

export type Identifier = ObjectId | string

export interface Repository {
  connect(): Promise<void>
  close(): Promise<void>

  getUserById(id: Identifier): Promise<User | null>
  getUserByEmail(email: string): Promise<User | null>
  insertUser(document: User): Promise<void>

  getAlbumById(id: Identifier): Promise<Album | null>
  getAlbumIds(): Promise<string[]>
  albumsForUser(userId: Identifier): Promise<Album[]>
  insertAlbum(document: Album): Promise<void>
  updateAlbum(id: Identifier, fields: Partial<Omit<Album, '_id' | 'createdAt'>>): Promise<void>
  deleteAlbum(id: Identifier): Promise<void>

  photosForAlbum(albumId: Identifier): Promise<Photo[]>
  insertPhoto(document: Photo): Promise<void>
  deletePhotosForAlbum(albumId: Identifier): Promise<void>
}
