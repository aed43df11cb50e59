import type { Album, Identifier, Photo, Repository, User } from '@/types'
import type { Collection, Db } from 'mongodb'

import { EventEmitter } from 'node:events'
import { MongoClient, MongoServerError } from 'mongodb'
import { ConflictError, toObjectId } from '@/utils'

const DUPLICATE_KEY = 11000

export interface DatabaseOptions {
  uri: string
  database: string
}

export class Database extends EventEmitter implements Repository {
  private client: MongoClient
  private mongo: Db | null

  constructor(private readonly options: DatabaseOptions) {
    super()

    this.client = new MongoClient(options.uri, { minPoolSize: 4 })
    this.mongo = null
  }

  async connect() {
    try {
      await this.client.connect()
      this.mongo = this.client.db(this.options.database)

      await this.users.createIndex({ email: 1 }, { unique: true })
      await this.albums.createIndex({ userId: 1, createdAt: -1 })
      await this.photos.createIndex({ albumId: 1, uploadedAt: 1 })

      this.emit('ready')
    } catch (error) {
      this.emit('error', error)
      throw error
    }
  }

  async close(force = false) {
    await this.client.close(force)
    this.mongo = null
  }

  private get db(): Db {
    if (!this.mongo) throw new Error('The database is not connected.')

    return this.mongo
  }

  private get users(): Collection<User> {
    return this.db.collection<User>('users')
  }

  private get albums(): Collection<Album> {
    return this.db.collection<Album>('albums')
  }

  private get photos(): Collection<Photo> {
    return this.db.collection<Photo>('photos')
  }

  async getUserById(id: Identifier) {
    const _id = toObjectId(id)
    if (!_id) return null

    return this.users.findOne({ _id })
  }

  getUserByEmail(email: string) {
    return this.users.findOne({ email })
  }

  async insertUser(document: User) {
    try {
      await this.users.insertOne(document)
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) throw new ConflictError()

      throw error
    }
  }

  async getAlbumById(id: Identifier) {
    const _id = toObjectId(id)
    if (!_id) return null

    return this.albums.findOne({ _id })
  }

  async getAlbumIds() {
    const albums = await this.albums
      .find({}, { projection: { _id: 1 } })
      .toArray()

    return albums.map((album) => album._id.toHexString())
  }

  async albumsForUser(userId: Identifier) {
    const _id = toObjectId(userId)
    if (!_id) return []

    return this.albums
      .find({ userId: _id })
      .sort({ createdAt: -1, _id: -1 })
      .toArray()
  }

  async insertAlbum(document: Album) {
    await this.albums.insertOne(document)
  }

  async updateAlbum(id: Identifier, fields: Partial<Omit<Album, '_id' | 'createdAt'>>) {
    const _id = toObjectId(id)
    if (!_id) return

    await this.albums.updateOne({ _id }, { $set: fields })
  }

  async deleteAlbum(id: Identifier) {
    const _id = toObjectId(id)
    if (!_id) return

    await this.albums.deleteOne({ _id })
  }

  async photosForAlbum(albumId: Identifier) {
    const _id = toObjectId(albumId)
    if (!_id) return []

    return this.photos
      .find({ albumId: _id })
      .sort({ uploadedAt: 1, _id: 1 })
      .toArray()
  }

  async insertPhoto(document: Photo) {
    await this.photos.insertOne(document)
  }

  async deletePhotosForAlbum(albumId: Identifier) {
    const _id = toObjectId(albumId)
    if (!_id) return

    await this.photos.deleteMany({ albumId: _id })
  }
}
