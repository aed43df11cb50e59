import type { Album, Identifier, Photo, PhotoView, Repository } from '@/types'
import type { Logger, StorageError } from '@/utils'
import type { Storage } from './Storage'

import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc.js'
import { filesize } from 'filesize'
import { ObjectId } from 'mongodb'
import { AuthorizationError, NotFoundError, allowedFile, generateQRCode, secureFilename, uniqueFilename } from '@/utils'

dayjs.extend(utc)

export interface UploadedFile {
  filename: string
  data: Buffer
}

export interface CreateAlbumInput {
  userId: ObjectId
  name?: string | null
  files: UploadedFile[]
  /** External base URL the QR code points at, without a trailing slash. */
  baseUrl: string
}

export interface CreatedAlbum {
  album: Album
  photos: Photo[]
  skipped: string[]
}

export interface AlbumView {
  album: Album
  photos: PhotoView[]
  qrUrl: string | null
}

export interface RemovedAlbum {
  album: Album
  failures: StorageError[]
}

export const defaultAlbumName = (now: Date = new Date()) => `Album-${dayjs.utc(now).format('YYYYMMDDHHmmss')}`

export const albumViewUrl = (baseUrl: string, albumId: string) => `${baseUrl}/album/view/${albumId}`

export class Gallery {
  constructor(
    private readonly database: Repository,
    private readonly storage: Storage,
    private readonly logger: Logger
  ) {}

  async findAlbum(id: Identifier): Promise<Album> {
    const album = await this.database.getAlbumById(id)
    if (!album) throw new NotFoundError('album')

    return album
  }

  listForUser(userId: Identifier): Promise<Album[]> {
    return this.database.albumsForUser(userId)
  }

  /**
   * Inserts the album, stores the photos with an allowed extension and
   * generates the album's QR code. Uploads whose sanitized names collide get
   * a numeric suffix. Nothing is rolled back if a step fails.
   */
  async create(input: CreateAlbumInput): Promise<CreatedAlbum> {
    const album: Album = {
      _id: new ObjectId(),
      name: input.name?.trim() || defaultAlbumName(),
      userId: input.userId,
      qrPath: null,
      createdAt: Date.now()
    }

    await this.database.insertAlbum(album)

    const albumId = album._id.toHexString()
    await this.storage.createAlbumDirectory(albumId)

    const photos: Photo[] = []
    const skipped: string[] = []
    const saved = new Set<string>()

    for (const file of input.files) {
      if (!file.filename) continue

      if (!allowedFile(file.filename)) {
        skipped.push(file.filename)
        continue
      }

      const filename = uniqueFilename(secureFilename(file.filename), saved)

      await this.storage.savePhoto(albumId, filename, file.data)
      saved.add(filename)

      const photo: Photo = {
        _id: new ObjectId(),
        albumId: album._id,
        filename,
        size: file.data.byteLength,
        uploadedAt: Date.now()
      }

      await this.database.insertPhoto(photo)
      photos.push(photo)
    }

    const qrPath = await this.storage.saveQRCode(albumId, await generateQRCode(albumViewUrl(input.baseUrl, albumId)))
    await this.database.updateAlbum(album._id, { qrPath })
    album.qrPath = qrPath

    this.logger.debug(`Album ${albumId} created with ${photos.length} photo(s), ${skipped.length} skipped`)

    return { album, photos, skipped }
  }

  async view(id: Identifier): Promise<AlbumView> {
    const album = await this.findAlbum(id)
    const albumId = album._id.toHexString()
    const photos = await this.database.photosForAlbum(album._id)

    return {
      album,
      photos: photos.map((photo) => ({
        name: photo.filename,
        url: `/static/uploads/${albumId}/${encodeURIComponent(photo.filename)}`,
        size: filesize(photo.size)
      })),
      qrUrl: album.qrPath ? `/static/${album.qrPath}` : null
    }
  }

  /**
   * Removes an album owned by `userId`: its upload directory, its QR code,
   * its photo rows and finally the album row. File-system failures are
   * reported back instead of aborting the database cleanup.
   */
  async remove(id: Identifier, userId: ObjectId): Promise<RemovedAlbum> {
    const album = await this.findAlbum(id)
    if (!album.userId.equals(userId)) throw new AuthorizationError()

    const albumId = album._id.toHexString()
    const failures = await this.storage.removeAlbumDirectory(albumId)

    if (album.qrPath) {
      failures.push(...await this.storage.removeQRCode(album.qrPath))
    }

    for (const failure of failures) {
      this.logger.warn(failure.message)
    }

    await this.database.deletePhotosForAlbum(album._id)
    await this.database.deleteAlbum(album._id)

    return { album, failures }
  }

  /**
   * @returns The QR code's path relative to the storage root and the name it is downloaded under.
   */
  async qrCode(id: Identifier): Promise<{ path: string; filename: string }> {
    const album = await this.findAlbum(id)
    if (!album.qrPath) throw new NotFoundError('qr')

    return { path: album.qrPath, filename: `qr_album_${album._id.toHexString()}.png` }
  }
}
