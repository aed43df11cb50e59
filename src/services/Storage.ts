import { mkdir, readdir, rm, rmdir, unlink, writeFile } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { StorageError } from '@/utils'

const QR_FILE = /^qr_album_([a-f\d]{24})\.png$/i

/**
 * On-disk layout under the storage root:
 *
 *   uploads/{albumId}/{filename}
 *   qr/qr_album_{albumId}.png
 */
export class Storage {
  readonly uploads: string
  readonly qr: string

  constructor(readonly root: string) {
    this.uploads = join(root, 'uploads')
    this.qr = join(root, 'qr')
  }

  async initialize(): Promise<void> {
    await mkdir(this.uploads, { recursive: true })
    await mkdir(this.qr, { recursive: true })
  }

  albumDirectory(albumId: string): string {
    return join(this.uploads, albumId)
  }

  async createAlbumDirectory(albumId: string): Promise<string> {
    const directory = this.albumDirectory(albumId)
    await mkdir(directory, { recursive: true })

    return directory
  }

  async savePhoto(albumId: string, filename: string, data: Buffer): Promise<void> {
    await writeFile(join(this.albumDirectory(albumId), filename), data)
  }

  /**
   * @returns The QR code's path relative to the storage root.
   */
  async saveQRCode(albumId: string, png: Buffer): Promise<string> {
    const filename = `qr_album_${albumId}.png`
    await writeFile(join(this.qr, filename), png)

    return `qr/${filename}`
  }

  /**
   * Deletes every file of an album's upload directory, then the directory.
   * Keeps going after a failure and returns what could not be removed; a
   * missing directory or file is not a failure.
   */
  async removeAlbumDirectory(albumId: string): Promise<StorageError[]> {
    const directory = this.albumDirectory(albumId)
    const failures: StorageError[] = []

    let entries: string[]
    try {
      entries = await readdir(directory)
    } catch (error) {
      const failure = StorageError.from(error, directory)

      return failure.kind === 'not-found' ? [] : [failure]
    }

    for (const entry of entries) {
      const path = join(directory, entry)

      try {
        await rm(path, { recursive: true })
      } catch (error) {
        failures.push(StorageError.from(error, path))
      }
    }

    try {
      await rmdir(directory)
    } catch (error) {
      failures.push(StorageError.from(error, directory))
    }

    return failures.filter((failure) => failure.kind !== 'not-found')
  }

  async removeQRCode(qrPath: string): Promise<StorageError[]> {
    const path = join(this.qr, basename(qrPath))

    try {
      await unlink(path)
    } catch (error) {
      const failure = StorageError.from(error, path)
      if (failure.kind !== 'not-found') return [failure]
    }

    return []
  }

  async listAlbumDirectories(): Promise<string[]> {
    const entries = await readdir(this.uploads, { withFileTypes: true })

    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
  }

  /**
   * @returns The QR code files on disk, keyed by the album they were generated for.
   */
  async listQRCodes(): Promise<Array<{ albumId: string; path: string }>> {
    const entries = await readdir(this.qr)
    const codes: Array<{ albumId: string; path: string }> = []

    for (const entry of entries) {
      const match = QR_FILE.exec(entry)
      if (match) codes.push({ albumId: match[1], path: `qr/${entry}` })
    }

    return codes
  }
}
