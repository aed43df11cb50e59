import type { Server } from '@/structures'
import { Task } from '@/structures'

export interface JanitorReport {
  directories: string[]
  qrCodes: string[]
}

/**
 * Removes upload directories and QR codes left behind by albums that no
 * longer exist, e.g. after a deletion whose file cleanup failed.
 */
export default class StorageJanitor extends Task {
  constructor(server: Server) {
    super(server, {
      name: 'Storage Janitor',
      interval: server.config.janitorInterval
    })
  }

  async execute(): Promise<JanitorReport> {
    const { database, storage, logger } = this.server
    // Rows are inserted before their files are written, so ids read after
    // listing cover every album whose files were listed.
    const directories = await storage.listAlbumDirectories()
    const qrCodes = await storage.listQRCodes()
    const albumIds = new Set(await database.getAlbumIds())
    const report: JanitorReport = { directories: [], qrCodes: [] }

    for (const albumId of directories) {
      if (albumIds.has(albumId)) continue

      const failures = await storage.removeAlbumDirectory(albumId)
      if (failures.length === 0) report.directories.push(albumId)
      else failures.forEach((failure) => logger.warn(`[Task] ${this.name}: ${failure.message}`))
    }

    for (const qrCode of qrCodes) {
      if (albumIds.has(qrCode.albumId)) continue

      const failures = await storage.removeQRCode(qrCode.path)
      if (failures.length === 0) report.qrCodes.push(qrCode.path)
      else failures.forEach((failure) => logger.warn(`[Task] ${this.name}: ${failure.message}`))
    }

    logger.log(`[Task] ${this.name} removed ${report.directories.length} directories and ${report.qrCodes.length} QR codes.`)

    return report
  }
}
