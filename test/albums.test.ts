import type { Album } from '@/types'
import type { TestContext } from './helpers/server'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { access, readdir } from 'node:fs/promises'
import { join } from 'node:path'
import { ObjectId } from 'mongodb'
import { StorageError } from '@/utils'
import { Agent, PUBLIC_URL, createTestServer, decodeQRCode, signUp } from './helpers/server'

const alert = (category: string, message: string) => `<div class="flash flash-${category}" role="alert">${message}</div>`

const exists = (path: string) => access(path).then(() => true, () => false)

describe('album routes', () => {
  let context: TestContext
  let ann: Agent

  const createAlbum = async (agent: Agent, name: string, files: Array<{ name: string; content: string; field?: string }>) => {
    const response = await agent.upload('/album/create', { album_name: name }, files)
    const album = context.database.albums[context.database.albums.length - 1]

    return { response, album, albumId: album._id.toHexString() }
  }

  beforeEach(async () => {
    context = await createTestServer()
    ann = await signUp(context.app, 'Ann', 'ann@x.com', 'pw123')
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await context.cleanup()
  })

  describe('creation', () => {
    it('keeps the allowed photo, generates the QR code and reports the skipped file', async () => {
      const { response, album, albumId } = await createAlbum(ann, 'Trip', [
        { name: 'a.png', content: 'a-png-bytes' },
        { name: 'b.exe', content: 'MZ' }
      ])

      expect(response.statusCode).toBe(302)
      expect(response.headers.location).toBe('/dashboard')

      expect(album.name).toBe('Trip')
      expect(album.userId.equals(context.database.users[0]._id)).toBe(true)
      expect(context.database.photos.map((photo) => photo.filename)).toEqual(['a.png'])
      expect(await readdir(join(context.storageDir, 'uploads', albumId))).toEqual(['a.png'])

      const qrFile = join(context.storageDir, 'qr', `qr_album_${albumId}.png`)
      expect(album.qrPath).toBe(`qr/qr_album_${albumId}.png`)
      expect(await decodeQRCode(qrFile)).toBe(`${PUBLIC_URL}/album/view/${albumId}`)

      const dashboard = await ann.get('/dashboard')
      expect(dashboard.body).toContain(alert('success', 'Album created successfully'))
      expect(dashboard.body).toContain(alert('warning', 'Skipped 1 file(s) with an unsupported type: b.exe'))
      expect(dashboard.body).toContain(`<a href="/album/view/${albumId}">Trip</a>`)
      expect(dashboard.body).toContain(`<a href="/qr/download/${albumId}">Download QR code</a>`)
    })

    it('stores exactly the files with an allowed extension', async () => {
      const { albumId } = await createAlbum(ann, 'Mixed', [
        { name: 'x.png', content: '1' },
        { name: 'y.GIF', content: '2' },
        { name: 'z.jpeg', content: '3' },
        { name: 'w.txt', content: '4' },
        { name: 'v', content: '5' }
      ])

      expect(context.database.photos).toHaveLength(3)
      expect((await readdir(join(context.storageDir, 'uploads', albumId))).sort()).toEqual(['x.png', 'y.GIF', 'z.jpeg'])
    })

    it('only stores the files of the photos field', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [
        { name: 'a.png', content: 'a' },
        { name: 'b.png', content: 'b', field: 'attachment' }
      ])

      expect(context.database.photos.map((photo) => photo.filename)).toEqual(['a.png'])
      expect(await readdir(join(context.storageDir, 'uploads', albumId))).toEqual(['a.png'])
    })

    it('names an album without a name after the upload time', async () => {
      const { album } = await createAlbum(ann, '', [])

      expect(album.name).toMatch(/^Album-\d{14}$/)
    })

    it('accepts a form without files', async () => {
      const response = await ann.post('/album/create', { album_name: 'Empty' })

      expect(response.headers.location).toBe('/dashboard')
      expect(context.database.albums.map((album) => album.name)).toEqual(['Empty'])
      expect(context.database.photos).toEqual([])
    })

    it('requires a session', async () => {
      const visitor = new Agent(context.app)

      expect((await visitor.get('/album/create')).headers.location).toBe('/login')

      const response = await visitor.upload('/album/create', { album_name: 'Sneaky' }, [{ name: 'a.png', content: 'a' }])
      expect(response.statusCode).toBe(302)
      expect(response.headers.location).toBe('/login')
      expect(context.database.albums).toEqual([])
    })

    it('renders the creation form', async () => {
      const response = await ann.get('/album/create')

      expect(response.statusCode).toBe(200)
      expect(response.body).toContain('<form method="post" action="/album/create" enctype="multipart/form-data">')
    })
  })

  describe('viewing', () => {
    it('is public', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [{ name: 'a.png', content: 'a-png-bytes' }])
      const visitor = new Agent(context.app)

      const response = await visitor.get(`/album/view/${albumId}`)

      expect(response.statusCode).toBe(200)
      expect(response.body).toContain('<h1>Trip</h1>')
      expect(response.body).toContain(`<img src="/static/uploads/${albumId}/a.png" alt="a.png">`)
      expect(response.body).toContain('<figcaption>a.png (11 B)</figcaption>')
      expect(response.body).toContain(`src="/static/qr/qr_album_${albumId}.png"`)
    })

    it('serves the uploaded photos', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [{ name: 'a.png', content: 'a-png-bytes' }])

      const response = await new Agent(context.app).get(`/static/uploads/${albumId}/a.png`)

      expect(response.statusCode).toBe(200)
      expect(response.body).toBe('a-png-bytes')
    })

    it('answers 404 for unknown albums', async () => {
      const unknown = await new Agent(context.app).get(`/album/view/${new ObjectId().toHexString()}`)
      expect(unknown.statusCode).toBe(404)
      expect(unknown.body).toContain('<p>Album not found</p>')

      const malformed = await new Agent(context.app).get('/album/view/not-an-id')
      expect(malformed.statusCode).toBe(404)
    })
  })

  describe('QR code download', () => {
    it('sends the QR code as an attachment', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [])

      const response = await new Agent(context.app).get(`/qr/download/${albumId}`)

      expect(response.statusCode).toBe(200)
      expect(response.headers['content-type']).toBe('image/png')
      expect(response.headers['content-disposition']).toBe(`attachment; filename="qr_album_${albumId}.png"`)
    })

    it('redirects with a warning when no QR code was generated', async () => {
      const album: Album = {
        _id: new ObjectId(),
        name: 'Draft',
        userId: context.database.users[0]._id,
        qrPath: null,
        createdAt: Date.now()
      }
      await context.database.insertAlbum(album)

      const response = await ann.get(`/qr/download/${album._id.toHexString()}`)

      expect(response.headers.location).toBe('/dashboard')
      expect((await ann.get('/dashboard')).body).toContain(alert('warning', 'QR not found'))
    })

    it('answers 404 for unknown albums', async () => {
      const response = await ann.get(`/qr/download/${new ObjectId().toHexString()}`)

      expect(response.statusCode).toBe(404)
    })
  })

  describe('deletion', () => {
    it('removes the rows, the photos and the QR code', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [
        { name: 'a.png', content: 'a-png-bytes' },
        { name: 'b.exe', content: 'MZ' }
      ])

      const response = await ann.post(`/album/delete/${albumId}`)

      expect(response.statusCode).toBe(302)
      expect(response.headers.location).toBe('/dashboard')
      expect(context.database.albums).toEqual([])
      expect(context.database.photos).toEqual([])
      expect(await exists(join(context.storageDir, 'uploads', albumId))).toBe(false)
      expect(await exists(join(context.storageDir, 'qr', `qr_album_${albumId}.png`))).toBe(false)

      expect((await ann.get('/dashboard')).body).toContain(alert('info', 'Album deleted'))
      expect((await ann.get(`/album/view/${albumId}`)).statusCode).toBe(404)
    })

    it('warns when some files could not be removed', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [{ name: 'a.png', content: 'a-png-bytes' }])
      vi.spyOn(context.server.storage, 'removeAlbumDirectory').mockResolvedValue([
        new StorageError('permission', join(context.storageDir, 'uploads', albumId), new Error('denied'))
      ])

      const response = await ann.post(`/album/delete/${albumId}`)

      expect(response.headers.location).toBe('/dashboard')
      expect(context.database.albums).toEqual([])
      expect(context.database.photos).toEqual([])

      const dashboard = await ann.get('/dashboard')
      expect(dashboard.body).toContain(alert('info', 'Album deleted'))
      expect(dashboard.body).toContain(alert('warning', 'Some files of the album could not be removed (permission).'))
    })

    it('is refused to anyone but the owner', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [{ name: 'a.png', content: 'a-png-bytes' }])
      const bob = await signUp(context.app, 'Bob', 'bob@x.com', 'pw456')

      const response = await bob.post(`/album/delete/${albumId}`)

      expect(response.headers.location).toBe('/dashboard')
      expect((await bob.get('/dashboard')).body).toContain(alert('danger', 'Not authorized'))
      expect(context.database.albums).toHaveLength(1)
      expect(context.database.photos).toHaveLength(1)
      expect(await exists(join(context.storageDir, 'uploads', albumId, 'a.png'))).toBe(true)
    })

    it('requires a session', async () => {
      const { albumId } = await createAlbum(ann, 'Trip', [])

      const response = await new Agent(context.app).post(`/album/delete/${albumId}`)

      expect(response.headers.location).toBe('/login')
      expect(context.database.albums).toHaveLength(1)
    })

    it('answers 404 for unknown albums', async () => {
      const response = await ann.post(`/album/delete/${new ObjectId().toHexString()}`)

      expect(response.statusCode).toBe(404)
    })
  })

  it('lists only the user\'s own albums on the dashboard', async () => {
    await createAlbum(ann, 'Trip', [])
    const bob = await signUp(context.app, 'Bob', 'bob@x.com', 'pw456')
    await createAlbum(bob, 'Bobs', [])

    const dashboard = await ann.get('/dashboard')

    expect(dashboard.body).toContain('>Trip</a>')
    expect(dashboard.body).not.toContain('>Bobs</a>')
  })
})

describe('server', () => {
  let context: TestContext

  beforeEach(async () => {
    context = await createTestServer()
  })

  afterEach(async () => {
    await context.cleanup()
  })

  it('reports its health', async () => {
    const response = await context.app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    expect(response.headers['cache-control']).toBe('private, max-age=0, no-cache, no-store, must-revalidate')
    expect(response.json()).toMatchObject({ status: 'OK' })
  })

  it('renders a 404 page for unknown paths', async () => {
    const response = await context.app.inject({ method: 'GET', url: '/nowhere' })

    expect(response.statusCode).toBe(404)
    expect(response.body).toContain('<p>Page not found</p>')
  })

  it('loads the storage janitor without starting it', () => {
    expect(context.server.tasks.map((task) => task.name)).toEqual(['Storage Janitor'])
    expect(context.server.tasks[0].job.running).toBe(false)
  })
})
