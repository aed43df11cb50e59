import type { FastifyInstance, FastifyRequest, RegisterOptions } from 'fastify'
import type { UploadedFile } from '@/services'

import { Route } from '@/structures'
import { AuthorizationError, flash, render } from '@/utils'

interface IParams {
  id: string
}

interface IBody {
  album_name?: string
}

const paramsSchema = {
  type: 'object',
  properties: {
    id: { type: 'string', maxLength: 100 }
  },
  required: ['id']
}

/**
 * Reads the album name and the files of the `photos` field. A form posted without files
 * may arrive url-encoded.
 */
const readAlbumForm = async (req: FastifyRequest<{ Body: IBody }>) => {
  if (!req.isMultipart()) {
    return { name: req.body?.album_name ?? null, files: [] }
  }

  let name: string | null = null
  const files: UploadedFile[] = []

  for await (const part of req.parts()) {
    if (part.type === 'file') {
      const data = await part.toBuffer()
      if (part.fieldname === 'photos') files.push({ filename: part.filename, data })
    } else if (part.fieldname === 'album_name' && typeof part.value === 'string') {
      name = part.value
    }
  }

  return { name, files }
}

export default class Albums extends Route {
  constructor() {
    super({
      position: 2,
      path: '/album',
      middlewares: ['auth']
    })
  }

  routes(app: FastifyInstance, _options: RegisterOptions, done: (err?: Error) => void) {
    app.get('/create', (req, reply) => {
      return render(req, reply, 'create_album')
    })

    app.post<{
      Body: IBody
    }>('/create', async (req, reply) => {
      if (!req.user) return reply.redirect('/login')

      const { name, files } = await readAlbumForm(req)

      const { skipped } = await app.gallery.create({
        userId: req.user._id,
        name,
        files,
        baseUrl: app.config.publicUrl ?? `${req.protocol}://${req.hostname}`
      })

      flash(req, 'success', 'Album created successfully')

      if (skipped.length > 0) {
        flash(req, 'warning', `Skipped ${skipped.length} file(s) with an unsupported type: ${skipped.join(', ')}`)
      }

      return reply.redirect('/dashboard')
    })

    app.get<{
      Params: IParams
    }>('/view/:id', {
      config: {
        auth: false
      },
      schema: {
        params: paramsSchema
      }
    }, async (req, reply) => {
      const { album, photos, qrUrl } = await app.gallery.view(req.params.id)
      const id = album._id.toHexString()

      return render(req, reply, 'view_album', {
        album: { id, name: album.name },
        photos,
        qrUrl,
        downloadUrl: qrUrl ? `/qr/download/${id}` : null
      })
    })

    app.post<{
      Params: IParams
    }>('/delete/:id', {
      schema: {
        params: paramsSchema
      }
    }, async (req, reply) => {
      if (!req.user) return reply.redirect('/login')

      try {
        const { failures } = await app.gallery.remove(req.params.id, req.user._id)

        flash(req, 'info', 'Album deleted')

        if (failures.length > 0) {
          flash(req, 'warning', `Some files of the album could not be removed (${failures.map((failure) => failure.kind).join(', ')}).`)
        }
      } catch (error) {
        if (!(error instanceof AuthorizationError)) throw error

        flash(req, error.category, error.message)
      }

      return reply.redirect('/dashboard')
    })

    done()
  }
}
