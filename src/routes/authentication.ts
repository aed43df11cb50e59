import type { FastifyInstance, RegisterOptions } from 'fastify'

import { Route } from '@/structures'
import { flash, isRecoverable, render } from '@/utils'

interface IRegisterBody {
  name?: string
  email?: string
  password?: string
}

interface ILoginBody {
  email?: string
  password?: string
}

const formSchema = (fields: string[]) => ({
  type: 'object',
  properties: Object.fromEntries(fields.map((field) => [field, { type: 'string', maxLength: 256 }]))
})

export default class Authentication extends Route {
  constructor() {
    super({
      position: 1,
      path: ''
    })
  }

  routes(app: FastifyInstance, _options: RegisterOptions, done: (err?: Error) => void) {
    app.get('/register', (req, reply) => {
      return render(req, reply, 'register')
    })

    app.post<{
      Body: IRegisterBody
    }>('/register', {
      schema: {
        body: formSchema(['name', 'email', 'password'])
      }
    }, async (req, reply) => {
      try {
        await app.accounts.register(req.body ?? {})
      } catch (error) {
        if (!isRecoverable(error)) throw error

        flash(req, error.category, error.message)
        return reply.redirect('/register')
      }

      flash(req, 'success', 'Registration successful. Please login.')
      return reply.redirect('/login')
    })

    app.get('/login', (req, reply) => {
      return render(req, reply, 'login')
    })

    app.post<{
      Body: ILoginBody
    }>('/login', {
      schema: {
        body: formSchema(['email', 'password'])
      }
    }, async (req, reply) => {
      let userId: string
      try {
        const user = await app.accounts.login(req.body?.email, req.body?.password)
        userId = user._id.toHexString()
      } catch (error) {
        if (!isRecoverable(error)) throw error

        flash(req, error.category, error.message)
        return reply.redirect('/login')
      }

      await req.session.regenerate()
      req.session.userId = userId

      flash(req, 'success', 'Logged in successfully')
      return reply.redirect('/dashboard')
    })

    app.get('/logout', async (req, reply) => {
      await req.session.regenerate()

      flash(req, 'info', 'Logged out')
      return reply.redirect('/')
    })

    done()
  }
}
