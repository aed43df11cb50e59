import type { Identifier, PublicUser, Repository, User } from '@/types'

import bcrypt from 'bcrypt'
import { ObjectId } from 'mongodb'
import { AuthError, ConflictError, ValidationError } from '@/utils'

const SALT_ROUNDS = 10

export interface RegistrationForm {
  name?: string
  email?: string
  password?: string
}

const toPublicUser = ({ password: _password, ...user }: User): PublicUser => user

const normalizeEmail = (email: string | undefined) => (email ?? '').trim().toLowerCase()

export class Accounts {
  constructor(private readonly database: Repository) {}

  async register(form: RegistrationForm): Promise<PublicUser> {
    const name = (form.name ?? '').trim()
    const email = normalizeEmail(form.email)
    const password = form.password ?? ''

    if (!name || !email || !password) throw new ValidationError()

    const existing = await this.database.getUserByEmail(email)
    if (existing) throw new ConflictError()

    const user: User = {
      _id: new ObjectId(),
      name,
      email,
      password: await bcrypt.hash(password, SALT_ROUNDS),
      createdAt: Date.now()
    }

    await this.database.insertUser(user)

    return toPublicUser(user)
  }

  async login(email: string | undefined, password: string | undefined): Promise<PublicUser> {
    const user = await this.database.getUserByEmail(normalizeEmail(email))
    if (!user) throw new AuthError()

    const passwordVerification = await bcrypt.compare(password ?? '', user.password)
    if (!passwordVerification) throw new AuthError()

    return toPublicUser(user)
  }

  async getUser(id: Identifier): Promise<PublicUser | null> {
    const user = await this.database.getUserById(id)

    return user ? toPublicUser(user) : null
  }
}
