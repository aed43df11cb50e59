import type { Identifier } from '@/types'

import { ObjectId } from 'mongodb'

const HEX_ID = /^[a-f\d]{24}$/i

// Malformed identifiers resolve to null so lookups treat them as unknown.
export const toObjectId = (id: Identifier): ObjectId | null => {
  if (id instanceof ObjectId) return id
  if (!HEX_ID.test(id)) return null

  return new ObjectId(id)
}
