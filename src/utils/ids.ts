import { randomUUID } from 'node:crypto'

export const createId = (prefix = 'id') => `${prefix}-${randomUUID().replace(/-/g, '')}`
