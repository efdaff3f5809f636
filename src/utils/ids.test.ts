import { describe, it, expect } from 'vitest'
import { createId } from './ids'

describe('createId', () => {
  it('returns string starting with default prefix', () => {
    const id = createId()
    expect(id).toMatch(/^id-[0-9a-f]{32}$/)
  })

  it('returns string starting with custom prefix', () => {
    const id = createId('client')
    expect(id).toMatch(/^client-/)
  })

  it('returns unique ids', () => {
    const ids = new Set<string>()
    for (let i = 0; i < 100; i += 1) {
      ids.add(createId())
    }
    expect(ids.size).toBe(100)
  })
})
