import { describe, it, expect } from 'vitest'
import { collectFailures, err, ok } from '../result.js'

describe('collectFailures', () => {
  it('runs every step in order when all succeed', async () => {
    const order: string[] = []
    const failures = await collectFailures<string>([
      async () => {
        order.push('a')
        return ok(1)
      },
      async () => {
        order.push('b')
        return ok('two')
      },
    ])
    expect(failures).toEqual([])
    expect(order).toEqual(['a', 'b'])
  })

  it('keeps running after a failed step', async () => {
    const order: string[] = []
    const failures = await collectFailures<string>([
      async () => {
        order.push('first')
        return err('first failed')
      },
      async () => {
        order.push('second')
        return ok(2)
      },
      async () => {
        order.push('third')
        return err('third failed')
      },
    ])
    expect(order).toEqual(['first', 'second', 'third'])
    expect(failures).toEqual(['first failed', 'third failed'])
  })

  it('returns no failures for an empty list', async () => {
    expect(await collectFailures<string>([])).toEqual([])
  })
})
